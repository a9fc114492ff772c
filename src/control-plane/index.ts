// Validators
export {
  runIdSchema,
  jobIdSchema,
  constraintOptionsSchema,
  newCommandOptionsSchema,
  reviseCommandOptionsSchema,
  resumeCommandOptionsSchema,
  showCommandOptionsSchema,
  listCommandOptionsSchema,
  statusCommandOptionsSchema,
  toConstraints,
  toValidationErrors,
  type ConstraintOptions,
  type NewCommandOptions,
  type ReviseCommandOptions,
  type ResumeCommandOptions,
  type ShowCommandOptions,
  type ListCommandOptions,
  type StatusCommandOptions,
} from './validators.js';

// Formatter
export {
  formatStatus,
  formatDate,
  formatRelativeTime,
  truncate,
  formatTable,
  formatRunList,
  formatRunDetail,
  formatSources,
  formatRunJson,
  formatRunListJson,
  formatSuccess,
  formatError,
  formatWarning,
  formatInfo,
  formatJson,
  formatValidationErrors,
  print,
  printError,
} from './formatter.js';

// Wiring
export { createClient, createRunStore, createWorkflow, withInterrupt } from './context.js';

// CLI
export {
  createProgram,
  runCli,
  createNewCommand,
  createReviseCommand,
  createResumeCommand,
  createShowCommand,
  createListCommand,
  createStatusCommand,
} from './cli.js';
