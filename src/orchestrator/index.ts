export {
  ResearchWorkflow,
  type ResearchWorkflowOptions,
  type StartResearchInput,
  type OperationOptions,
  type StatusCallback,
} from './workflow.js';
export { RunStore, generateRunId } from './run-store.js';
export {
  applyEvent,
  canApply,
  isTerminalStatus,
  getProgressDescription,
  type RunEvent,
  type RunEventType,
} from './state-machine.js';
export {
  buildInitialPrompt,
  buildRevisionPrompt,
  formatConstraints,
  CITATION_CONTRACT,
} from './prompts.js';
export { calculateCost, formatUsage, DEFAULT_PRICING } from './usage.js';
export { PreconditionError, RunNotFoundError, InvalidTransitionError } from './errors.js';
