import { Command } from 'commander';
import { createNewCommand } from './commands/new.js';
import { createReviseCommand } from './commands/revise.js';
import { createResumeCommand } from './commands/resume.js';
import { createShowCommand } from './commands/show.js';
import { createListCommand } from './commands/list.js';
import { createStatusCommand } from './commands/status.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('research-relay')
    .description(
      'research-relay - submit deep-research jobs, wait for them and keep versioned, cited reports'
    )
    .version(VERSION, '-V, --version', 'Output the current version')
    // `show --version <n>` must not be taken for the program's version flag
    .enablePositionalOptions();

  program.addCommand(createNewCommand());
  program.addCommand(createReviseCommand());
  program.addCommand(createResumeCommand());
  program.addCommand(createShowCommand());
  program.addCommand(createListCommand());
  program.addCommand(createStatusCommand());

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version' ||
        error.code === 'commander.help')
    ) {
      return;
    }

    throw error;
  }
}

export { createNewCommand } from './commands/new.js';
export { createReviseCommand } from './commands/revise.js';
export { createResumeCommand } from './commands/resume.js';
export { createShowCommand } from './commands/show.js';
export { createListCommand } from './commands/list.js';
export { createStatusCommand } from './commands/status.js';
