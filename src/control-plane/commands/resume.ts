import { Command } from 'commander';
import { createWorkflow, withInterrupt } from '../context.js';
import { resumeCommandOptionsSchema, toValidationErrors } from '../validators.js';
import { printError, formatError, formatValidationErrors } from '../formatter.js';
import { printRunOutcome, printStatus } from './outcome.js';

/**
 * Create the resume command.
 */
export function createResumeCommand(): Command {
  const command = new Command('resume')
    .description('Keep waiting on the remote job of an unfinished run')
    .argument('<runId>', 'Run ID to resume')
    .option('--json', 'Output result as JSON', false)
    .action(async (runId: string, options: Record<string, unknown>) => {
      try {
        await executeResume(runId, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the resume command.
 */
async function executeResume(runId: string, rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = resumeCommandOptionsSchema.safeParse({ ...rawOptions, runId });
  if (!optionsResult.success) {
    printError(formatValidationErrors(toValidationErrors(optionsResult.error)));
    process.exitCode = 1;
    return;
  }

  const options = optionsResult.data;
  const workflow = createWorkflow();

  const run = await withInterrupt((signal) =>
    workflow.resume(options.runId, { signal, onStatus: printStatus })
  );

  printRunOutcome(run, { json: options.json });
}
