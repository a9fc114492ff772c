import { Command } from 'commander';
import { createClient } from '../context.js';
import { statusCommandOptionsSchema, toValidationErrors } from '../validators.js';
import {
  print,
  printError,
  bold,
  formatError,
  formatJson,
  formatStatus,
  formatSuccess,
  formatValidationErrors,
} from '../formatter.js';

/**
 * Create the status command.
 */
export function createStatusCommand(): Command {
  const command = new Command('status')
    .description('Check a remote research job once')
    .argument('<jobId>', 'Remote job (interaction) ID')
    .option('--json', 'Output result as JSON', false)
    .action(async (jobId: string, options: Record<string, unknown>) => {
      try {
        await executeStatus(jobId, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the status command.
 */
async function executeStatus(jobId: string, rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = statusCommandOptionsSchema.safeParse({ ...rawOptions, jobId });
  if (!optionsResult.success) {
    printError(formatValidationErrors(toValidationErrors(optionsResult.error)));
    process.exitCode = 1;
    return;
  }

  const options = optionsResult.data;
  const snapshot = await createClient().pollOnce(options.jobId);

  if (options.json) {
    print(formatJson(snapshot));
    return;
  }

  print(`${bold('Job:')}     ${snapshot.jobId}`);
  print(`${bold('Status:')}  ${formatStatus(snapshot.status)}`);

  if (snapshot.text) {
    print('');
    print(formatSuccess(`Report is ready (${snapshot.text.length} characters)`));
  }
}
