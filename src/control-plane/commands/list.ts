import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { createRunStore } from '../context.js';
import { listCommandOptionsSchema, toValidationErrors } from '../validators.js';
import {
  print,
  printError,
  formatError,
  formatRunList,
  formatRunListJson,
  formatValidationErrors,
} from '../formatter.js';

/**
 * Create the list command.
 */
export function createListCommand(): Command {
  const command = new Command('list')
    .alias('ls')
    .description('List research runs, newest first')
    .option('-l, --limit <n>', 'Maximum number of runs to show')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeList(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the list command.
 */
async function executeList(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = listCommandOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(formatValidationErrors(toValidationErrors(optionsResult.error)));
    process.exitCode = 1;
    return;
  }

  const options = optionsResult.data;
  const runs = await createRunStore().listAll();
  const shown = options.limit === undefined ? runs : runs.slice(0, options.limit);

  if (options.json) {
    print(formatRunListJson(shown));
  } else {
    print(formatRunList(shown, getConfig().pricing));
  }
}
