import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { createRunStore } from '../context.js';
import { showCommandOptionsSchema, toValidationErrors } from '../validators.js';
import {
  print,
  printError,
  bold,
  dim,
  formatError,
  formatRunDetail,
  formatRunJson,
  formatSources,
  formatValidationErrors,
  formatWarning,
} from '../formatter.js';

/**
 * Create the show command.
 */
export function createShowCommand(): Command {
  const command = new Command('show')
    .description('Show a run report (latest version by default)')
    .argument('<runId>', 'Run ID to show')
    .option('-v, --version <n>', 'Version to show')
    .option('--sources', 'Show the parsed sources instead of the report', false)
    .option('--raw', 'Print only the report markdown', false)
    .option('--json', 'Output result as JSON', false)
    .action(async (runId: string, options: Record<string, unknown>) => {
      try {
        await executeShow(runId, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the show command.
 */
async function executeShow(runId: string, rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = showCommandOptionsSchema.safeParse({ ...rawOptions, runId });
  if (!optionsResult.success) {
    printError(formatValidationErrors(toValidationErrors(optionsResult.error)));
    process.exitCode = 1;
    return;
  }

  const options = optionsResult.data;
  const store = createRunStore();

  const run = options.version === undefined
    ? await store.loadLatest(options.runId)
    : await store.loadVersion(options.runId, options.version);

  if (!run) {
    const suffix = options.version === undefined ? '' : ` (version ${options.version})`;
    printError(formatError(`Run not found: ${options.runId}${suffix}`));
    process.exitCode = 1;
    return;
  }

  const sources = await store.loadSources(run.runId, run.version);

  if (options.json) {
    print(formatRunJson(run, sources));
    return;
  }

  if (options.sources) {
    print(formatSources(sources ?? new Map()));
    return;
  }

  if (options.raw) {
    if (run.reportMarkdown) {
      print(run.reportMarkdown);
    }
    return;
  }

  print(formatRunDetail(run, getConfig().pricing));
  print('');

  if (!run.reportMarkdown) {
    print(formatWarning('No report available (the run may be incomplete)'));
    return;
  }

  print(bold('Report:'));
  print(dim('-'.repeat(60)));
  print(run.reportMarkdown);
}
