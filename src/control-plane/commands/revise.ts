import { Command } from 'commander';
import { ResearchDepth } from '../../types/run.js';
import { createWorkflow, withInterrupt } from '../context.js';
import { reviseCommandOptionsSchema, toConstraints, toValidationErrors } from '../validators.js';
import {
  print,
  printError,
  bold,
  formatError,
  formatValidationErrors,
} from '../formatter.js';
import { printRunOutcome, printStatus } from './outcome.js';

/**
 * Create the revise command.
 */
export function createReviseCommand(): Command {
  const command = new Command('revise')
    .description('Revise the latest completed version of a run with feedback')
    .argument('<runId>', 'Run ID to revise')
    .requiredOption('-m, --feedback <text>', 'What to change in the report')
    .option('-f, --timeframe <period>', 'Updated time period constraint')
    .option('-r, --region <region>', 'Updated geographic focus')
    .option('-w, --max-words <n>', 'Updated maximum length in words')
    .option(
      '-d, --depth <depth>',
      `Updated research depth (${Object.values(ResearchDepth).join(', ')})`
    )
    .option('--focus <areas>', 'Updated comma-separated focus areas')
    .option('--json', 'Output result as JSON', false)
    .action(async (runId: string, options: Record<string, unknown>) => {
      try {
        await executeRevise(runId, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the revise command.
 */
async function executeRevise(runId: string, rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = reviseCommandOptionsSchema.safeParse({ ...rawOptions, runId });
  if (!optionsResult.success) {
    printError(formatValidationErrors(toValidationErrors(optionsResult.error)));
    process.exitCode = 1;
    return;
  }

  const options = optionsResult.data;
  const constraints = toConstraints(options);
  const workflow = createWorkflow();

  if (!options.json) {
    print(`${bold('Revising run')} ${options.runId} ${bold('with feedback:')} ${options.feedback}`);
  }

  const run = await withInterrupt((signal) =>
    workflow.revise(
      options.runId,
      options.feedback,
      Object.keys(constraints).length > 0 ? constraints : undefined,
      { signal, onStatus: printStatus }
    )
  );

  printRunOutcome(run, { json: options.json });
}
