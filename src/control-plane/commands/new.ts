import { Command } from 'commander';
import { ResearchDepth } from '../../types/run.js';
import { createWorkflow, withInterrupt } from '../context.js';
import { newCommandOptionsSchema, toConstraints, toValidationErrors } from '../validators.js';
import {
  print,
  printError,
  bold,
  formatError,
  formatValidationErrors,
} from '../formatter.js';
import { printRunOutcome, printStatus } from './outcome.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create the new command.
 */
export function createNewCommand(): Command {
  const command = new Command('new')
    .description('Start a new research run on a topic')
    .argument('<topic>', 'Research topic or question')
    .option('-f, --timeframe <period>', 'Time period constraint (e.g. "2020-2024")')
    .option('-r, --region <region>', 'Geographic focus')
    .option('-w, --max-words <n>', 'Maximum report length in words')
    .option(
      '-d, --depth <depth>',
      `Research depth (${Object.values(ResearchDepth).join(', ')})`
    )
    .option('--focus <areas>', 'Comma-separated focus areas')
    .option('-q, --question <text>', 'Research question (repeatable)', collect, [])
    .option('--json', 'Output result as JSON', false)
    .action(async (topic: string, options: Record<string, unknown>) => {
      try {
        await executeNew(topic, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the new command.
 */
async function executeNew(topic: string, rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = newCommandOptionsSchema.safeParse({ ...rawOptions, topic });
  if (!optionsResult.success) {
    printError(formatValidationErrors(toValidationErrors(optionsResult.error)));
    process.exitCode = 1;
    return;
  }

  const options = optionsResult.data;
  const workflow = createWorkflow();

  if (!options.json) {
    print(`${bold('Starting research on:')} ${options.topic}`);
  }

  const run = await withInterrupt((signal) =>
    workflow.start(
      {
        topic: options.topic,
        constraints: toConstraints(options),
        questions: options.question,
      },
      { signal, onStatus: printStatus }
    )
  );

  printRunOutcome(run, { json: options.json });
}
