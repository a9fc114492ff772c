import { RunStatus, type ResearchRun } from '../../types/run.js';
import { getConfig } from '../../config/index.js';
import { formatUsage } from '../../orchestrator/usage.js';
import {
  print,
  printError,
  dim,
  formatError,
  formatInfo,
  formatRunJson,
  formatSuccess,
  formatWarning,
} from '../formatter.js';

/**
 * Status lines go to stderr so stdout carries only the result.
 */
export function printStatus(message: string): void {
  printError(dim(message));
}

/**
 * Summarize a settled run and tell the user what to do next.
 */
export function printRunOutcome(run: ResearchRun, options: { json: boolean }): void {
  if (run.status === RunStatus.FAILED || run.status === RunStatus.CANCELLED) {
    process.exitCode = 1;
  }

  if (options.json) {
    print(formatRunJson(run));
    return;
  }

  const label = `run ${run.runId} v${run.version}`;

  switch (run.status) {
    case RunStatus.COMPLETED:
      print(formatSuccess(`Research complete: ${label}`));
      if (run.usage) {
        print(dim(formatUsage(run.usage, getConfig().pricing)));
      }
      print(formatInfo(`Read it with: research-relay show ${run.runId}`));
      break;
    case RunStatus.INTERRUPTED:
      print(formatWarning(`Research interrupted: ${label}`));
      print('The job may still be running remotely.');
      print(formatInfo(`Resume with: research-relay resume ${run.runId}`));
      break;
    case RunStatus.RUNNING:
      print(formatWarning(`Still running after the wait limit: ${label}`));
      print(formatInfo(`Resume with: research-relay resume ${run.runId}`));
      break;
    default:
      printError(formatError(`Research ended with status ${run.status}: ${label}`));
      if (run.error) {
        printError(formatError(run.error));
      }
      if (run.jobId) {
        print(formatInfo(`Retry the wait with: research-relay resume ${run.runId}`));
      }
  }
}
