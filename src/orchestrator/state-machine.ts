/**
 * State machine for research runs.
 *
 * Every status change of a ResearchRun goes through applyEvent. Events carry
 * the data they set, so callers never assign `status` directly.
 */

import { RunStatus, type ResearchRun, type PollResult } from '../types/run.js';
import { createLogger } from '../utils/logger.js';
import { InvalidTransitionError } from './errors.js';

const log = createLogger('state-machine');

export type RunEvent =
  | { type: 'dispatched' }
  | { type: 'job_created'; jobId: string }
  | { type: 'job_rejected'; error: string }
  | { type: 'poll_settled'; result: PollResult }
  | { type: 'resumed' }
  | { type: 'report_processed'; report: string };

export type RunEventType = RunEvent['type'];

/**
 * Statuses each event may be applied from.
 */
const validFrom: Record<RunEventType, readonly RunStatus[]> = {
  dispatched: [RunStatus.PENDING],
  job_created: [RunStatus.RUNNING],
  job_rejected: [RunStatus.PENDING, RunStatus.RUNNING],
  poll_settled: [RunStatus.RUNNING],
  resumed: [RunStatus.RUNNING, RunStatus.FAILED, RunStatus.CANCELLED, RunStatus.INTERRUPTED],
  report_processed: [RunStatus.COMPLETED],
};

/**
 * Statuses the remote job can no longer leave. Interrupted runs are
 * resumable, so they are not terminal.
 */
export function isTerminalStatus(status: RunStatus): boolean {
  return (
    status === RunStatus.COMPLETED ||
    status === RunStatus.FAILED ||
    status === RunStatus.CANCELLED
  );
}

export function canApply(status: RunStatus, event: RunEventType): boolean {
  return validFrom[event].includes(status);
}

/**
 * Apply an event to a run. Returns the updated run or throws if the event is
 * not valid in the run's current status.
 */
export function applyEvent(run: ResearchRun, event: RunEvent): ResearchRun {
  if (!canApply(run.status, event.type)) {
    log.error(
      { runId: run.runId, version: run.version, currentStatus: run.status, event: event.type },
      'Invalid transition'
    );
    throw new InvalidTransitionError(run.status, event.type);
  }

  const next = reduce(run, event);

  log.debug(
    { runId: run.runId, version: run.version, from: run.status, event: event.type, to: next.status },
    'State transition'
  );

  return next;
}

function reduce(run: ResearchRun, event: RunEvent): ResearchRun {
  switch (event.type) {
    case 'dispatched':
      return { ...run, status: RunStatus.RUNNING };
    case 'job_created':
      return { ...run, jobId: event.jobId };
    case 'job_rejected':
      return { ...run, status: RunStatus.FAILED, error: event.error };
    case 'poll_settled': {
      const { result } = event;
      return {
        ...run,
        jobId: result.jobId,
        status: result.status,
        error: result.error,
        usage: result.usage ?? run.usage,
        reportMarkdown: result.status === RunStatus.COMPLETED ? result.text : run.reportMarkdown,
      };
    }
    case 'resumed':
      return { ...run, status: RunStatus.RUNNING, error: null };
    case 'report_processed':
      return { ...run, reportMarkdown: event.report };
  }
}

/**
 * Get human-readable progress description.
 */
export function getProgressDescription(run: ResearchRun): string {
  switch (run.status) {
    case RunStatus.PENDING:
      return 'Waiting to submit';
    case RunStatus.RUNNING:
      return run.error
        ? `Still running remotely (${run.error})`
        : `Researching (job ${run.jobId ?? 'not yet created'})`;
    case RunStatus.COMPLETED:
      return 'Completed';
    case RunStatus.FAILED:
      return `Failed: ${run.error ?? 'Unknown error'}`;
    case RunStatus.CANCELLED:
      return 'Cancelled remotely';
    case RunStatus.INTERRUPTED:
      return 'Interrupted; resume to keep waiting';
  }
}
