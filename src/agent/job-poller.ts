/**
 * Research Job Poller
 *
 * Polls a remote research job at a fixed interval until it reaches a terminal
 * status. Timeouts, transport failures and cancellation are folded into the
 * returned PollResult; the loop itself never throws.
 */

import { RunStatus, type JobSnapshot, type PollResult } from '../types/run.js';
import { createLogger } from '../utils/logger.js';
import type { ResearchJobClient } from './interactions-client.js';
import { delay } from './signals.js';

const logger = createLogger('job-poller');

// ============================================================================
// Types
// ============================================================================

export type PollEventType = 'polling' | 'completed';

export interface PollProgressEvent {
  event: PollEventType;
  jobId: string;
  status: RunStatus;
  remoteStatus: string | null;
  attempt: number;
  /** Milliseconds since polling started */
  elapsed: number;
}

export type PollProgressCallback = (event: PollProgressEvent) => void;

export interface PollOptions {
  /** Polling interval in milliseconds (default: 10000) */
  intervalMs?: number;
  /** Maximum wait time in milliseconds (default: 1800000 = 30 min) */
  timeoutMs?: number;
  /** Aborting ends the wait with an interrupted result */
  signal?: AbortSignal;
  onProgress?: PollProgressCallback;
}

export type JobStatusSource = Pick<ResearchJobClient, 'pollOnce'>;

export const POLL_TIMEOUT_MESSAGE = 'Polling timeout exceeded';
export const INTERRUPTED_MESSAGE = 'Interrupted by user';

// ============================================================================
// Job Poller
// ============================================================================

const DEFAULT_OPTIONS = {
  intervalMs: 10_000,
  timeoutMs: 30 * 60 * 1000, // 30 minutes
};

export class JobPoller {
  private readonly client: JobStatusSource;
  private readonly options: typeof DEFAULT_OPTIONS & Omit<PollOptions, 'intervalMs' | 'timeoutMs'>;

  constructor(client: JobStatusSource, options: PollOptions = {}) {
    this.client = client;
    this.options = {
      ...options,
      intervalMs: options.intervalMs ?? DEFAULT_OPTIONS.intervalMs,
      timeoutMs: options.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs,
    };
  }

  /**
   * Wait for the job to complete, fail or be cancelled remotely.
   *
   * - timeout: status stays `running`, `timedOut` is set
   * - abort: status `interrupted`
   * - transport error: status `failed` with the error detail
   */
  async waitForCompletion(jobId: string): Promise<PollResult> {
    const { signal, intervalMs, timeoutMs } = this.options;
    const startTime = Date.now();
    let attempt = 0;

    // eslint-disable-next-line no-constant-condition
    while (true) {
      if (signal?.aborted) {
        return this.createInterruptedResult(jobId, startTime);
      }

      attempt += 1;
      let snapshot: JobSnapshot;
      try {
        snapshot = await this.client.pollOnce(jobId, { signal });
      } catch (error) {
        if (signal?.aborted) {
          return this.createInterruptedResult(jobId, startTime);
        }
        const message = error instanceof Error ? error.message : String(error);
        logger.warn({ jobId, attempt, err: error }, 'Polling failed');
        return this.createResult(jobId, startTime, {
          status: RunStatus.FAILED,
          error: `Polling failed: ${message}`,
        });
      }

      this.emitEvent('polling', snapshot, attempt, startTime);

      switch (snapshot.status) {
        case RunStatus.COMPLETED:
          this.emitEvent('completed', snapshot, attempt, startTime);
          logger.info({ jobId, attempt }, 'Research job completed');
          return this.createResult(jobId, startTime, {
            status: RunStatus.COMPLETED,
            text: snapshot.text,
            usage: snapshot.usage,
          });
        case RunStatus.FAILED:
        case RunStatus.CANCELLED:
          logger.warn({ jobId, status: snapshot.status }, 'Research job ended without a report');
          return this.createResult(jobId, startTime, {
            status: snapshot.status,
            error: `Interaction ${snapshot.status}`,
          });
        default:
          break;
      }

      const elapsed = Date.now() - startTime;
      if (elapsed >= timeoutMs) {
        logger.warn({ jobId, elapsed, timeout: timeoutMs }, 'Polling timed out');
        return this.createResult(jobId, startTime, {
          status: RunStatus.RUNNING,
          error: POLL_TIMEOUT_MESSAGE,
          timedOut: true,
        });
      }

      await delay(intervalMs, signal);
    }
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private createInterruptedResult(jobId: string, startTime: number): PollResult {
    logger.info({ jobId }, 'Polling interrupted');
    return this.createResult(jobId, startTime, {
      status: RunStatus.INTERRUPTED,
      error: INTERRUPTED_MESSAGE,
    });
  }

  private createResult(
    jobId: string,
    startTime: number,
    fields: Pick<PollResult, 'status'> & Partial<Omit<PollResult, 'jobId' | 'status' | 'durationMs'>>
  ): PollResult {
    return {
      jobId,
      status: fields.status,
      text: fields.text ?? null,
      error: fields.error ?? null,
      usage: fields.usage ?? null,
      timedOut: fields.timedOut ?? false,
      durationMs: Date.now() - startTime,
    };
  }

  private emitEvent(
    event: PollEventType,
    snapshot: JobSnapshot,
    attempt: number,
    startTime: number
  ): void {
    if (this.options.onProgress) {
      this.options.onProgress({
        event,
        jobId: snapshot.jobId,
        status: snapshot.status,
        remoteStatus: snapshot.remoteStatus,
        attempt,
        elapsed: Date.now() - startTime,
      });
    }
  }
}

/**
 * Functional form of {@link JobPoller.waitForCompletion}.
 */
export function pollUntilTerminal(
  client: JobStatusSource,
  jobId: string,
  options: PollOptions = {}
): Promise<PollResult> {
  return new JobPoller(client, options).waitForCompletion(jobId);
}
