/**
 * Research workflow
 *
 * Drives a run version from prompt to persisted, citation-processed report:
 * start (v1), revise (v+1, chained to the previous job) and resume (re-poll
 * the saved job). Every status change goes through the state machine and is
 * persisted before the next remote call.
 */

import type { ResearchJobClient } from '../agent/interactions-client.js';
import { JobPoller, type PollProgressEvent } from '../agent/job-poller.js';
import { processReport, type ProcessReportOptions } from '../citations/index.js';
import {
  RunStatus,
  createRun,
  type ResearchConstraints,
  type ResearchRun,
  type RunInputs,
} from '../types/run.js';
import { createLogger } from '../utils/logger.js';
import { PreconditionError, RunNotFoundError } from './errors.js';
import { buildInitialPrompt, buildRevisionPrompt } from './prompts.js';
import { RunStore, generateRunId } from './run-store.js';
import { applyEvent } from './state-machine.js';

const log = createLogger('workflow');

export type StatusCallback = (message: string) => void;

export interface OperationOptions {
  /** Aborting interrupts the wait; the run is saved as interrupted */
  signal?: AbortSignal;
  onStatus?: StatusCallback;
}

export interface StartResearchInput {
  topic: string;
  constraints?: ResearchConstraints;
  questions?: string[];
}

export interface ResearchWorkflowOptions {
  client: ResearchJobClient;
  store: RunStore;
  /** Polling interval in milliseconds (default: 10000) */
  pollIntervalMs?: number;
  /** Maximum wait in milliseconds (default: 1800000) */
  pollTimeoutMs?: number;
  citations?: ProcessReportOptions;
}

export class ResearchWorkflow {
  private readonly client: ResearchJobClient;
  private readonly store: RunStore;
  private readonly pollIntervalMs: number | undefined;
  private readonly pollTimeoutMs: number | undefined;
  private readonly citationOptions: ProcessReportOptions;

  constructor(options: ResearchWorkflowOptions) {
    this.client = options.client;
    this.store = options.store;
    this.pollIntervalMs = options.pollIntervalMs;
    this.pollTimeoutMs = options.pollTimeoutMs;
    this.citationOptions = options.citations ?? {};
  }

  /**
   * Start a new run (version 1) and wait for its report.
   */
  async start(input: StartResearchInput, options: OperationOptions = {}): Promise<ResearchRun> {
    const topic = input.topic.trim();
    if (topic.length === 0) {
      throw new PreconditionError('Research topic is required');
    }

    const inputs: RunInputs = {
      topic,
      constraints: input.constraints ?? {},
      ...(input.questions && input.questions.length > 0 ? { questions: input.questions } : {}),
    };

    const run = createRun({
      runId: generateRunId(),
      promptText: buildInitialPrompt(topic, inputs.questions, inputs.constraints),
      inputs,
    });

    log.info({ runId: run.runId, topic }, 'Starting research');
    return this.dispatch(run, options);
  }

  /**
   * Create the next version of a completed run, continuing its remote
   * conversation with the feedback.
   */
  async revise(
    runId: string,
    feedback: string,
    constraints?: ResearchConstraints,
    options: OperationOptions = {}
  ): Promise<ResearchRun> {
    if (feedback.trim().length === 0) {
      throw new PreconditionError('Feedback is required to revise a run');
    }

    const previous = await this.store.loadLatest(runId);
    if (!previous) {
      throw new RunNotFoundError(runId);
    }
    if (previous.status !== RunStatus.COMPLETED) {
      throw new PreconditionError(
        `Cannot revise incomplete run ${runId} (version ${previous.version} is ${previous.status})`
      );
    }

    const run = createRun({
      runId,
      version: previous.version + 1,
      promptText: buildRevisionPrompt(feedback, constraints),
      feedback: feedback.trim(),
      previousJobId: previous.jobId,
      inputs: previous.inputs,
    });

    log.info(
      { runId, version: run.version, previousJobId: run.previousJobId },
      'Revising research'
    );
    return this.dispatch(run, options);
  }

  /**
   * Keep waiting on the latest version's saved job. No new job is created.
   */
  async resume(runId: string, options: OperationOptions = {}): Promise<ResearchRun> {
    const latest = await this.store.loadLatest(runId);
    if (!latest) {
      throw new RunNotFoundError(runId);
    }
    if (latest.status === RunStatus.COMPLETED) {
      throw new PreconditionError(`Run ${runId} version ${latest.version} is already completed`);
    }
    if (!latest.jobId) {
      throw new PreconditionError(
        `Run ${runId} version ${latest.version} has no remote job to resume`
      );
    }

    const run = applyEvent(latest, { type: 'resumed' });
    await this.store.save(run);

    log.info({ runId, version: run.version, jobId: latest.jobId }, 'Resuming research');
    options.onStatus?.(`Resuming job ${latest.jobId}`);

    return this.waitAndFinalize(run, latest.jobId, options);
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private async dispatch(pending: ResearchRun, options: OperationOptions): Promise<ResearchRun> {
    let run = applyEvent(pending, { type: 'dispatched' });
    await this.store.save(run);

    let jobId: string;
    try {
      jobId = await this.client.createJob(run.promptText, {
        previousJobId: run.previousJobId,
        signal: options.signal,
      });
    } catch (error) {
      const message = options.signal?.aborted
        ? 'Interrupted before the job was created'
        : `Job creation failed: ${error instanceof Error ? error.message : String(error)}`;
      log.error({ runId: run.runId, version: run.version, err: error }, 'Job creation failed');
      run = applyEvent(run, { type: 'job_rejected', error: message });
      await this.store.save(run);
      options.onStatus?.(message);
      return run;
    }

    run = applyEvent(run, { type: 'job_created', jobId });
    await this.store.save(run);
    options.onStatus?.(`Job ${jobId} created`);

    return this.waitAndFinalize(run, jobId, options);
  }

  private async waitAndFinalize(
    running: ResearchRun,
    jobId: string,
    options: OperationOptions
  ): Promise<ResearchRun> {
    const poller = new JobPoller(this.client, {
      ...(this.pollIntervalMs !== undefined ? { intervalMs: this.pollIntervalMs } : {}),
      ...(this.pollTimeoutMs !== undefined ? { timeoutMs: this.pollTimeoutMs } : {}),
      ...(options.signal ? { signal: options.signal } : {}),
      onProgress: (event: PollProgressEvent) => {
        if (event.event === 'polling') {
          options.onStatus?.(`Status: ${event.status} (${Math.round(event.elapsed / 1000)}s)`);
        }
      },
    });

    const result = await poller.waitForCompletion(jobId);
    let run = applyEvent(running, { type: 'poll_settled', result });

    if (run.status === RunStatus.COMPLETED && run.reportMarkdown) {
      run = await this.processCitations(run, run.reportMarkdown, options);
    } else if (run.error) {
      options.onStatus?.(run.error);
    }

    await this.store.save(run);
    log.info(
      { runId: run.runId, version: run.version, status: run.status, durationMs: result.durationMs },
      'Run settled'
    );
    return run;
  }

  private async processCitations(
    run: ResearchRun,
    report: string,
    options: OperationOptions
  ): Promise<ResearchRun> {
    const processed = await processReport(report, this.citationOptions);

    for (const finding of processed.errors) {
      log.warn(
        { runId: run.runId, version: run.version, code: finding.code },
        finding.message
      );
      options.onStatus?.(`Citation ${finding.severity}: ${finding.message}`);
    }

    if (processed.sources.size > 0) {
      await this.store.saveSources(run.runId, run.version, processed.sources);
    }

    return applyEvent(run, { type: 'report_processed', report: processed.text });
  }
}
