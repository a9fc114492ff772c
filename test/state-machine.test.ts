/**
 * Run State Machine Tests
 */

import { describe, it, expect } from 'vitest';
import {
  applyEvent,
  canApply,
  isTerminalStatus,
  getProgressDescription,
} from '../src/orchestrator/state-machine.js';
import { InvalidTransitionError } from '../src/orchestrator/errors.js';
import { createRun, type PollResult, type ResearchRun } from '../src/types/run.js';

function pendingRun(): ResearchRun {
  return createRun({ runId: 'abc12345', promptText: 'Prompt' });
}

function pollResult(overrides: Partial<PollResult> = {}): PollResult {
  return {
    jobId: 'job-1',
    status: 'completed',
    text: 'Report body',
    error: null,
    usage: { promptTokens: 100, outputTokens: 20, totalTokens: 120, thinkingTokens: 0 },
    timedOut: false,
    durationMs: 1000,
    ...overrides,
  };
}

describe('applyEvent', () => {
  it('should walk the happy path from pending to a processed report', () => {
    let run = pendingRun();

    run = applyEvent(run, { type: 'dispatched' });
    expect(run.status).toBe('running');

    run = applyEvent(run, { type: 'job_created', jobId: 'job-1' });
    expect(run.jobId).toBe('job-1');
    expect(run.status).toBe('running');

    run = applyEvent(run, { type: 'poll_settled', result: pollResult() });
    expect(run.status).toBe('completed');
    expect(run.reportMarkdown).toBe('Report body');
    expect(run.usage?.totalTokens).toBe(120);

    run = applyEvent(run, { type: 'report_processed', report: 'Processed body' });
    expect(run.status).toBe('completed');
    expect(run.reportMarkdown).toBe('Processed body');
  });

  it('should not mutate the input run', () => {
    const run = pendingRun();

    applyEvent(run, { type: 'dispatched' });

    expect(run.status).toBe('pending');
  });

  it('should fail a run whose job could not be created', () => {
    const running = applyEvent(pendingRun(), { type: 'dispatched' });

    const failed = applyEvent(running, { type: 'job_rejected', error: 'Job creation failed: boom' });

    expect(failed.status).toBe('failed');
    expect(failed.error).toBe('Job creation failed: boom');
    expect(failed.jobId).toBeNull();
  });

  it('should keep a timed-out run running with its error', () => {
    let run = applyEvent(pendingRun(), { type: 'dispatched' });
    run = applyEvent(run, { type: 'job_created', jobId: 'job-1' });

    run = applyEvent(run, {
      type: 'poll_settled',
      result: pollResult({ status: 'running', text: null, usage: null, timedOut: true, error: 'Polling timeout exceeded' }),
    });

    expect(run.status).toBe('running');
    expect(run.error).toBe('Polling timeout exceeded');
    expect(run.reportMarkdown).toBeNull();
    expect(run.usage).toBeNull();
  });

  it('should clear the error on resume', () => {
    let run = applyEvent(pendingRun(), { type: 'dispatched' });
    run = applyEvent(run, { type: 'job_created', jobId: 'job-1' });
    run = applyEvent(run, {
      type: 'poll_settled',
      result: pollResult({ status: 'interrupted', text: null, error: 'Interrupted by user' }),
    });

    const resumed = applyEvent(run, { type: 'resumed' });

    expect(resumed.status).toBe('running');
    expect(resumed.error).toBeNull();
    expect(resumed.jobId).toBe('job-1');
  });

  it('should reject events that are not valid from the current status', () => {
    expect(() => applyEvent(pendingRun(), { type: 'job_created', jobId: 'job-1' })).toThrow(
      InvalidTransitionError
    );
    expect(() => applyEvent(pendingRun(), { type: 'resumed' })).toThrow(
      'Invalid transition: pending + resumed'
    );
  });

  it('should reject resuming a completed run', () => {
    let run = applyEvent(pendingRun(), { type: 'dispatched' });
    run = applyEvent(run, { type: 'poll_settled', result: pollResult() });

    expect(() => applyEvent(run, { type: 'resumed' })).toThrow(
      'Invalid transition: completed + resumed'
    );
  });
});

describe('canApply', () => {
  it('should allow resume from every non-completed, non-pending status', () => {
    expect(canApply('running', 'resumed')).toBe(true);
    expect(canApply('failed', 'resumed')).toBe(true);
    expect(canApply('cancelled', 'resumed')).toBe(true);
    expect(canApply('interrupted', 'resumed')).toBe(true);
    expect(canApply('completed', 'resumed')).toBe(false);
    expect(canApply('pending', 'resumed')).toBe(false);
  });

  it('should only process reports of completed runs', () => {
    expect(canApply('completed', 'report_processed')).toBe(true);
    expect(canApply('running', 'report_processed')).toBe(false);
  });
});

describe('isTerminalStatus', () => {
  it('should treat interrupted as resumable', () => {
    expect(isTerminalStatus('completed')).toBe(true);
    expect(isTerminalStatus('failed')).toBe(true);
    expect(isTerminalStatus('cancelled')).toBe(true);
    expect(isTerminalStatus('interrupted')).toBe(false);
    expect(isTerminalStatus('running')).toBe(false);
  });
});

describe('getProgressDescription', () => {
  it('should describe each status', () => {
    const run = pendingRun();

    expect(getProgressDescription(run)).toBe('Waiting to submit');
    expect(getProgressDescription({ ...run, status: 'running', jobId: 'job-1' })).toBe(
      'Researching (job job-1)'
    );
    expect(
      getProgressDescription({ ...run, status: 'running', error: 'Polling timeout exceeded' })
    ).toBe('Still running remotely (Polling timeout exceeded)');
    expect(getProgressDescription({ ...run, status: 'failed', error: 'Interaction failed' })).toBe(
      'Failed: Interaction failed'
    );
  });
});
