import type { RunStatus } from '../types/run.js';

/**
 * Operation is not valid for the run's current state.
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

export class RunNotFoundError extends PreconditionError {
  constructor(public readonly runId: string) {
    super(`Run not found: ${runId}`);
    this.name = 'RunNotFoundError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: RunStatus,
    public readonly event: string
  ) {
    super(`Invalid transition: ${from} + ${event}`);
    this.name = 'InvalidTransitionError';
  }
}
