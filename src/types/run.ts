/**
 * Run status; pending until dispatched, then running until the remote job settles.
 */
export const RunStatus = {
  PENDING: 'pending',
  RUNNING: 'running',
  COMPLETED: 'completed',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
  INTERRUPTED: 'interrupted',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

export const ResearchDepth = {
  BRIEF: 'brief',
  MODERATE: 'moderate',
  COMPREHENSIVE: 'comprehensive',
} as const;

export type ResearchDepth = (typeof ResearchDepth)[keyof typeof ResearchDepth];

export interface ResearchConstraints {
  timeframe?: string;
  region?: string;
  maxWords?: number;
  focusAreas?: string[];
  depth?: ResearchDepth;
}

/**
 * Original user inputs, carried unchanged across revisions.
 */
export interface RunInputs {
  topic: string;
  constraints: ResearchConstraints;
  questions?: string[];
}

export interface TokenUsage {
  promptTokens: number;
  outputTokens: number;
  totalTokens: number;
  thinkingTokens: number;
}

/**
 * One version of a research run.
 */
export interface ResearchRun {
  runId: string;
  version: number;
  jobId: string | null;
  promptText: string;
  reportMarkdown: string | null;
  status: RunStatus;
  createdAt: Date;
  feedback: string | null;
  previousJobId: string | null;
  usage: TokenUsage | null;
  inputs: RunInputs | null;
  error: string | null;
}

/**
 * Per-version entry of the run index.
 */
export interface VersionRecord {
  version: number;
  jobId: string | null;
  createdAt: Date;
  status: RunStatus;
  feedback: string | null;
  previousJobId: string | null;
  usage: TokenUsage | null;
  inputs: RunInputs | null;
  error: string | null;
}

/**
 * Run index, one per run id.
 */
export interface RunMetadata {
  runId: string;
  topic: string;
  createdAt: Date;
  versions: VersionRecord[];
  latestVersion: number;
}

/**
 * A single observation of a remote job.
 */
export interface JobSnapshot {
  jobId: string;
  status: RunStatus;
  remoteStatus: string | null;
  text: string | null;
  usage: TokenUsage | null;
}

/**
 * Outcome of waiting on a remote job.
 */
export interface PollResult {
  jobId: string;
  status: RunStatus;
  text: string | null;
  error: string | null;
  usage: TokenUsage | null;
  timedOut: boolean;
  durationMs: number;
}

export interface CreateRunOptions {
  runId: string;
  promptText: string;
  version?: number;
  feedback?: string | null;
  previousJobId?: string | null;
  inputs?: RunInputs | null;
}

/**
 * Create a new pending run version.
 */
export function createRun(options: CreateRunOptions): ResearchRun {
  return {
    runId: options.runId,
    version: options.version ?? 1,
    jobId: null,
    promptText: options.promptText,
    reportMarkdown: null,
    status: RunStatus.PENDING,
    createdAt: new Date(),
    feedback: options.feedback ?? null,
    previousJobId: options.previousJobId ?? null,
    usage: null,
    inputs: options.inputs ?? null,
    error: null,
  };
}
