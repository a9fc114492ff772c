/**
 * Remote research agent client
 *
 * Thin wrapper over the interactions REST endpoint: create a background
 * research job, and observe it one poll at a time. The wait loop lives in
 * {@link JobPoller}.
 */

import { RunStatus, type JobSnapshot, type PollResult, type TokenUsage } from '../types/run.js';
import { createLogger } from '../utils/logger.js';
import {
  ResearchApiError,
  NetworkError,
  NotFoundError,
  ValidationError,
  AuthenticationError,
  RateLimitError,
  ServerError,
  InvalidResponseError,
  isAbortError,
} from './errors.js';
import {
  interactionSchema,
  apiErrorBodySchema,
  type CreateInteractionBody,
  type Interaction,
} from './schemas.js';
import { JobPoller, type PollOptions } from './job-poller.js';
import { combineSignals } from './signals.js';

const log = createLogger('interactions-client');

export interface InteractionsClientConfig {
  apiKey: string;
  /** API root (default: https://generativelanguage.googleapis.com/v1beta) */
  baseUrl?: string;
  /** Agent identifier (default: deep-research-pro-preview-12-2025) */
  agent?: string;
  thinkingSummaries?: string;
  /** Per-request timeout in milliseconds (default: 30000) */
  timeout?: number;
  fetch?: typeof fetch;
}

export interface CreateJobOptions {
  /** Prior job whose conversation the new job continues */
  previousJobId?: string | null;
  signal?: AbortSignal;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * What the orchestrator needs from a remote agent.
 */
export interface ResearchJobClient {
  createJob(prompt: string, options?: CreateJobOptions): Promise<string>;
  pollOnce(jobId: string, options?: RequestOptions): Promise<JobSnapshot>;
}

const REMOTE_STATUS: Record<string, RunStatus> = {
  pending: RunStatus.PENDING,
  running: RunStatus.RUNNING,
  in_progress: RunStatus.RUNNING,
  completed: RunStatus.COMPLETED,
  failed: RunStatus.FAILED,
  cancelled: RunStatus.CANCELLED,
};

/**
 * Map the remote status vocabulary onto RunStatus. Unknown values are
 * treated as still running.
 */
export function mapRemoteStatus(status: string | undefined): RunStatus {
  if (status === undefined) {
    return RunStatus.RUNNING;
  }
  return REMOTE_STATUS[status.toLowerCase()] ?? RunStatus.RUNNING;
}

/**
 * Usage counters of an interaction; absent counters read as 0.
 */
export function extractUsage(interaction: Interaction): TokenUsage | null {
  const usage = interaction.usage;
  if (!usage) {
    return null;
  }
  return {
    promptTokens: usage.total_input_tokens ?? 0,
    outputTokens: usage.total_output_tokens ?? 0,
    totalTokens: usage.total_tokens ?? 0,
    thinkingTokens: usage.total_reasoning_tokens ?? 0,
  };
}

/**
 * Interactions API client
 *
 * @example
 * ```typescript
 * const client = new InteractionsClient({ apiKey: process.env.GEMINI_API_KEY ?? '' });
 * const jobId = await client.createJob('Research the history of tide tables');
 * const result = await client.pollUntilTerminal(jobId, { intervalMs: 10_000 });
 * ```
 */
export class InteractionsClient implements ResearchJobClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly agent: string;
  private readonly thinkingSummaries: string;
  private readonly timeout: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: InteractionsClientConfig) {
    this.baseUrl = (config.baseUrl ?? 'https://generativelanguage.googleapis.com/v1beta').replace(
      /\/$/,
      ''
    );
    this.apiKey = config.apiKey;
    this.agent = config.agent ?? 'deep-research-pro-preview-12-2025';
    this.thinkingSummaries = config.thinkingSummaries ?? 'auto';
    this.timeout = config.timeout ?? 30000;
    this.fetchFn = config.fetch ?? fetch;
  }

  /**
   * Submit a prompt as a background research job. Returns the job id.
   */
  async createJob(prompt: string, options: CreateJobOptions = {}): Promise<string> {
    const body: CreateInteractionBody = {
      input: prompt,
      agent: this.agent,
      background: true,
      stream: false,
      agent_config: {
        type: 'deep-research',
        thinking_summaries: this.thinkingSummaries,
      },
    };
    if (options.previousJobId) {
      body.previous_interaction_id = options.previousJobId;
    }

    const interaction = await this.request('POST', '/interactions', {
      body,
      signal: options.signal,
      resource: 'Interaction',
    });

    if (!interaction.id) {
      throw new InvalidResponseError('Create response did not include an interaction id', interaction);
    }

    log.info(
      { jobId: interaction.id, previousJobId: options.previousJobId ?? null },
      'Research job created'
    );
    return interaction.id;
  }

  /**
   * Single status check.
   */
  async pollOnce(jobId: string, options: RequestOptions = {}): Promise<JobSnapshot> {
    const interaction = await this.request(
      'GET',
      `/interactions/${encodeURIComponent(jobId)}`,
      { signal: options.signal, resource: 'Interaction', resourceId: jobId }
    );

    const status = mapRemoteStatus(interaction.status);
    const completed = status === RunStatus.COMPLETED;
    const lastOutput = interaction.outputs?.at(-1);

    return {
      jobId,
      status,
      remoteStatus: interaction.status ?? null,
      text: completed ? lastOutput?.text ?? null : null,
      usage: completed ? extractUsage(interaction) : null,
    };
  }

  /**
   * Poll until the job settles, times out or the signal aborts.
   */
  async pollUntilTerminal(jobId: string, options: PollOptions = {}): Promise<PollResult> {
    return new JobPoller(this, options).waitForCompletion(jobId);
  }

  private getHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'x-goog-api-key': this.apiKey,
    };
  }

  private async request(
    method: string,
    path: string,
    options: {
      body?: unknown;
      signal?: AbortSignal | undefined;
      resource: string;
      resourceId?: string;
    }
  ): Promise<Interaction> {
    const url = `${this.baseUrl}${path}`;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const combined = options.signal ? combineSignals(options.signal, controller.signal) : null;
    const signal = combined ? combined.signal : controller.signal;

    try {
      const response = await this.fetchFn(url, {
        method,
        headers: this.getHeaders(),
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal,
      });

      const data = await this.readBody(response);

      if (!response.ok) {
        this.handleError(response, data, options.resource, options.resourceId ?? path);
      }

      const parsed = interactionSchema.safeParse(data);
      if (!parsed.success) {
        throw new InvalidResponseError('Unexpected interaction payload', parsed.error.errors);
      }
      return parsed.data;
    } catch (error) {
      if (error instanceof ResearchApiError) throw error;

      // Caller cancellation is not a transport failure
      if (options.signal?.aborted) throw error;

      if (isAbortError(error)) {
        throw new NetworkError('Request timeout', error);
      }

      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Request failed: ${message}`, error);
    } finally {
      clearTimeout(timeoutId);
      combined?.dispose();
    }
  }

  private async readBody(response: Response): Promise<unknown> {
    const text = await response.text();
    if (text.length === 0) {
      return {};
    }
    try {
      return JSON.parse(text);
    } catch {
      if (!response.ok) {
        return { error: { message: text.slice(0, 200) } };
      }
      throw new InvalidResponseError('Response body is not valid JSON', text.slice(0, 200));
    }
  }

  /**
   * Map an error response onto a typed error
   */
  private handleError(
    response: Response,
    data: unknown,
    resource: string,
    resourceId: string
  ): never {
    const status = response.status;
    const parsed = apiErrorBodySchema.safeParse(data);
    const detail = parsed.success ? parsed.data.error : undefined;
    const message = detail?.message ?? `HTTP ${status}`;

    switch (status) {
      case 400:
        throw new ValidationError(message, detail);
      case 401:
      case 403:
        throw new AuthenticationError(message, status);
      case 404:
        throw new NotFoundError(resource, resourceId);
      case 429: {
        const retryAfter = Number.parseInt(response.headers.get('retry-after') ?? '', 10);
        throw new RateLimitError(message, Number.isNaN(retryAfter) ? undefined : retryAfter);
      }
      default:
        if (status >= 500) {
          throw new ServerError(message, status);
        }
        throw new ResearchApiError(message, detail?.status ?? 'API_ERROR', status, detail);
    }
  }
}
