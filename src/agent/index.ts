export {
  InteractionsClient,
  mapRemoteStatus,
  extractUsage,
  type InteractionsClientConfig,
  type ResearchJobClient,
  type CreateJobOptions,
  type RequestOptions,
} from './interactions-client.js';
export {
  JobPoller,
  pollUntilTerminal,
  POLL_TIMEOUT_MESSAGE,
  INTERRUPTED_MESSAGE,
  type PollOptions,
  type PollProgressEvent,
  type PollProgressCallback,
  type JobStatusSource,
} from './job-poller.js';
export * from './errors.js';
