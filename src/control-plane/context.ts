/**
 * Wiring from configuration to the client, store and workflow used by the
 * commands.
 */

import { getConfig, requireApiKey, type ResearchRelayConfig } from '../config/index.js';
import { InteractionsClient } from '../agent/interactions-client.js';
import { RunStore } from '../orchestrator/run-store.js';
import { ResearchWorkflow } from '../orchestrator/workflow.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('cli');

export function createRunStore(config: ResearchRelayConfig = getConfig()): RunStore {
  return new RunStore(config.runsDir);
}

export function createClient(config: ResearchRelayConfig = getConfig()): InteractionsClient {
  return new InteractionsClient({
    apiKey: requireApiKey(config),
    baseUrl: config.baseUrl,
    agent: config.agent,
    thinkingSummaries: config.thinkingSummaries,
    timeout: config.requestTimeoutMs,
  });
}

export function createWorkflow(config: ResearchRelayConfig = getConfig()): ResearchWorkflow {
  return new ResearchWorkflow({
    client: createClient(config),
    store: createRunStore(config),
    pollIntervalMs: config.pollIntervalSeconds * 1000,
    pollTimeoutMs: config.pollTimeoutSeconds * 1000,
    citations: {
      resolveRedirects: config.resolveRedirects,
      timeoutMs: config.redirectTimeoutMs,
    },
  });
}

/**
 * Run `operation` with an AbortSignal that fires on the first Ctrl-C. The
 * handler is removed once the operation settles.
 */
export async function withInterrupt<T>(operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSigint = (): void => {
    log.info('Interrupt received, stopping the wait');
    controller.abort();
  };

  process.once('SIGINT', onSigint);
  try {
    return await operation(controller.signal);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
