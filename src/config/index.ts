/**
 * research-relay configuration module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Raised when configuration is missing or fails validation.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

/**
 * Pricing schema, USD per million tokens
 */
const pricingSchema = z.object({
  inputPerMillion: z.coerce.number().nonnegative().default(2.0),
  outputPerMillion: z.coerce.number().nonnegative().default(12.0),
});

export type PricingConfig = z.infer<typeof pricingSchema>;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Credentials; only commands that reach the remote agent require it
  apiKey: z.string().min(1).optional(),

  // Remote agent
  agent: z.string().min(1).default('deep-research-pro-preview-12-2025'),
  baseUrl: z.string().url().default('https://generativelanguage.googleapis.com/v1beta'),
  thinkingSummaries: z.enum(['auto', 'none']).default('auto'),
  requestTimeoutMs: z.coerce.number().int().min(1000).max(300000).default(30000),

  // Polling
  pollIntervalSeconds: z.coerce.number().min(1).max(600).default(10),
  pollTimeoutSeconds: z.coerce.number().int().min(10).max(86400).default(1800),

  // Citations
  resolveRedirects: booleanFlag.default('true'),
  redirectTimeoutMs: z.coerce.number().int().min(100).max(120000).default(10000),

  // Paths
  runsDir: z.string().min(1).default('runs'),

  pricing: pricingSchema,
});

export type ResearchRelayConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(): ResearchRelayConfig {
  const raw = {
    apiKey: process.env.GEMINI_API_KEY || undefined,
    agent: process.env.RESEARCH_RELAY_AGENT,
    baseUrl: process.env.RESEARCH_RELAY_BASE_URL,
    thinkingSummaries: process.env.RESEARCH_RELAY_THINKING_SUMMARIES,
    requestTimeoutMs: process.env.RESEARCH_RELAY_REQUEST_TIMEOUT_MS,
    pollIntervalSeconds: process.env.RESEARCH_RELAY_POLL_INTERVAL_SECONDS,
    pollTimeoutSeconds: process.env.RESEARCH_RELAY_POLL_TIMEOUT_SECONDS,
    resolveRedirects: process.env.RESEARCH_RELAY_RESOLVE_REDIRECTS?.toLowerCase(),
    redirectTimeoutMs: process.env.RESEARCH_RELAY_REDIRECT_TIMEOUT_MS,
    runsDir: process.env.RESEARCH_RELAY_RUNS_DIR,
    pricing: {
      inputPerMillion: process.env.RESEARCH_RELAY_PRICE_INPUT_PER_M,
      outputPerMillion: process.env.RESEARCH_RELAY_PRICE_OUTPUT_PER_M,
    },
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    const detail = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new ConfigurationError(`Configuration validation failed: ${detail}`);
  }

  log.debug(
    {
      agent: result.data.agent,
      runsDir: result.data.runsDir,
      pollIntervalSeconds: result.data.pollIntervalSeconds,
      pollTimeoutSeconds: result.data.pollTimeoutSeconds,
      hasApiKey: result.data.apiKey !== undefined,
    },
    'Configuration loaded'
  );

  return result.data;
}

let configInstance: ResearchRelayConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): ResearchRelayConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Return the API key or fail with a message pointing at the variable to set.
 */
export function requireApiKey(config: ResearchRelayConfig = getConfig()): string {
  if (!config.apiKey) {
    throw new ConfigurationError(
      'GEMINI_API_KEY is not set. Add it to your environment or a .env file.'
    );
  }
  return config.apiKey;
}
