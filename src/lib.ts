/**
 * research-relay library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Workflow (main entry point)
export * from './orchestrator/index.js';

// Remote agent client
export * from './agent/index.js';

// Citation engine
export * as citations from './citations/index.js';
export { processReport, type ProcessReportOptions } from './citations/index.js';

// Configuration
export {
  loadConfig,
  getConfig,
  resetConfig,
  requireApiKey,
  ConfigurationError,
  type ResearchRelayConfig,
  type PricingConfig,
} from './config/index.js';

// Control Plane
export * as controlPlane from './control-plane/index.js';

// Utilities
export { createLogger, logger } from './utils/index.js';
