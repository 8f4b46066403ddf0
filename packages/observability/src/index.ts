/**
 * @graphdex/observability — Logging, run correlation and metrics
 */

export { getCorrelationContext, getCorrelationId, withCorrelation } from './correlation.js';
export type { CorrelationContext } from './correlation.js';

export { createCorrelatedLogger } from './logging.js';
export type { CorrelatedLoggerOptions } from './logging.js';

export {
  indexConfigurationActionsTotal,
  clusterConfigurationDuration,
  maintenanceModeTransitionsTotal,
  getRegistry,
  resetMetrics,
} from './metrics.js';
