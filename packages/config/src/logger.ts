/**
 * @graphdex/config — Logger factory
 */

import type { Logger } from 'pino';
import { createCorrelatedLogger } from '@graphdex/observability';
import { config } from './env.js';

export type { Logger };

/**
 * The subset of the pino logger API graphdex code depends on. Accepting this
 * rather than `Logger` lets callers inject a stub.
 */
export type AppLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Create a module logger.
 *
 * @example
 * ```ts
 * const log = createLogger('admin:cluster-settings');
 * log.info({ cluster: 'main' }, 'Index maintenance mode started');
 * ```
 */
export function createLogger(module: string): Logger {
  return createCorrelatedLogger({
    service: 'graphdex',
    module,
    level: config.LOG_LEVEL,
    environment: config.NODE_ENV,
  });
}
