/**
 * @graphdex/observability — Structured logging with run correlation
 *
 * Extends Pino with automatic correlation ID injection so every line logged
 * during an administrative run carries the run's ID.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import { getCorrelationContext } from './correlation.js';

/**
 * Options for creating a correlated logger.
 */
export interface CorrelatedLoggerOptions {
  /** Service name */
  service: string;
  /** Module within the service (e.g. "admin:cluster-settings") */
  module?: string;
  /** Log level (default: based on environment) */
  level?: string;
  /** Environment name */
  environment?: string;
}

/**
 * Create a Pino logger that automatically includes correlation context.
 *
 * Every log entry will include:
 * - `correlationId`: The run correlation ID
 * - `operation`: The operation being run, when inside a run
 * - `service` and `module`
 *
 * @param opts - Logger configuration
 * @returns A Pino logger instance
 *
 * @example
 * ```ts
 * const logger = createCorrelatedLogger({ service: 'graphdex', module: 'admin' });
 * logger.info('Index created'); // includes correlationId automatically
 * ```
 */
export function createCorrelatedLogger(opts: CorrelatedLoggerOptions): Logger {
  const environment = opts.environment ?? process.env.NODE_ENV;
  const isProduction = environment === 'production';
  const isTest = environment === 'test';

  const pinoOpts: LoggerOptions = {
    name: opts.service,
    level: opts.level ?? (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    mixin() {
      const ctx = getCorrelationContext();
      return {
        correlationId: ctx?.correlationId ?? 'none',
        ...(ctx && { operation: ctx.operation }),
        ...(ctx?.dryRun && { dryRun: true }),
        service: opts.service,
        ...(opts.module && { module: opts.module }),
      };
    },
  };

  return pino(pinoOpts);
}
