/**
 * @graphdex/observability — Run correlation
 *
 * Assigns a correlation ID to every administrative run (e.g. one cluster
 * reconfiguration) so all log lines it produces can be grouped together.
 */

import { randomUUID } from 'node:crypto';
import { AsyncLocalStorage } from 'node:async_hooks';

/** Async local storage for correlation context */
const correlationStore = new AsyncLocalStorage<CorrelationContext>();

/**
 * Correlation context available throughout a run.
 */
export interface CorrelationContext {
  /** Unique run correlation ID */
  correlationId: string;
  /** Name of the operation being run (e.g. "configure_cluster") */
  operation: string;
  /** Whether datastore writes are suppressed for this run */
  dryRun: boolean;
  /** Run start timestamp */
  startTime: number;
}

/**
 * Get the current correlation context from async local storage.
 *
 * @returns The current correlation context, or undefined if outside a run
 */
export function getCorrelationContext(): CorrelationContext | undefined {
  return correlationStore.getStore();
}

/**
 * Get the current correlation ID.
 *
 * @returns The correlation ID, or 'unknown' if outside a run
 */
export function getCorrelationId(): string {
  const ctx = correlationStore.getStore();
  return ctx?.correlationId ?? 'unknown';
}

/**
 * Run `fn` within a new correlation context.
 *
 * Nested runs inherit the outer correlation ID.
 *
 * @example
 * ```ts
 * await withCorrelation({ operation: 'configure_cluster' }, () => configurator.configureCluster(out));
 * ```
 */
export function withCorrelation<T>(
  opts: { operation: string; dryRun?: boolean; correlationId?: string },
  fn: () => Promise<T>,
): Promise<T> {
  const outer = correlationStore.getStore();
  const context: CorrelationContext = {
    correlationId: opts.correlationId ?? outer?.correlationId ?? randomUUID(),
    operation: opts.operation,
    dryRun: opts.dryRun ?? outer?.dryRun ?? false,
    startTime: Date.now(),
  };

  return correlationStore.run(context, fn);
}
