/**
 * @graphdex/observability — Prometheus-compatible metrics
 *
 * Counters and histograms for datastore administration. Uses prom-client
 * so a long-running host process can expose them for scraping.
 */

import { Registry, Histogram, Counter } from 'prom-client';

/** Shared metric registry */
const registry = new Registry();

/**
 * Index configuration actions performed (or planned, in dry runs).
 *
 * Labels: action (create_index, update_index_settings, update_index_mappings, put_index_template, ...)
 */
export const indexConfigurationActionsTotal = new Counter({
  name: 'graphdex_index_configuration_actions_total',
  help: 'Total number of index configuration actions taken against the datastore',
  labelNames: ['action'] as const,
  registers: [registry],
});

/**
 * Cluster configuration duration histogram.
 *
 * Labels: outcome (success, invalid, error)
 */
export const clusterConfigurationDuration = new Histogram({
  name: 'graphdex_cluster_configuration_duration_seconds',
  help: 'Duration of full cluster configuration runs in seconds',
  labelNames: ['outcome'] as const,
  buckets: [0.1, 0.5, 1, 5, 10, 30, 60, 120],
  registers: [registry],
});

/**
 * Index maintenance mode transitions.
 *
 * Labels: cluster, mode (start, end)
 */
export const maintenanceModeTransitionsTotal = new Counter({
  name: 'graphdex_index_maintenance_mode_transitions_total',
  help: 'Total number of index maintenance mode transitions',
  labelNames: ['cluster', 'mode'] as const,
  registers: [registry],
});

/**
 * Get the shared metrics registry (for custom metrics).
 */
export function getRegistry(): Registry {
  return registry;
}

/**
 * Reset all metrics (for testing).
 */
export function resetMetrics(): void {
  registry.resetMetrics();
}
