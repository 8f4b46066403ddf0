/**
 * @graphdex/observability — Correlation and metrics tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { getCorrelationContext, getCorrelationId, withCorrelation } from '../correlation.js';
import { getRegistry, indexConfigurationActionsTotal, resetMetrics } from '../metrics.js';

describe('withCorrelation', () => {
  it('exposes the context inside the run only', async () => {
    expect(getCorrelationId()).toBe('unknown');

    const seen = await withCorrelation({ operation: 'configure_cluster', correlationId: 'run-1' }, async () =>
      getCorrelationContext(),
    );

    expect(seen).toMatchObject({ correlationId: 'run-1', operation: 'configure_cluster', dryRun: false });
    expect(getCorrelationContext()).toBeUndefined();
  });

  it('inherits the outer correlation ID and dry-run flag in nested runs', async () => {
    const inner = await withCorrelation({ operation: 'outer', correlationId: 'run-2', dryRun: true }, () =>
      withCorrelation({ operation: 'inner' }, async () => getCorrelationContext()),
    );

    expect(inner).toMatchObject({ correlationId: 'run-2', operation: 'inner', dryRun: true });
  });

  it('generates an ID when none is given', async () => {
    const id = await withCorrelation({ operation: 'op' }, async () => getCorrelationId());
    expect(id).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('metrics', () => {
  beforeEach(() => {
    resetMetrics();
  });

  it('counts index configuration actions by label', async () => {
    indexConfigurationActionsTotal.inc({ action: 'create_index' });
    indexConfigurationActionsTotal.inc({ action: 'create_index' });

    const metric = await getRegistry().getSingleMetricAsString('graphdex_index_configuration_actions_total');
    expect(metric).toContain('graphdex_index_configuration_actions_total{action="create_index"} 2');
  });
});
