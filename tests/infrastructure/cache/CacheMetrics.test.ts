/**
 * Embedding Cache Metrics Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Registry } from 'prom-client';
import { EmbeddingCacheMetrics } from '../../../src/infrastructure/cache/CacheMetrics.js';

describe('EmbeddingCacheMetrics', () => {
  let metrics: EmbeddingCacheMetrics;

  beforeEach(() => {
    metrics = new EmbeddingCacheMetrics();
  });

  it('should count operations by backend and outcome', async () => {
    metrics.recordOperation('get', 'redis', 'hit');
    metrics.recordOperation('get', 'redis', 'hit');
    metrics.recordOperation('get', 'volatile', 'miss');

    const rendered = await metrics.render();

    expect(rendered).toContain(
      'embedding_cache_operations_total{operation="get",backend="redis",outcome="hit"} 2'
    );
    expect(rendered).toContain(
      'embedding_cache_operations_total{operation="get",backend="volatile",outcome="miss"} 1'
    );
  });

  it('should set the active tier gauge on transitions', async () => {
    metrics.recordTierTransition('primary', 'volatile', 'failure');

    const rendered = await metrics.render();

    expect(rendered).toContain('embedding_cache_active_tier 2');
    expect(rendered).toContain(
      'embedding_cache_tier_transitions_total{from="primary",to="volatile",reason="failure"} 1'
    );
  });

  it('should ignore empty sweeps', async () => {
    metrics.recordExpiredRemoved('sqlite', 0);
    metrics.recordExpiredRemoved('volatile', 3);

    const rendered = await metrics.render();

    expect(rendered).not.toContain('embedding_cache_expired_removed_total{backend="sqlite"}');
    expect(rendered).toContain('embedding_cache_expired_removed_total{backend="volatile"} 3');
  });

  it('should report volatile entries', async () => {
    metrics.setVolatileEntries(7);

    expect(await metrics.render()).toContain('embedding_cache_volatile_entries 7');
  });

  it('should register into a supplied registry', () => {
    const registry = new Registry();
    const scoped = new EmbeddingCacheMetrics(registry);

    expect(scoped.registry).toBe(registry);
    expect(registry.getSingleMetric('embedding_cache_backend_failures_total')).toBeDefined();
  });

  it('should allow several instances side by side', () => {
    expect(() => new EmbeddingCacheMetrics()).not.toThrow();
  });
});
