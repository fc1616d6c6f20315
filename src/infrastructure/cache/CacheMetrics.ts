/**
 * Embedding Cache Metrics
 *
 * Prometheus metrics for the tiered cache. Each instance owns its registry so
 * several caches (or test runs) can coexist; merge it into the application
 * registry to expose it:
 *
 * ```typescript
 * import { register } from 'prom-client';
 * register.merge(metrics.registry);
 * ```
 */

import { Counter, Gauge, Registry } from 'prom-client';
import type { BackendLabel, CacheTier } from '../../types.js';
import type { BackendFailureKind } from '../backends/types.js';
import type { CacheOperation, TierTransitionReason } from './types.js';

export type OperationOutcome = 'hit' | 'miss' | 'stored' | 'deleted' | 'absent';

const TIER_VALUE: Record<CacheTier, number> = {
  primary: 0,
  secondary: 1,
  volatile: 2,
};

export class EmbeddingCacheMetrics {
  readonly registry: Registry;

  private readonly operations: Counter<'operation' | 'backend' | 'outcome'>;
  private readonly backendFailures: Counter<'backend' | 'kind'>;
  private readonly tierTransitions: Counter<'from' | 'to' | 'reason'>;
  private readonly expiredRemoved: Counter<'backend'>;
  private readonly activeTier: Gauge;
  private readonly volatileEntries: Gauge;

  constructor(registry: Registry = new Registry()) {
    this.registry = registry;

    this.operations = new Counter({
      name: 'embedding_cache_operations_total',
      help: 'Cache operations by serving backend and outcome',
      labelNames: ['operation', 'backend', 'outcome'] as const,
      registers: [registry],
    });

    this.backendFailures = new Counter({
      name: 'embedding_cache_backend_failures_total',
      help: 'Durable backend failures by kind',
      labelNames: ['backend', 'kind'] as const,
      registers: [registry],
    });

    this.tierTransitions = new Counter({
      name: 'embedding_cache_tier_transitions_total',
      help: 'Changes of the active cache tier',
      labelNames: ['from', 'to', 'reason'] as const,
      registers: [registry],
    });

    this.expiredRemoved = new Counter({
      name: 'embedding_cache_expired_removed_total',
      help: 'Expired entries removed by sweeps',
      labelNames: ['backend'] as const,
      registers: [registry],
    });

    this.activeTier = new Gauge({
      name: 'embedding_cache_active_tier',
      help: 'Active tier (0 primary, 1 secondary, 2 volatile)',
      registers: [registry],
    });

    this.volatileEntries = new Gauge({
      name: 'embedding_cache_volatile_entries',
      help: 'Entries held in the volatile fallback store',
      registers: [registry],
    });
  }

  recordOperation(operation: CacheOperation, backend: BackendLabel, outcome: OperationOutcome): void {
    this.operations.inc({ operation, backend, outcome });
  }

  recordBackendFailure(backend: BackendLabel, kind: BackendFailureKind): void {
    this.backendFailures.inc({ backend, kind });
  }

  recordTierTransition(from: CacheTier, to: CacheTier, reason: TierTransitionReason): void {
    this.tierTransitions.inc({ from, to, reason });
    this.activeTier.set(TIER_VALUE[to]);
  }

  recordExpiredRemoved(backend: BackendLabel, count: number): void {
    if (count > 0) {
      this.expiredRemoved.inc({ backend }, count);
    }
  }

  setVolatileEntries(count: number): void {
    this.volatileEntries.set(count);
  }

  /**
   * Prometheus text exposition of this registry
   */
  async render(): Promise<string> {
    return this.registry.metrics();
  }
}
