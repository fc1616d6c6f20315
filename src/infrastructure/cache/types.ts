/**
 * Tiered Cache Types
 */

import type { BackendLabel, CacheTier, DurableBackendLabel } from '../../types.js';

/**
 * Configuration for the volatile fallback store
 */
export interface VolatileStoreConfig {
  /** Maximum entries before LRU eviction (default: 10000) */
  maxEntries: number;
}

/**
 * Configuration for the tiered cache
 */
export interface TieredCacheConfig {
  /** Backend the operator asked for; reported by getCacheInfo */
  configuredBackend: DurableBackendLabel;
  /** TTL applied when setEmbedding gets none (default: 30 days) */
  defaultTtlSeconds: number;
  /** Re-probe demoted backends this often; 0 disables re-promotion (default: 60000) */
  reprobeIntervalMs: number;
  /** Consecutive successful probes before a backend is promoted back (default: 3) */
  reprobeSuccessThreshold: number;
  volatile: VolatileStoreConfig;
}

export const DEFAULT_VOLATILE_CONFIG: VolatileStoreConfig = {
  maxEntries: 10_000,
};

export const DEFAULT_TIERED_CACHE_CONFIG: TieredCacheConfig = {
  configuredBackend: 'redis',
  defaultTtlSeconds: 2_592_000, // 30 days
  reprobeIntervalMs: 60_000,
  reprobeSuccessThreshold: 3,
  volatile: DEFAULT_VOLATILE_CONFIG,
};

/**
 * Health of one durable backend as last observed
 */
export interface BackendStatus {
  label: DurableBackendLabel;
  tier: Exclude<CacheTier, 'volatile'>;
  healthy: boolean;
  active: boolean;
}

/**
 * Diagnostic snapshot; not a consistency guarantee
 */
export interface CacheInfo {
  configuredBackend: DurableBackendLabel;
  activeBackend: BackendLabel;
  activeTier: CacheTier;
  status: 'connected' | 'fallback_only';
  volatileEntries: number;
  backends: BackendStatus[];
}

/** Why the active tier changed */
export type TierTransitionReason = 'startup' | 'failure' | 'unhealthy' | 'promotion';

export type CacheOperation = 'get' | 'set' | 'delete' | 'exists' | 'sweep';
