/**
 * Tiered Cache Infrastructure
 *
 * Durable backend (Redis or SQLite) -> alternate durable backend -> volatile map
 */

export { TieredEmbeddingCache } from './TieredEmbeddingCache.js';
export type { TieredCacheBackends } from './TieredEmbeddingCache.js';
export { VolatileEmbeddingStore } from './VolatileEmbeddingStore.js';
export { EmbeddingCacheMetrics } from './CacheMetrics.js';
export type { OperationOutcome } from './CacheMetrics.js';
export { DEFAULT_TIERED_CACHE_CONFIG, DEFAULT_VOLATILE_CONFIG } from './types.js';
export type {
  BackendStatus,
  CacheInfo,
  CacheOperation,
  TieredCacheConfig,
  TierTransitionReason,
  VolatileStoreConfig,
} from './types.js';
