/**
 * Speaker Embedding Cache
 *
 * Tiered cache for precomputed speaker embeddings: Redis or SQLite, the other
 * one as a standby, and an in-process map when neither is reachable.
 *
 * @example
 * ```typescript
 * import { createEmbeddingCache, getConfig, logger, startExpirySweep } from 'speaker-embedding-cache';
 *
 * const config = getConfig();
 * const cache = await createEmbeddingCache(config, logger);
 * const sweep = startExpirySweep(cache, logger, config.cache.sweepIntervalMs);
 *
 * await cache.setEmbedding('user-42', embedding);
 * const stored = await cache.getCachedEmbeddingOrFail('user-42');
 * ```
 */

export { getConfig, loadConfig, resetConfig, DEFAULT_TTL_SECONDS } from './config.js';
export type { Config } from './config.js';

export {
  EmbeddingCacheError,
  EmbeddingCacheErrorCode,
  EmbeddingNotFoundError,
  CorruptPayloadError,
  InvalidArgumentError,
  isEmbeddingCacheError,
} from './errors.js';

export type { BackendLabel, CacheTier, DurableBackendLabel, Embedding } from './types.js';
export type { ISpeakerEncoder, IVoiceSampleSource } from './ports.js';

export { createLogger, logger } from './utils/logger.js';
export type { LoggerOptions } from './utils/logger.js';

export { decodeEmbedding, encodeEmbedding } from './infrastructure/codec/EmbeddingCodec.js';
export * from './infrastructure/backends/index.js';
export * from './infrastructure/cache/index.js';

export { createEmbeddingCache, createRedisClient } from './factory.js';
export type { CreateEmbeddingCacheOptions } from './factory.js';

export { VoiceCacheService } from './services/VoiceCacheService.js';
export type {
  CacheStatusResult,
  CacheVoiceResult,
  ClearCacheResult,
  CleanupResult,
} from './services/VoiceCacheService.js';

export { startExpirySweep } from './jobs/expiry-sweep.js';
export type { ExpirySweepHandle } from './jobs/expiry-sweep.js';
