/**
 * Embedding Cache Factory
 *
 * Wires configuration into a ready-to-use TieredEmbeddingCache:
 * the configured backend becomes the primary tier, the other the secondary.
 */

import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { Config } from './config.js';
import type { EmbeddingRedisClient } from './infrastructure/backends/RedisEmbeddingBackend.js';
import { RedisEmbeddingBackend } from './infrastructure/backends/RedisEmbeddingBackend.js';
import { SqliteEmbeddingBackend } from './infrastructure/backends/SqliteEmbeddingBackend.js';
import type { BackendGuardConfig, IEmbeddingBackend } from './infrastructure/backends/types.js';
import type { EmbeddingCacheMetrics } from './infrastructure/cache/CacheMetrics.js';
import { TieredEmbeddingCache } from './infrastructure/cache/TieredEmbeddingCache.js';

export interface CreateEmbeddingCacheOptions {
  /** Use this client instead of building an ioredis connection from config */
  redisClient?: EmbeddingRedisClient;
  metrics?: EmbeddingCacheMetrics;
}

/**
 * Build an ioredis client that connects on first use and gives up quickly,
 * leaving failover to the tiered cache.
 */
export function createRedisClient(config: Config, logger: Logger): Redis {
  const log = logger.child({ component: 'RedisClient' });
  const client = new Redis(config.redis.url, {
    lazyConnect: true,
    connectTimeout: config.redis.connectTimeoutMs,
    maxRetriesPerRequest: 1,
    retryStrategy: (times: number) => {
      // Keep retrying in the background; the tiered cache re-probes on its own schedule
      const delay = Math.min(times * 1000, 10_000);
      log.debug({ attempt: times, delay }, 'Retrying Redis connection');
      return delay;
    },
  });

  client.on('ready', () => {
    log.info('Redis client ready');
  });

  client.on('error', (error: Error) => {
    log.warn({ error: error.message }, 'Redis client error');
  });

  return client;
}

/**
 * Build the backends in configured order, connect them and select the active tier
 */
export async function createEmbeddingCache(
  config: Config,
  logger: Logger,
  options: CreateEmbeddingCacheOptions = {}
): Promise<TieredEmbeddingCache> {
  const guard: BackendGuardConfig = {
    timeoutMs: config.cache.operationTimeoutMs,
    errorThresholdPercentage: config.cache.breakerErrorThreshold,
    resetTimeoutMs: config.cache.breakerResetMs,
    volumeThreshold: 5,
  };

  const redis = new RedisEmbeddingBackend(
    options.redisClient ?? createRedisClient(config, logger),
    logger,
    { keyPrefix: config.redis.keyPrefix, guard }
  );
  const sqlite = new SqliteEmbeddingBackend(logger, {
    path: config.sqlite.path,
    busyTimeoutMs: config.sqlite.busyTimeoutMs,
    guard,
  });

  const [primary, secondary]: [IEmbeddingBackend, IEmbeddingBackend] =
    config.cache.backend === 'redis' ? [redis, sqlite] : [sqlite, redis];

  const cache = new TieredEmbeddingCache(
    { primary, secondary },
    logger,
    {
      configuredBackend: config.cache.backend,
      defaultTtlSeconds: config.cache.defaultTtlSeconds,
      reprobeIntervalMs: config.cache.reprobeIntervalMs,
      reprobeSuccessThreshold: config.cache.reprobeSuccessThreshold,
      volatile: { maxEntries: config.cache.volatileMaxEntries },
    },
    options.metrics ?? null
  );

  await cache.initialize();
  return cache;
}
