/**
 * Redis Embedding Backend
 *
 * One key per user holding the encoded embedding. SET ... PX is an atomic
 * upsert that also arms Redis' native expiry, so expired entries disappear
 * on their own and sweepExpired has nothing to do.
 *
 * Uses the EmbeddingRedisClient interface so tests can supply an in-process
 * stand-in; an ioredis client satisfies it directly.
 */

import type { Logger } from 'pino';
import type { Embedding } from '../../types.js';
import { decodeEmbedding, encodeEmbedding } from '../codec/EmbeddingCodec.js';
import { BackendGuard } from './BackendGuard.js';
import type { BackendGuardConfig, BackendResult, IEmbeddingBackend } from './types.js';
import { fail, isOutage, ok } from './types.js';

// =============================================================================
// Redis Client Interface
// =============================================================================

/**
 * Minimal Redis client surface used by the backend.
 * Compatible with ioredis.
 */
export interface EmbeddingRedisClient {
  ping(): Promise<string>;
  getBuffer(key: string): Promise<Buffer | null>;
  set(key: string, value: Buffer, mode: 'PX', milliseconds: number): Promise<string | null>;
  del(key: string): Promise<number>;
  exists(key: string): Promise<number>;
  quit(): Promise<string>;
  disconnect(): void;
}

export interface RedisEmbeddingBackendConfig {
  /** Key prefix (default: 'speaker_embedding:') */
  keyPrefix: string;
  guard: Partial<BackendGuardConfig>;
}

// =============================================================================
// Implementation
// =============================================================================

export class RedisEmbeddingBackend implements IEmbeddingBackend {
  readonly label = 'redis' as const;
  readonly nativeExpiry = true;

  private readonly log: Logger;
  private readonly guard: BackendGuard;
  private readonly keyPrefix: string;
  private healthy = false;

  constructor(
    private readonly client: EmbeddingRedisClient,
    logger: Logger,
    config: Partial<RedisEmbeddingBackendConfig> = {}
  ) {
    this.log = logger.child({ component: 'RedisEmbeddingBackend' });
    this.keyPrefix = config.keyPrefix ?? 'speaker_embedding:';
    this.guard = new BackendGuard(this.label, logger, config.guard);
  }

  private buildKey(userKey: string): string {
    return `${this.keyPrefix}${userKey}`;
  }

  async connect(): Promise<boolean> {
    const result = await this.guard.run('ping', () => this.client.ping());
    this.healthy = result.ok;

    if (result.ok) {
      this.log.info('Connected to Redis');
    } else {
      this.log.warn({ error: result.error.message }, 'Failed to connect to Redis');
    }
    return this.healthy;
  }

  isHealthy(): boolean {
    return this.healthy;
  }

  async set(key: string, embedding: Embedding, ttlSeconds: number): Promise<BackendResult<void>> {
    const payload = encodeEmbedding(embedding);
    const result = await this.guard.run('set', async () => {
      // PX takes whole milliseconds
      await this.client.set(this.buildKey(key), payload, 'PX', Math.ceil(ttlSeconds * 1000));
    });
    return this.track(result);
  }

  async get(key: string): Promise<BackendResult<Embedding | null>> {
    const redisKey = this.buildKey(key);
    const result = this.track(await this.guard.run('get', () => this.client.getBuffer(redisKey)));
    if (!result.ok) return result;
    if (result.value === null) return ok(null);

    try {
      return ok(decodeEmbedding(result.value));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error({ key, error: message }, 'Corrupt embedding in Redis, evicting');
      await this.guard.run('evict', () => this.client.del(redisKey));
      return fail({ kind: 'corrupt', backend: this.label, message, cause: error });
    }
  }

  async delete(key: string): Promise<BackendResult<boolean>> {
    const result = this.track(await this.guard.run('delete', () => this.client.del(this.buildKey(key))));
    return result.ok ? ok(result.value > 0) : result;
  }

  async exists(key: string): Promise<BackendResult<boolean>> {
    const result = this.track(
      await this.guard.run('exists', () => this.client.exists(this.buildKey(key)))
    );
    return result.ok ? ok(result.value === 1) : result;
  }

  async sweepExpired(): Promise<BackendResult<number>> {
    // Native expiry: Redis removes expired keys itself
    return ok(0);
  }

  async close(): Promise<void> {
    this.guard.shutdown();
    const wasHealthy = this.healthy;
    this.healthy = false;

    // QUIT would sit in the offline queue of a client that never connected
    if (!wasHealthy) {
      this.client.disconnect();
      this.log.info('Redis connection dropped');
      return;
    }

    try {
      await this.client.quit();
      this.log.info('Redis connection closed');
    } catch (error) {
      this.log.warn({ error }, 'Redis quit failed, forcing disconnect');
      this.client.disconnect();
    }
  }

  /**
   * Clear last-known health when a call fails for connectivity reasons
   */
  private track<T>(result: BackendResult<T>): BackendResult<T> {
    if (!result.ok && isOutage(result.error.kind)) {
      this.healthy = false;
    }
    return result;
  }
}
