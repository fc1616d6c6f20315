/**
 * Voice Cache Service
 *
 * Request-facing operations over the tiered cache: compute and cache a user's
 * speaker embedding, report status, clear and clean up. Only requireEmbedding
 * throws; everything else answers with a result object.
 */

import type { Logger } from 'pino';
import type { TieredEmbeddingCache } from '../infrastructure/cache/TieredEmbeddingCache.js';
import type { ISpeakerEncoder, IVoiceSampleSource } from '../ports.js';
import type { BackendLabel, Embedding } from '../types.js';

export interface CacheVoiceResult {
  success: boolean;
  activeBackend: BackendLabel;
  message: string;
}

export interface CacheStatusResult {
  userKey: string;
  exists: boolean;
  activeBackend: BackendLabel;
  volatileEntries: number;
  message: string;
}

export interface ClearCacheResult {
  deleted: boolean;
  message: string;
}

export interface CleanupResult {
  removedCount: number;
  message: string;
}

export class VoiceCacheService {
  private readonly log: Logger;

  constructor(
    private readonly cache: TieredEmbeddingCache,
    private readonly samples: IVoiceSampleSource,
    private readonly encoder: ISpeakerEncoder,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'VoiceCacheService' });
  }

  /**
   * Compute the user's speaker embedding from their voice sample and cache it
   */
  async cacheUserVoice(userKey: string, ttlSeconds?: number): Promise<CacheVoiceResult> {
    let samplePath: string | null;
    try {
      samplePath = await this.samples.getVoiceSamplePath(userKey);
    } catch (error) {
      this.log.error({ userKey, error }, 'Voice sample lookup failed');
      return {
        success: false,
        activeBackend: this.cache.getActiveBackendLabel(),
        message: `Failed to look up voice sample for user ${userKey}`,
      };
    }

    if (samplePath === null) {
      this.log.warn({ userKey }, 'No voice sample for user');
      return {
        success: false,
        activeBackend: this.cache.getActiveBackendLabel(),
        message: `No voice sample found for user ${userKey}`,
      };
    }

    let embedding: Embedding;
    try {
      embedding = await this.encoder.computeEmbedding(samplePath);
    } catch (error) {
      this.log.error({ userKey, error }, 'Speaker embedding computation failed');
      return {
        success: false,
        activeBackend: this.cache.getActiveBackendLabel(),
        message: `Failed to compute speaker embedding for user ${userKey}`,
      };
    }

    await this.cache.setEmbedding(userKey, embedding, ttlSeconds);
    const activeBackend = this.cache.getActiveBackendLabel();
    this.log.info({ userKey, activeBackend }, 'User voice cached');

    return {
      success: true,
      activeBackend,
      message: `Voice embedding cached for user ${userKey} using ${activeBackend}`,
    };
  }

  async getCacheStatus(userKey: string): Promise<CacheStatusResult> {
    const exists = await this.cache.existsEmbedding(userKey);
    const info = this.cache.getCacheInfo();

    return {
      userKey,
      exists,
      activeBackend: info.activeBackend,
      volatileEntries: info.volatileEntries,
      message: exists
        ? `Voice embedding cached for user ${userKey}`
        : `No cached voice embedding for user ${userKey}`,
    };
  }

  async clearUserCache(userKey: string): Promise<ClearCacheResult> {
    const deleted = await this.cache.deleteEmbedding(userKey);
    return {
      deleted,
      message: deleted
        ? `Cleared cached voice embedding for user ${userKey}`
        : `No cached voice embedding for user ${userKey}`,
    };
  }

  async cleanupExpiredCache(): Promise<CleanupResult> {
    const removedCount = await this.cache.cleanupExpired();
    return {
      removedCount,
      message: `Removed ${removedCount} expired cache entries`,
    };
  }

  /**
   * Embedding for audio generation
   *
   * @throws EmbeddingNotFoundError when the user's voice has not been cached
   */
  async requireEmbedding(userKey: string): Promise<Embedding> {
    return this.cache.getCachedEmbeddingOrFail(userKey);
  }
}
