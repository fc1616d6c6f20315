/**
 * Tiered Embedding Cache
 *
 * Stores one speaker embedding per user across a chain of stores:
 *
 *   primary (configured backend) -> secondary (the other durable backend) -> volatile
 *
 * Read path:  active durable backend -> volatile
 * Write path: active durable backend, or volatile when no durable write succeeds
 *
 * Degradation:
 * - initialize() connects the primary, then the secondary, and falls back to
 *   volatile-only when neither answers
 * - an unreachable or timed-out call demotes the active backend and is retried
 *   on the next tier; the caller never sees the failure
 * - a command the backend refuses is served from the volatile store for that
 *   call only
 * - demoted backends are re-probed on an interval and promoted back after a
 *   run of consecutive successful probes
 *
 * Entries written to a lower tier during an outage are not migrated on promotion.
 */

import type { Logger } from 'pino';
import { EmbeddingNotFoundError, InvalidArgumentError } from '../../errors.js';
import type { BackendLabel, CacheTier, Embedding } from '../../types.js';
import type { BackendFailure, BackendResult, IEmbeddingBackend } from '../backends/types.js';
import { ok } from '../backends/types.js';
import type { EmbeddingCacheMetrics } from './CacheMetrics.js';
import type {
  CacheInfo,
  CacheOperation,
  TieredCacheConfig,
  TierTransitionReason,
} from './types.js';
import { DEFAULT_TIERED_CACHE_CONFIG } from './types.js';
import { VolatileEmbeddingStore } from './VolatileEmbeddingStore.js';

/**
 * Durable backends in preference order
 */
export interface TieredCacheBackends {
  primary: IEmbeddingBackend;
  secondary?: IEmbeddingBackend;
}

type DurableOutcome<T> =
  | { status: 'ok'; value: T; backend: IEmbeddingBackend }
  | { status: 'corrupt' | 'rejected'; backend: IEmbeddingBackend }
  | { status: 'unavailable' };

const DURABLE_TIERS = ['primary', 'secondary'] as const;

export class TieredEmbeddingCache {
  private readonly log: Logger;
  private readonly config: TieredCacheConfig;
  private readonly chain: IEmbeddingBackend[];
  private readonly volatile: VolatileEmbeddingStore;

  /** Index into chain of the active durable backend; null = volatile-only */
  private activeIndex: number | null = null;

  /** Backends that have had at least one connect attempt */
  private readonly attempted = new Set<IEmbeddingBackend>();
  private readonly connecting = new Map<IEmbeddingBackend, Promise<boolean>>();
  private readonly probeSuccesses = new Map<IEmbeddingBackend, number>();

  private reprobeTimer: ReturnType<typeof setInterval> | null = null;
  private reprobing = false;

  constructor(
    backends: TieredCacheBackends,
    logger: Logger,
    config: Partial<TieredCacheConfig> = {},
    private readonly metrics: EmbeddingCacheMetrics | null = null
  ) {
    this.log = logger.child({ component: 'TieredEmbeddingCache' });
    this.config = {
      ...DEFAULT_TIERED_CACHE_CONFIG,
      ...config,
      volatile: { ...DEFAULT_TIERED_CACHE_CONFIG.volatile, ...config.volatile },
    };
    this.chain = backends.secondary ? [backends.primary, backends.secondary] : [backends.primary];
    this.volatile = new VolatileEmbeddingStore(logger, this.config.volatile);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Select the initial tier and start re-probing.
   */
  async initialize(): Promise<CacheTier> {
    for (let index = 0; index < this.chain.length; index++) {
      const backend = this.chain[index];
      if (backend && (await this.connectBackend(backend))) {
        this.activate(index, 'startup');
        break;
      }
      this.log.warn({ backend: backend?.label }, 'Backend unavailable at startup, trying next tier');
    }

    if (this.activeIndex === null) {
      this.log.error('All durable backends failed, using volatile in-memory cache');
      this.metrics?.recordTierTransition('primary', 'volatile', 'startup');
    }

    this.startReprobe();
    return this.getActiveTier();
  }

  /**
   * Stop timers, close backends and drop volatile entries.
   */
  async close(): Promise<void> {
    if (this.reprobeTimer) {
      clearInterval(this.reprobeTimer);
      this.reprobeTimer = null;
    }
    for (const backend of this.chain) {
      await backend.close();
    }
    this.activeIndex = null;
    this.volatile.clear();
    this.metrics?.setVolatileEntries(0);
    this.log.info('Tiered embedding cache closed');
  }

  // ---------------------------------------------------------------------------
  // Public operations
  // ---------------------------------------------------------------------------

  /**
   * Store an embedding. Never fails because of a backend: when no durable
   * write succeeds the embedding is kept in the volatile store.
   */
  async setEmbedding(
    userKey: string,
    embedding: Embedding,
    ttlSeconds: number = this.config.defaultTtlSeconds
  ): Promise<boolean> {
    this.assertKey(userKey);
    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
      throw new InvalidArgumentError(`TTL must be a positive number of seconds, got ${ttlSeconds}`, {
        ttlSeconds,
      });
    }

    const outcome = await this.runDurable('set', (backend) =>
      backend.set(userKey, embedding, ttlSeconds)
    );

    if (outcome.status === 'ok') {
      // An older fallback copy must not be served after this write
      this.volatile.delete(userKey);
      this.updateVolatileGauge();
      this.metrics?.recordOperation('set', outcome.backend.label, 'stored');
      this.log.debug({ userKey, backend: outcome.backend.label, ttlSeconds }, 'Embedding stored');
      return true;
    }

    this.volatile.set(userKey, embedding, ttlSeconds);
    this.updateVolatileGauge();
    this.metrics?.recordOperation('set', 'volatile', 'stored');
    this.log.debug({ userKey, ttlSeconds }, 'Embedding stored in volatile fallback');
    return true;
  }

  /**
   * Fetch an embedding: durable first, then the volatile store.
   */
  async getEmbedding(userKey: string): Promise<Embedding | null> {
    this.assertKey(userKey);

    const outcome = await this.runDurable('get', (backend) => backend.get(userKey));
    if (outcome.status === 'ok' && outcome.value !== null) {
      this.metrics?.recordOperation('get', outcome.backend.label, 'hit');
      return outcome.value;
    }

    const fallback = this.volatile.get(userKey);
    if (fallback !== null) {
      this.metrics?.recordOperation('get', 'volatile', 'hit');
      return fallback;
    }

    this.metrics?.recordOperation('get', this.getActiveBackendLabel(), 'miss');
    return null;
  }

  /**
   * Delete from the durable backend and the volatile store.
   * True if either held a live entry.
   */
  async deleteEmbedding(userKey: string): Promise<boolean> {
    this.assertKey(userKey);

    const outcome = await this.runDurable('delete', (backend) => backend.delete(userKey));
    const durableDeleted = outcome.status === 'ok' && outcome.value;
    const volatileDeleted = this.volatile.delete(userKey);
    this.updateVolatileGauge();

    const deleted = durableDeleted || volatileDeleted;
    this.metrics?.recordOperation('delete', this.getActiveBackendLabel(), deleted ? 'deleted' : 'absent');
    this.log.debug({ userKey, durableDeleted, volatileDeleted }, 'Embedding delete');
    return deleted;
  }

  async existsEmbedding(userKey: string): Promise<boolean> {
    this.assertKey(userKey);

    const outcome = await this.runDurable('exists', (backend) => backend.exists(userKey));
    if (outcome.status === 'ok' && outcome.value) {
      return true;
    }
    return this.volatile.has(userKey);
  }

  /**
   * Eagerly remove expired entries from the active durable backend and the
   * volatile store. Returns the number removed.
   */
  async cleanupExpired(): Promise<number> {
    let removed = 0;

    // Stores with native expiry have nothing to sweep
    const outcome = await this.runDurable('sweep', async (backend) =>
      backend.nativeExpiry ? ok(0) : backend.sweepExpired()
    );
    if (outcome.status === 'ok') {
      removed += outcome.value;
      this.metrics?.recordExpiredRemoved(outcome.backend.label, outcome.value);
    }

    const volatileRemoved = this.volatile.sweepExpired();
    this.metrics?.recordExpiredRemoved('volatile', volatileRemoved);
    this.updateVolatileGauge();
    removed += volatileRemoved;

    this.log.info({ removed, volatileRemoved }, 'Expired embeddings cleaned up');
    return removed;
  }

  /**
   * Fetch an embedding for a caller that cannot proceed without one.
   *
   * @throws EmbeddingNotFoundError when nothing is cached for the user
   */
  async getCachedEmbeddingOrFail(userKey: string): Promise<Embedding> {
    const embedding = await this.getEmbedding(userKey);
    if (embedding === null) {
      throw new EmbeddingNotFoundError(userKey);
    }
    return embedding;
  }

  getCacheInfo(): CacheInfo {
    const activeBackend = this.getActiveBackendLabel();
    return {
      configuredBackend: this.config.configuredBackend,
      activeBackend,
      activeTier: this.getActiveTier(),
      status: activeBackend === 'volatile' ? 'fallback_only' : 'connected',
      volatileEntries: this.volatile.size,
      backends: this.chain.map((backend, index) => ({
        label: backend.label,
        tier: DURABLE_TIERS[index] ?? 'secondary',
        healthy: backend.isHealthy(),
        active: index === this.activeIndex,
      })),
    };
  }

  getActiveTier(): CacheTier {
    if (this.activeIndex === null) return 'volatile';
    return DURABLE_TIERS[this.activeIndex] ?? 'secondary';
  }

  getActiveBackendLabel(): BackendLabel {
    return this.activeBackend()?.label ?? 'volatile';
  }

  // ---------------------------------------------------------------------------
  // Re-promotion
  // ---------------------------------------------------------------------------

  /**
   * Probe every backend ranked above the active one. A backend that answers
   * reprobeSuccessThreshold probes in a row becomes active again.
   */
  async reprobe(): Promise<CacheTier> {
    if (this.reprobing) return this.getActiveTier();
    this.reprobing = true;

    try {
      const limit = this.activeIndex ?? this.chain.length;
      for (let index = 0; index < limit; index++) {
        const backend = this.chain[index];
        if (!backend) continue;

        const healthy = await this.connectBackend(backend);
        const successes = healthy ? (this.probeSuccesses.get(backend) ?? 0) + 1 : 0;
        this.probeSuccesses.set(backend, successes);
        this.log.debug({ backend: backend.label, healthy, successes }, 'Backend re-probed');

        if (successes >= this.config.reprobeSuccessThreshold && this.activeIndex !== index) {
          this.activate(index, 'promotion');
          break;
        }
      }
    } finally {
      this.reprobing = false;
    }

    return this.getActiveTier();
  }

  private startReprobe(): void {
    if (this.config.reprobeIntervalMs <= 0 || this.reprobeTimer) return;

    this.reprobeTimer = setInterval(() => {
      this.reprobe().catch((error: unknown) => {
        this.log.error({ error }, 'Backend re-probe failed');
      });
    }, this.config.reprobeIntervalMs);

    // Don't block process exit
    this.reprobeTimer.unref();
  }

  // ---------------------------------------------------------------------------
  // Tier selection
  // ---------------------------------------------------------------------------

  private activeBackend(): IEmbeddingBackend | null {
    return this.activeIndex === null ? null : (this.chain[this.activeIndex] ?? null);
  }

  /**
   * Run an operation on the active durable backend, demoting and retrying on
   * the next tier whenever the backend is unreachable or times out. Corrupt
   * and refused results leave the tier in place.
   */
  private async runDurable<T>(
    operation: CacheOperation,
    run: (backend: IEmbeddingBackend) => Promise<BackendResult<T>>
  ): Promise<DurableOutcome<T>> {
    let backend = this.activeBackend();

    while (backend) {
      if (!backend.isHealthy()) {
        await this.demote(backend, 'unhealthy');
        backend = this.activeBackend();
        continue;
      }

      const result = await run(backend);
      if (result.ok) {
        return { status: 'ok', value: result.value, backend };
      }

      this.metrics?.recordBackendFailure(backend.label, result.error.kind);
      if (result.error.kind === 'corrupt') {
        this.log.error(
          { operation, backend: backend.label, error: result.error.message },
          'Corrupt embedding evicted, treating as absent'
        );
        return { status: 'corrupt', backend };
      }
      if (result.error.kind === 'rejected') {
        // The backend is up; only this command failed
        this.log.warn(
          { operation, backend: backend.label, error: result.error.message },
          'Durable backend refused command, using volatile fallback'
        );
        return { status: 'rejected', backend };
      }

      await this.demote(backend, 'failure', result.error);
      backend = this.activeBackend();
    }

    return { status: 'unavailable' };
  }

  /**
   * Move the active tier past a failed backend. Later backends are connected
   * on first use; concurrent demotions of the same backend are no-ops.
   */
  private async demote(
    failed: IEmbeddingBackend,
    reason: TierTransitionReason,
    failure?: BackendFailure
  ): Promise<void> {
    const failedIndex = this.chain.indexOf(failed);
    this.probeSuccesses.set(failed, 0);

    for (let index = failedIndex + 1; index < this.chain.length; index++) {
      const candidate = this.chain[index];
      if (!candidate) continue;

      const healthy = this.attempted.has(candidate) && candidate.isHealthy()
        ? true
        : await this.connectBackend(candidate);

      // Another caller may have moved the tier while we were connecting
      if (this.activeIndex !== failedIndex) return;

      if (healthy) {
        this.log.warn(
          { from: failed.label, to: candidate.label, reason, error: failure?.message },
          'Durable backend failed, switched to alternative'
        );
        this.activate(index, reason);
        return;
      }
    }

    if (this.activeIndex !== failedIndex) return;

    const from = this.getActiveTier();
    this.activeIndex = null;
    this.metrics?.recordTierTransition(from, 'volatile', reason);
    this.log.error(
      { from: failed.label, reason, error: failure?.message },
      'All durable backends failed, using volatile in-memory cache'
    );
  }

  private activate(index: number, reason: TierTransitionReason): void {
    const from = this.getActiveTier();
    this.activeIndex = index;
    const to = this.getActiveTier();
    this.probeSuccesses.clear();
    this.metrics?.recordTierTransition(from, to, reason);
    this.log.info({ backend: this.chain[index]?.label, tier: to, reason }, 'Active cache tier selected');
  }

  /**
   * Connect a backend, sharing one in-flight attempt between callers
   */
  private connectBackend(backend: IEmbeddingBackend): Promise<boolean> {
    const pending = this.connecting.get(backend);
    if (pending) return pending;

    this.attempted.add(backend);
    const attempt = backend.connect().finally(() => {
      this.connecting.delete(backend);
    });
    this.connecting.set(backend, attempt);
    return attempt;
  }

  private assertKey(userKey: string): void {
    if (userKey.trim().length === 0) {
      throw new InvalidArgumentError('User key must be a non-empty string');
    }
  }

  private updateVolatileGauge(): void {
    this.metrics?.setVolatileEntries(this.volatile.size);
  }
}
