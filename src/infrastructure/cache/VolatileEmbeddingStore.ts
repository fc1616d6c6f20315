/**
 * Volatile Embedding Store
 *
 * Process-local fallback used when no durable backend can take a write.
 * Entries carry the same TTL as durable entries and the map is bounded: a full
 * map drops its expired entries first and evicts the least recently used live
 * entry only when none have expired. Contents are lost on restart.
 *
 * Every method is synchronous: on the single Node.js event loop each call runs
 * to completion before another caller can touch the map, which is the only
 * mutual exclusion the map needs. Never add an await inside these methods.
 */

import type { Logger } from 'pino';
import type { Embedding } from '../../types.js';
import { cloneEmbedding } from '../../types.js';
import type { VolatileStoreConfig } from './types.js';
import { DEFAULT_VOLATILE_CONFIG } from './types.js';

interface VolatileEntry {
  embedding: Embedding;
  expiresAt: number;
}

export class VolatileEmbeddingStore {
  private readonly entries: Map<string, VolatileEntry> = new Map();
  private readonly log: Logger;
  private readonly config: VolatileStoreConfig;

  constructor(logger: Logger, config: Partial<VolatileStoreConfig> = {}) {
    this.log = logger.child({ component: 'VolatileEmbeddingStore' });
    this.config = { ...DEFAULT_VOLATILE_CONFIG, ...config };
  }

  set(key: string, embedding: Embedding, ttlSeconds: number): void {
    if (this.entries.size >= this.config.maxEntries && !this.entries.has(key)) {
      if (this.sweepExpired() === 0) {
        this.evictOldest();
      }
    }

    // Re-insert so the key moves to the most recently used position
    this.entries.delete(key);
    this.entries.set(key, {
      embedding: cloneEmbedding(embedding),
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  get(key: string): Embedding | null {
    const entry = this.live(key);
    if (!entry) return null;

    this.entries.delete(key);
    this.entries.set(key, entry);
    return cloneEmbedding(entry.embedding);
  }

  has(key: string): boolean {
    return this.live(key) !== null;
  }

  /**
   * Remove a key; true iff a live entry was removed
   */
  delete(key: string): boolean {
    const live = this.live(key) !== null;
    this.entries.delete(key);
    return live;
  }

  /**
   * Remove expired entries, returning how many were removed
   */
  sweepExpired(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (entry.expiresAt < now) {
        this.entries.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      this.log.debug({ removed }, 'Expired volatile entries swept');
    }
    return removed;
  }

  /**
   * Number of entries held, expired ones included until they are swept
   */
  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    const size = this.entries.size;
    this.entries.clear();
    if (size > 0) {
      this.log.info({ entriesCleared: size }, 'Volatile store cleared');
    }
  }

  private live(key: string): VolatileEntry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAt < Date.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next().value;
    if (oldest !== undefined) {
      this.entries.delete(oldest);
      this.log.warn({ key: oldest, maxEntries: this.config.maxEntries }, 'Volatile store full, evicted LRU entry');
    }
  }
}
