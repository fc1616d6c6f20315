/**
 * Embedding Expiry Sweep
 *
 * Periodically removes expired embeddings so stores without native expiry
 * (SQLite, the volatile map) don't grow with entries nobody reads again.
 * Reads already treat expired entries as absent; the sweep only reclaims space.
 *
 * Runs never overlap: a tick that fires while a sweep is in flight is skipped.
 *
 * @module jobs/expiry-sweep
 */

import type { Logger } from 'pino';
import type { TieredEmbeddingCache } from '../infrastructure/cache/TieredEmbeddingCache.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface ExpirySweepHandle {
  /** Run one sweep now; resolves to the number removed (0 if one was already running) */
  runOnce(): Promise<number>;
  /** Stop the interval */
  stop(): void;
}

// --------------------------------------------------------------------------
// Sweep
// --------------------------------------------------------------------------

/**
 * Start sweeping on an interval. An interval of 0 or less schedules nothing;
 * runOnce() still works.
 */
export function startExpirySweep(
  cache: Pick<TieredEmbeddingCache, 'cleanupExpired'>,
  logger: Logger,
  intervalMs: number,
): ExpirySweepHandle {
  const log = logger.child({ component: 'ExpirySweep' });
  let running = false;

  async function runOnce(): Promise<number> {
    if (running) {
      log.debug('Sweep already running, skipping');
      return 0;
    }

    running = true;
    const startedAt = Date.now();
    try {
      const removed = await cache.cleanupExpired();
      log.info({ removed, durationMs: Date.now() - startedAt }, 'Expiry sweep complete');
      return removed;
    } finally {
      running = false;
    }
  }

  let timer: ReturnType<typeof setInterval> | null = null;
  if (intervalMs > 0) {
    timer = setInterval(() => {
      runOnce().catch((error: unknown) => {
        log.error({ error }, 'Expiry sweep failed');
      });
    }, intervalMs);
    timer.unref();
    log.info({ intervalMs }, 'Expiry sweep scheduled');
  }

  return {
    runOnce,
    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
        log.info('Expiry sweep stopped');
      }
    },
  };
}
