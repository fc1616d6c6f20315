/**
 * voice-cache CLI Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RedisEmbeddingBackend } from '../../src/infrastructure/backends/RedisEmbeddingBackend.js';
import { SqliteEmbeddingBackend } from '../../src/infrastructure/backends/SqliteEmbeddingBackend.js';
import { TieredEmbeddingCache } from '../../src/infrastructure/cache/TieredEmbeddingCache.js';
import { createProgram } from '../../src/cli/commands.js';
import { FakeRedis } from '../helpers/FakeRedis.js';
import { createMockLogger } from '../helpers/mockLogger.js';

describe('voice-cache CLI', () => {
  let lines: string[];
  let opened: TieredEmbeddingCache[];

  /** Fresh cache per command: sqlite primary holding one embedding for u1, redis down */
  async function openCache(): Promise<TieredEmbeddingCache> {
    const logger = createMockLogger();
    const redis = new FakeRedis();
    redis.down = true;
    const cache = new TieredEmbeddingCache(
      {
        primary: new SqliteEmbeddingBackend(logger),
        secondary: new RedisEmbeddingBackend(redis, logger),
      },
      logger,
      { configuredBackend: 'sqlite', reprobeIntervalMs: 0 }
    );
    await cache.initialize();
    await cache.setEmbedding('u1', [0.1, 0.2]);
    opened.push(cache);
    return cache;
  }

  async function run(...args: string[]): Promise<void> {
    const program = createProgram({ openCache, write: (line) => lines.push(line) });
    await program.parseAsync(args, { from: 'user' });
  }

  beforeEach(() => {
    lines = [];
    opened = [];
  });

  describe('--json', () => {
    it('should print cache info', async () => {
      await run('--json', 'info');

      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? '')).toEqual({
        configuredBackend: 'sqlite',
        activeBackend: 'sqlite',
        activeTier: 'primary',
        status: 'connected',
        volatileEntries: 0,
        backends: [
          { label: 'sqlite', tier: 'primary', healthy: true, active: true },
          { label: 'redis', tier: 'secondary', healthy: false, active: false },
        ],
      });
    });

    it('should print the status of a user', async () => {
      await run('--json', 'status', 'u1');

      expect(lines).toEqual(['{"userKey":"u1","exists":true,"activeBackend":"sqlite"}']);
    });

    it('should print whether a user was cleared', async () => {
      await run('--json', 'clear', 'u1');
      await run('--json', 'clear', 'nobody');

      expect(lines).toEqual([
        '{"userKey":"u1","deleted":true}',
        '{"userKey":"nobody","deleted":false}',
      ]);
    });

    it('should print the cleanup count', async () => {
      await run('--json', 'cleanup');

      expect(lines).toEqual(['{"removedCount":0}']);
    });
  });

  describe('text output', () => {
    it('should describe an uncached user', async () => {
      await run('--no-color', 'status', 'nobody');

      expect(lines).toEqual(['not cached nobody (sqlite)']);
    });

    it('should report the cleanup count', async () => {
      await run('--no-color', 'cleanup');

      expect(lines).toEqual(['Removed 0 expired cache entries']);
    });

    it('should list backends in info', async () => {
      await run('--no-color', 'info');

      expect(lines).toEqual([
        'Speaker embedding cache',
        'Configured backend: sqlite',
        'Active backend:     sqlite (primary)',
        'Status:             connected',
        'Volatile entries:   0',
        '  primary   sqlite  healthy *',
        '  secondary redis   unreachable',
      ]);
    });
  });

  it('should close the cache after every command', async () => {
    await run('--json', 'info');

    expect(opened).toHaveLength(1);
    expect(opened[0]?.getCacheInfo().backends.map((b) => b.healthy)).toEqual([false, false]);
  });

  it('should close the cache when a command fails', async () => {
    const program = createProgram({
      openCache: async () => {
        const cache = await openCache();
        vi.spyOn(cache, 'existsEmbedding').mockRejectedValue(new Error('boom'));
        vi.spyOn(cache, 'close');
        return cache;
      },
      write: (line) => lines.push(line),
    });

    await expect(program.parseAsync(['status', 'u1'], { from: 'user' })).rejects.toThrow('boom');

    expect(opened[0]?.close).toHaveBeenCalledTimes(1);
    expect(lines).toEqual([]);
  });
});
