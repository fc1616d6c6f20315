/**
 * Redis Embedding Backend Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RedisEmbeddingBackend } from '../../../src/infrastructure/backends/RedisEmbeddingBackend.js';
import { encodeEmbedding } from '../../../src/infrastructure/codec/EmbeddingCodec.js';
import { FakeRedis } from '../../helpers/FakeRedis.js';
import { createMockLogger } from '../../helpers/mockLogger.js';

describe('RedisEmbeddingBackend', () => {
  let redis: FakeRedis;
  let backend: RedisEmbeddingBackend;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    redis = new FakeRedis();
    backend = new RedisEmbeddingBackend(redis, createMockLogger(), { guard: { timeoutMs: 50 } });
    await backend.connect();
  });

  afterEach(async () => {
    await backend.close();
    vi.useRealTimers();
  });

  describe('connect', () => {
    it('should report healthy after a successful ping', () => {
      expect(backend.isHealthy()).toBe(true);
    });

    it('should report unhealthy when Redis is down', async () => {
      const down = new FakeRedis();
      down.down = true;
      const other = new RedisEmbeddingBackend(down, createMockLogger());

      expect(await other.connect()).toBe(false);
      expect(other.isHealthy()).toBe(false);
      await other.close();
    });
  });

  describe('set / get', () => {
    it('should store under the prefixed key with a millisecond TTL', async () => {
      const result = await backend.set('u1', new Float32Array([1, 2]), 60);

      expect(result.ok).toBe(true);
      const stored = redis.store.get('speaker_embedding:u1');
      expect(stored?.expiresAt).toBe(Date.now() + 60_000);
    });

    it('should round a fractional TTL up to whole milliseconds', async () => {
      const result = await backend.set('u1', [1], 1.001);

      expect(result.ok).toBe(true);
      expect(redis.pxSent).toEqual([1001]);
      expect(redis.store.get('speaker_embedding:u1')?.expiresAt).toBe(Date.now() + 1001);
    });

    it('should report an error reply as rejected and stay healthy', async () => {
      redis.wrongType.add('speaker_embedding:list');

      const result = await backend.get('list');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('rejected');
        expect(result.error.message).toBe(
          'WRONGTYPE Operation against a key holding the wrong kind of value'
        );
      }
      expect(backend.isHealthy()).toBe(true);
    });

    it('should round-trip the embedding', async () => {
      await backend.set('u1', new Float64Array([0.25, -0.5]), 60);

      const result = await backend.get('u1');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toBeInstanceOf(Float64Array);
        expect(Array.from(result.value ?? [])).toEqual([0.25, -0.5]);
      }
    });

    it('should honour a custom key prefix', async () => {
      const prefixed = new RedisEmbeddingBackend(redis, createMockLogger(), { keyPrefix: 'tts:' });
      await prefixed.connect();

      await prefixed.set('u9', [1], 60);

      expect(redis.store.has('tts:u9')).toBe(true);
      await prefixed.close();
    });

    it('should return null for a missing key', async () => {
      expect(await backend.get('nobody')).toEqual({ ok: true, value: null });
    });

    it('should return null once the TTL has passed', async () => {
      await backend.set('u1', [1], 10);

      vi.setSystemTime(Date.now() + 10_001);

      expect(await backend.get('u1')).toEqual({ ok: true, value: null });
    });

    it('should evict a corrupt payload and report it', async () => {
      redis.putRaw('speaker_embedding:bad', Buffer.from('garbage bytes'));

      const result = await backend.get('bad');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('corrupt');
        expect(result.error.message).toBe('Corrupt embedding payload: bad magic');
      }
      expect(redis.store.has('speaker_embedding:bad')).toBe(false);
      expect(backend.isHealthy()).toBe(true);
    });
  });

  describe('delete / exists', () => {
    it('should report whether a live entry was deleted', async () => {
      await backend.set('u1', [1], 60);

      expect(await backend.delete('u1')).toEqual({ ok: true, value: true });
      expect(await backend.delete('u1')).toEqual({ ok: true, value: false });
    });

    it('should check existence', async () => {
      redis.putRaw('speaker_embedding:u1', encodeEmbedding([1]));

      expect(await backend.exists('u1')).toEqual({ ok: true, value: true });
      expect(await backend.exists('u2')).toEqual({ ok: true, value: false });
    });
  });

  describe('failures', () => {
    it('should mark itself unhealthy when a command fails', async () => {
      redis.down = true;

      const result = await backend.set('u1', [1], 60);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('unreachable');
        expect(result.error.backend).toBe('redis');
      }
      expect(backend.isHealthy()).toBe(false);
    });

    it('should report a timeout when Redis stops answering', async () => {
      redis.hang = true;

      const result = await backend.get('u1');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('timeout');
      }
      expect(backend.isHealthy()).toBe(false);
      redis.hang = false;
    });
  });

  it('should have nothing to sweep', async () => {
    expect(await backend.sweepExpired()).toEqual({ ok: true, value: 0 });
  });

  it('should drop a connection that never became healthy', async () => {
    const down = new FakeRedis();
    down.down = true;
    const other = new RedisEmbeddingBackend(down, createMockLogger());
    await other.connect();

    await other.close();

    expect(down.quitCalls).toBe(0);
    expect(down.disconnectCalls).toBe(1);
  });

  it('should force a disconnect when quit fails', async () => {
    redis.down = true;

    await backend.close();

    expect(redis.quitCalls).toBe(1);
    expect(redis.disconnectCalls).toBe(1);
  });
});
