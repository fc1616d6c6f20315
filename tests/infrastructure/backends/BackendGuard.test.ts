/**
 * Backend Guard Unit Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { BackendGuard, classifyFailure } from '../../../src/infrastructure/backends/BackendGuard.js';
import { createMockLogger } from '../../helpers/mockLogger.js';

describe('classifyFailure', () => {
  it('should classify ETIMEDOUT as timeout', () => {
    const error = Object.assign(new Error('Timed out after 10ms'), { code: 'ETIMEDOUT' });
    expect(classifyFailure(error)).toBe('timeout');
  });

  it('should classify an error reply as rejected', () => {
    const reply = new Error('ERR value is not an integer or out of range');
    reply.name = 'ReplyError';
    expect(classifyFailure(reply)).toBe('rejected');
  });

  it('should classify anything else as unreachable', () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
    expect(classifyFailure(refused)).toBe('unreachable');
    expect(classifyFailure(new Error('boom'))).toBe('unreachable');
    expect(classifyFailure('not an error')).toBe('unreachable');
  });
});

describe('BackendGuard', () => {
  let guard: BackendGuard;

  afterEach(() => {
    guard.shutdown();
  });

  it('should return the call result', async () => {
    guard = new BackendGuard('redis', createMockLogger());

    const result = await guard.run('get', async () => 42);

    expect(result).toEqual({ ok: true, value: 42 });
  });

  it('should preserve null results', async () => {
    guard = new BackendGuard('sqlite', createMockLogger());

    const result = await guard.run('get', async () => null);

    expect(result).toEqual({ ok: true, value: null });
  });

  it('should convert a thrown error into an unreachable failure', async () => {
    guard = new BackendGuard('redis', createMockLogger());
    const cause = new Error('Connection is closed.');

    const result = await guard.run('set', async () => {
      throw cause;
    });

    expect(result).toEqual({
      ok: false,
      error: { kind: 'unreachable', backend: 'redis', message: 'Connection is closed.', cause },
    });
  });

  it('should fail a call that never settles with a timeout', async () => {
    guard = new BackendGuard('redis', createMockLogger(), { timeoutMs: 20 });

    const result = await guard.run('get', () => new Promise<string>(() => undefined));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('timeout');
      expect(result.error.backend).toBe('redis');
    }
  });

  it('should open the circuit and fail fast once the error threshold is reached', async () => {
    const logger = createMockLogger();
    guard = new BackendGuard('sqlite', logger, {
      volumeThreshold: 2,
      errorThresholdPercentage: 50,
      resetTimeoutMs: 60_000,
    });
    const failing = async (): Promise<void> => {
      throw new Error('disk I/O error');
    };

    await guard.run('set', failing);
    await guard.run('set', failing);
    expect(guard.getState()).toBe('open');

    let called = false;
    const result = await guard.run('get', async () => {
      called = true;
      return 1;
    });

    expect(called).toBe(false);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('unreachable');
    }
    expect(logger.warn).toHaveBeenCalledWith('Backend circuit breaker OPEN');
  });

  it('should keep the circuit closed for refused commands', async () => {
    guard = new BackendGuard('redis', createMockLogger(), {
      volumeThreshold: 2,
      errorThresholdPercentage: 50,
      resetTimeoutMs: 60_000,
    });
    const refused = async (): Promise<void> => {
      const reply = new Error('WRONGTYPE Operation against a key holding the wrong kind of value');
      reply.name = 'ReplyError';
      throw reply;
    };

    const first = await guard.run('get', refused);
    await guard.run('get', refused);
    await guard.run('get', refused);

    expect(guard.getState()).toBe('closed');
    expect(first.ok).toBe(false);
    if (!first.ok) {
      expect(first.error.kind).toBe('rejected');
    }
  });

  it('should start closed', () => {
    guard = new BackendGuard('redis', createMockLogger());
    expect(guard.getState()).toBe('closed');
  });
});
