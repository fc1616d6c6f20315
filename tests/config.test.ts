/**
 * Configuration Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { DEFAULT_TTL_SECONDS, getConfig, loadConfig, resetConfig } from '../src/config.js';

describe('loadConfig', () => {
  afterEach(() => {
    resetConfig();
  });

  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      cache: {
        backend: 'redis',
        defaultTtlSeconds: DEFAULT_TTL_SECONDS,
        operationTimeoutMs: 2000,
        breakerErrorThreshold: 50,
        breakerResetMs: 30_000,
        reprobeIntervalMs: 60_000,
        reprobeSuccessThreshold: 3,
        volatileMaxEntries: 10_000,
        sweepIntervalMs: 0,
      },
      redis: {
        url: 'redis://localhost:6379',
        keyPrefix: 'speaker_embedding:',
        connectTimeoutMs: 5000,
      },
      sqlite: {
        path: './data/embedding-cache.db',
        busyTimeoutMs: 5000,
      },
      nodeEnv: 'development',
      logLevel: 'info',
    });
    expect(DEFAULT_TTL_SECONDS).toBe(2_592_000);
  });

  it('should coerce numeric variables and normalise the backend name', () => {
    const config = loadConfig({
      CACHE_BACKEND: 'SQLite',
      CACHE_DEFAULT_TTL_SECONDS: '3600',
      CACHE_REPROBE_INTERVAL_MS: '0',
      SQLITE_PATH: ':memory:',
      REDIS_URL: 'redis://cache.internal:6380/2',
    });

    expect(config.cache.backend).toBe('sqlite');
    expect(config.cache.defaultTtlSeconds).toBe(3600);
    expect(config.cache.reprobeIntervalMs).toBe(0);
    expect(config.sqlite.path).toBe(':memory:');
    expect(config.redis.url).toBe('redis://cache.internal:6380/2');
  });

  it('should list every invalid value', () => {
    expect(() =>
      loadConfig({
        CACHE_BACKEND: 'mongo',
        CACHE_DEFAULT_TTL_SECONDS: '0',
      })
    ).toThrow(
      'Configuration validation failed:\n' +
        "cache.backend: Invalid enum value. Expected 'redis' | 'sqlite', received 'mongo'\n" +
        'cache.defaultTtlSeconds: Number must be greater than or equal to 1'
    );
  });

  it('should cache the parsed configuration until reset', () => {
    const first = getConfig();

    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig()).not.toBe(first);
  });
});
