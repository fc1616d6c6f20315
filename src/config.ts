import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

// Load environment variables from .env (no-op when the file is absent)
dotenvConfig();

/** 30 days */
export const DEFAULT_TTL_SECONDS = 2_592_000;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  cache: z.object({
    // Primary durable backend; the other one becomes the secondary tier
    backend: z.enum(['redis', 'sqlite']).default('redis'),
    defaultTtlSeconds: z.coerce.number().int().min(1).default(DEFAULT_TTL_SECONDS),

    // Guard (opossum) settings applied to every durable call
    operationTimeoutMs: z.coerce.number().int().min(10).max(60_000).default(2000),
    breakerErrorThreshold: z.coerce.number().int().min(1).max(100).default(50),
    breakerResetMs: z.coerce.number().int().min(100).max(600_000).default(30_000),

    // Re-promotion of demoted backends (0 disables)
    reprobeIntervalMs: z.coerce.number().int().min(0).default(60_000),
    reprobeSuccessThreshold: z.coerce.number().int().min(1).max(100).default(3),

    volatileMaxEntries: z.coerce.number().int().min(1).default(10_000),

    // Eager expiry sweep (0 disables)
    sweepIntervalMs: z.coerce.number().int().min(0).default(0),
  }),

  redis: z.object({
    url: z.string().min(1).default('redis://localhost:6379'),
    keyPrefix: z.string().default('speaker_embedding:'),
    connectTimeoutMs: z.coerce.number().int().min(100).max(30_000).default(5000),
  }),

  sqlite: z.object({
    path: z.string().min(1).default('./data/embedding-cache.db'),
    busyTimeoutMs: z.coerce.number().int().min(0).max(60_000).default(5000),
  }),

  nodeEnv: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Parse environment variables into configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    cache: {
      backend: env['CACHE_BACKEND']?.toLowerCase(),
      defaultTtlSeconds: env['CACHE_DEFAULT_TTL_SECONDS'],
      operationTimeoutMs: env['CACHE_OPERATION_TIMEOUT_MS'],
      breakerErrorThreshold: env['CACHE_BREAKER_ERROR_THRESHOLD'],
      breakerResetMs: env['CACHE_BREAKER_RESET_MS'],
      reprobeIntervalMs: env['CACHE_REPROBE_INTERVAL_MS'],
      reprobeSuccessThreshold: env['CACHE_REPROBE_SUCCESS_THRESHOLD'],
      volatileMaxEntries: env['CACHE_VOLATILE_MAX_ENTRIES'],
      sweepIntervalMs: env['CACHE_SWEEP_INTERVAL_MS'],
    },
    redis: {
      url: env['REDIS_URL'],
      keyPrefix: env['REDIS_KEY_PREFIX'],
      connectTimeoutMs: env['REDIS_CONNECT_TIMEOUT_MS'],
    },
    sqlite: {
      path: env['SQLITE_PATH'],
      busyTimeoutMs: env['SQLITE_BUSY_TIMEOUT_MS'],
    },
    nodeEnv: env['NODE_ENV'],
    logLevel: env['LOG_LEVEL'],
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - allow resetting config
export function resetConfig(): void {
  configInstance = null;
}
