export { BackendGuard, classifyFailure } from './BackendGuard.js';
export type { GuardCircuitState } from './BackendGuard.js';
export { RedisEmbeddingBackend } from './RedisEmbeddingBackend.js';
export type { EmbeddingRedisClient, RedisEmbeddingBackendConfig } from './RedisEmbeddingBackend.js';
export { SqliteEmbeddingBackend } from './SqliteEmbeddingBackend.js';
export type { SqliteEmbeddingBackendConfig } from './SqliteEmbeddingBackend.js';
export { DEFAULT_GUARD_CONFIG, fail, isOutage, ok } from './types.js';
export type {
  BackendFailure,
  BackendFailureKind,
  BackendGuardConfig,
  BackendResult,
  IEmbeddingBackend,
} from './types.js';
