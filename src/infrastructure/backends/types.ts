/**
 * Durable Backend Types
 *
 * Adapters report outcomes as values instead of throwing, so the tiered cache
 * can decide between retrying on another tier and serving from memory.
 */

import type { DurableBackendLabel, Embedding } from '../../types.js';

// =============================================================================
// Results
// =============================================================================

/**
 * Failure categories consumed by tier selection.
 * - unreachable: connection refused, circuit open, backend error
 * - timeout: the call exceeded the guard timeout
 * - rejected: the backend answered but refused the command (Redis error reply)
 * - corrupt: the stored payload could not be decoded (already evicted)
 *
 * Only unreachable and timeout say anything about the backend's health.
 */
export type BackendFailureKind = 'unreachable' | 'timeout' | 'rejected' | 'corrupt';

export function isOutage(kind: BackendFailureKind): boolean {
  return kind === 'unreachable' || kind === 'timeout';
}

export interface BackendFailure {
  kind: BackendFailureKind;
  backend: DurableBackendLabel;
  message: string;
  cause?: unknown;
}

export type BackendResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: BackendFailure };

export function ok<T>(value: T): BackendResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: BackendFailure): BackendResult<T> {
  return { ok: false, error };
}

// =============================================================================
// Backend Interface
// =============================================================================

/**
 * Durable embedding store.
 * Implementations: Redis (native TTL), SQLite (lazy expiry + sweep).
 */
export interface IEmbeddingBackend {
  readonly label: DurableBackendLabel;
  /** Whether the store removes expired entries on its own */
  readonly nativeExpiry: boolean;

  /** Establish (or re-probe) connectivity; never throws */
  connect(): Promise<boolean>;
  /** Last-known connectivity, no I/O */
  isHealthy(): boolean;

  /** Upsert: replaces any existing entry for the key */
  set(key: string, embedding: Embedding, ttlSeconds: number): Promise<BackendResult<void>>;
  /** Live entry or null; expired entries are removed and reported as null */
  get(key: string): Promise<BackendResult<Embedding | null>>;
  /** True iff a live entry existed and was removed */
  delete(key: string): Promise<BackendResult<boolean>>;
  exists(key: string): Promise<BackendResult<boolean>>;
  /** Remove every expired entry, returning how many were removed */
  sweepExpired(): Promise<BackendResult<number>>;

  close(): Promise<void>;
}

// =============================================================================
// Guard Configuration
// =============================================================================

export interface BackendGuardConfig {
  /** Per-call timeout in ms (default: 2000) */
  timeoutMs: number;
  /** Error percentage that opens the circuit (default: 50) */
  errorThresholdPercentage: number;
  /** Time before an open circuit lets a probe through, in ms (default: 30000) */
  resetTimeoutMs: number;
  /** Minimum calls in the rolling window before the circuit may open (default: 5) */
  volumeThreshold: number;
}

export const DEFAULT_GUARD_CONFIG: BackendGuardConfig = {
  timeoutMs: 2000,
  errorThresholdPercentage: 50,
  resetTimeoutMs: 30_000,
  volumeThreshold: 5,
};
