/**
 * Embedding Cache Errors
 *
 * Only a few errors ever leave the cache: a missing embedding for callers that
 * require one, undecodable payloads (raised by the codec and absorbed by the
 * adapters) and invalid arguments. Backend outages are never raised; they are
 * reported as BackendResult failures and handled by the tiered cache.
 */

/**
 * Embedding cache error codes
 */
export enum EmbeddingCacheErrorCode {
  /** No embedding cached for the requested user */
  NOT_FOUND = 'EMBEDDING_CACHE_NOT_FOUND',
  /** Stored bytes do not decode to an embedding */
  CORRUPT_PAYLOAD = 'EMBEDDING_CACHE_CORRUPT_PAYLOAD',
  /** Caller passed an unusable key or TTL */
  INVALID_ARGUMENT = 'EMBEDDING_CACHE_INVALID_ARGUMENT',
}

/**
 * Base error for the embedding cache
 */
export class EmbeddingCacheError extends Error {
  readonly code: EmbeddingCacheErrorCode;

  /** Suggested action for the caller */
  readonly suggestion?: string;

  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code: EmbeddingCacheErrorCode;
      suggestion?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options.cause });
    this.name = 'EmbeddingCacheError';
    this.code = options.code;
    this.suggestion = options.suggestion;
    this.details = options.details;
  }
}

/**
 * Raised when a caller requires an embedding that is not cached
 */
export class EmbeddingNotFoundError extends EmbeddingCacheError {
  constructor(public readonly userKey: string) {
    super(
      `Speaker embedding not found for user ${userKey}. Call cacheUserVoice first.`,
      {
        code: EmbeddingCacheErrorCode.NOT_FOUND,
        suggestion: `Populate the cache for user ${userKey} through cacheUserVoice before requesting audio`,
        details: { userKey },
      }
    );
    this.name = 'EmbeddingNotFoundError';
  }
}

/**
 * Raised by the codec when bytes do not match the embedding format
 */
export class CorruptPayloadError extends EmbeddingCacheError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Corrupt embedding payload: ${reason}`, {
      code: EmbeddingCacheErrorCode.CORRUPT_PAYLOAD,
      details,
    });
    this.name = 'CorruptPayloadError';
  }
}

/**
 * Raised for caller bugs such as an empty key or a non-positive TTL
 */
export class InvalidArgumentError extends EmbeddingCacheError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, {
      code: EmbeddingCacheErrorCode.INVALID_ARGUMENT,
      details,
    });
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Type guard for cache errors
 */
export function isEmbeddingCacheError(error: unknown): error is EmbeddingCacheError {
  return error instanceof EmbeddingCacheError;
}
