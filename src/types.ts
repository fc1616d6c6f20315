/**
 * Shared domain types
 */

/**
 * A speaker embedding. The shape given to the cache is the shape handed back.
 */
export type Embedding = Float32Array | Float64Array | number[];

/** Durable backend identifiers */
export type DurableBackendLabel = 'redis' | 'sqlite';

/** Where an embedding is currently served from */
export type BackendLabel = DurableBackendLabel | 'volatile';

/** Position of the active store in the fallback chain */
export type CacheTier = 'primary' | 'secondary' | 'volatile';

/**
 * Copy an embedding so stored entries cannot be mutated through a caller's reference
 */
export function cloneEmbedding(embedding: Embedding): Embedding {
  if (embedding instanceof Float32Array) {
    return new Float32Array(embedding);
  }
  if (embedding instanceof Float64Array) {
    return new Float64Array(embedding);
  }
  return [...embedding];
}
