/**
 * External collaborators of the voice cache service
 */

import type { Embedding } from './types.js';

/**
 * Resolves the stored voice sample for a user
 */
export interface IVoiceSampleSource {
  /** Path to the user's voice sample, or null when the user has none */
  getVoiceSamplePath(userKey: string): Promise<string | null>;
}

/**
 * Computes a speaker embedding from a voice sample (the expensive step the cache avoids)
 */
export interface ISpeakerEncoder {
  computeEmbedding(samplePath: string): Promise<Embedding>;
}
