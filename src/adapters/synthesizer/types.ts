/**
 * Synthesizer adapter types.
 * Text plus a speaker embedding and target accent in, audio out.
 */

import type { AudioBuffer, EmbeddingVector } from "../../pipeline/types";

export interface ISynthesizer {
  /** Rate of the audio this synthesizer produces. */
  readonly sampleRateHz: number;

  /**
   * Synthesize `text` in the speaker's voice with the target accent.
   * @param accent - Normalised accent label (see pipeline/accents).
   */
  synthesize(text: string, embedding: EmbeddingVector, accent: string): Promise<AudioBuffer>;
}
