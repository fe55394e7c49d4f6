/**
 * Speaker embedding adapter types.
 * An extractor turns an utterance into a fixed-length voice identity vector.
 */

import type { EmbeddingVector, InputAudio } from "../../pipeline/types";

export type { EmbeddingVector } from "../../pipeline/types";

/** ECAPA-TDNN output size. */
export const SPEAKER_EMBEDDING_DIM = 192;

export interface IEmbeddingExtractor {
  /** Length of every vector this extractor returns. */
  readonly dimension: number;
  extract(input: InputAudio): Promise<EmbeddingVector>;
}
