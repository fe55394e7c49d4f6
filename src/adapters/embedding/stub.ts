/**
 * Stub extractor: zero vector of the ECAPA-TDNN size for every input.
 */

import type { InputAudio } from "../../pipeline/types";
import { SPEAKER_EMBEDDING_DIM, type EmbeddingVector, type IEmbeddingExtractor } from "./types";

export class StubEmbeddingExtractor implements IEmbeddingExtractor {
  readonly dimension = SPEAKER_EMBEDDING_DIM;

  async extract(_input: InputAudio): Promise<EmbeddingVector> {
    // Fresh array per call so callers can't corrupt a shared constant.
    return new Float32Array(this.dimension);
  }
}
