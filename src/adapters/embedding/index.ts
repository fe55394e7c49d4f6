/**
 * Embedding extractor factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { IEmbeddingExtractor } from "./types";
import { StubEmbeddingExtractor } from "./stub";

export type { IEmbeddingExtractor, EmbeddingVector } from "./types";
export { SPEAKER_EMBEDDING_DIM } from "./types";
export { StubEmbeddingExtractor } from "./stub";

export function createEmbeddingExtractor(config: AppConfig): IEmbeddingExtractor {
  switch (config.embedding.provider) {
    case "stub":
      return new StubEmbeddingExtractor();
  }
}
