/**
 * Stub synthesizer until a YourTTS / StyleVC adapter lands.
 * Returns one second of mono silence at 24 kHz and ignores its arguments.
 */

import { createSilence } from "../../pipeline/audio-utils";
import type { AudioBuffer, EmbeddingVector } from "../../pipeline/types";
import type { ISynthesizer } from "./types";

export const PLACEHOLDER_SAMPLE_RATE_HZ = 24000;
export const PLACEHOLDER_DURATION_SEC = 1;

export class StubSynthesizer implements ISynthesizer {
  readonly sampleRateHz = PLACEHOLDER_SAMPLE_RATE_HZ;

  async synthesize(_text: string, _embedding: EmbeddingVector, _accent: string): Promise<AudioBuffer> {
    return createSilence(this.sampleRateHz, PLACEHOLDER_DURATION_SEC);
  }
}
