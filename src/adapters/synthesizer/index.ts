/**
 * Synthesizer adapter factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { ISynthesizer } from "./types";
import { StubSynthesizer } from "./stub";

export type { ISynthesizer } from "./types";
export { StubSynthesizer, PLACEHOLDER_SAMPLE_RATE_HZ, PLACEHOLDER_DURATION_SEC } from "./stub";

export function createSynthesizer(config: AppConfig): ISynthesizer {
  switch (config.synthesizer.provider) {
    case "stub":
      return new StubSynthesizer();
  }
}
