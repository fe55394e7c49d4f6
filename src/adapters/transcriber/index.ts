/**
 * Transcriber adapter factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { ITranscriber } from "./types";
import { StubTranscriber } from "./stub";

export type { ITranscriber, TranscriptResult } from "./types";
export { StubTranscriber, PLACEHOLDER_TRANSCRIPT } from "./stub";

export function createTranscriber(config: AppConfig): ITranscriber {
  switch (config.transcriber.provider) {
    case "stub":
      return new StubTranscriber();
  }
}
