/**
 * Stub transcriber used until a Whisper adapter lands.
 * Returns the same sentence for every input.
 */

import type { InputAudio } from "../../pipeline/types";
import type { ITranscriber, TranscriptResult } from "./types";

export const PLACEHOLDER_TRANSCRIPT = "This is a sample transcription.";

export class StubTranscriber implements ITranscriber {
  async transcribe(_input: InputAudio): Promise<TranscriptResult> {
    return { text: PLACEHOLDER_TRANSCRIPT, language: "en" };
  }
}
