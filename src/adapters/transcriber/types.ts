/**
 * Transcriber (speech-to-text) adapter types.
 * Implementations can be swapped via config (stub now, Whisper later).
 */

import type { InputAudio, TranscriptResult } from "../../pipeline/types";

export type { TranscriptResult } from "../../pipeline/types";

/**
 * Transcriber adapter interface: loaded audio in, transcript out.
 */
export interface ITranscriber {
  /**
   * Transcribe audio to text.
   * @param input - Loaded input; `input.audio` is null for containers the loader does not decode.
   */
  transcribe(input: InputAudio): Promise<TranscriptResult>;
}
