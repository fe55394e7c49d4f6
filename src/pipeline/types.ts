/**
 * Data carried between pipeline stages. Lives for one run only.
 */

/**
 * Decoded audio: interleaved samples normalised to [-1, 1].
 * Frozen on creation; stages build new buffers instead of editing one.
 */
export interface AudioBuffer {
  readonly sampleRateHz: number;
  readonly channels: number;
  readonly samples: Float32Array;
}

export type InputContainer = "wav" | "unknown";

/** What the loader hands to the rest of the pipeline. */
export interface InputAudio {
  /** Absolute path the bytes came from. */
  readonly path: string;
  readonly bytes: Buffer;
  readonly container: InputContainer;
  /** Decoded audio for WAV input; null for containers we do not decode (mp3, ogg, flac). */
  readonly audio: AudioBuffer | null;
}

/** Fixed-length speaker identity vector (192 floats for ECAPA-TDNN). */
export type EmbeddingVector = Float32Array;

export interface TranscriptResult {
  /** Transcribed text. */
  text: string;
  /** Optional language code. */
  language?: string;
}

export function createAudioBuffer(sampleRateHz: number, channels: number, samples: Float32Array): AudioBuffer {
  return Object.freeze({ sampleRateHz, channels, samples });
}

/** Duration in seconds (frames / rate). */
export function audioDurationSec(audio: AudioBuffer): number {
  if (audio.sampleRateHz <= 0 || audio.channels <= 0) return 0;
  return audio.samples.length / audio.channels / audio.sampleRateHz;
}
