/**
 * Orchestrator: runs load -> transcribe -> embed -> synthesize -> write, once per call.
 * Stages run one after another; any failure aborts the run and is rethrown unchanged.
 */

import type pino from "pino";
import type { AppConfig } from "../config";
import { createTranscriber, type ITranscriber } from "../adapters/transcriber";
import { createEmbeddingExtractor, type IEmbeddingExtractor } from "../adapters/embedding";
import { createSynthesizer, type ISynthesizer } from "../adapters/synthesizer";
import { InputNotFoundError, VoiceProfileError } from "../errors";
import { logError, logStage, silentLogger } from "../logging";
import { isKnownAccent, normalizeAccent } from "./accents";
import { loadInputAudio } from "./input-loader";
import { writeOutputAudio } from "./output-writer";
import { loadVoiceProfile } from "./voice-profile";
import { audioDurationSec, type AudioBuffer, type EmbeddingVector, type InputAudio, type TranscriptResult } from "./types";

export interface PipelineRequest {
  inputPath: string;
  /** Target accent label; normalised before use. */
  accent: string;
  outputPath: string;
}

export interface PipelineResult {
  inputPath: string;
  outputPath: string;
  accent: string;
  transcript: TranscriptResult;
  embedding: EmbeddingVector;
  /** "voice-profile" when a stored profile replaced extraction. */
  embeddingSource: "extractor" | "voice-profile";
  output: AudioBuffer;
  outputBytes: number;
}

export interface OrchestratorConfig {
  /** Stored speaker embedding to use instead of the extractor. */
  voiceProfilePath?: string;
}

/** Optional observers, called as each stage finishes. */
export interface PipelineCallbacks {
  onTranscript?(result: TranscriptResult): void;
  onEmbedding?(embedding: EmbeddingVector): void;
  onSynthesized?(audio: AudioBuffer): void;
}

export class Orchestrator {
  constructor(
    private readonly transcriber: ITranscriber,
    private readonly extractor: IEmbeddingExtractor,
    private readonly synthesizer: ISynthesizer,
    private readonly config: OrchestratorConfig = {},
    private readonly callbacks: PipelineCallbacks = {},
    private readonly log: pino.Logger = silentLogger
  ) {}

  async run(request: PipelineRequest): Promise<PipelineResult> {
    const accent = normalizeAccent(request.accent);
    if (!isKnownAccent(accent)) {
      this.log.warn({ event: "UNKNOWN_ACCENT", accent }, "Unknown accent label; placeholder synthesis ignores it");
    }

    const input = loadInputAudio(request.inputPath, this.log);
    logStage(this.log, "INPUT_LOADED", {
      path: input.path,
      container: input.container,
      bytes: input.bytes.length,
      durationSec: input.audio ? audioDurationSec(input.audio) : undefined,
    });

    let startedAt = Date.now();
    const transcript = await this.transcriber.transcribe(input);
    logStage(this.log, "TRANSCRIBED", { textLength: transcript.text.length, durationMs: Date.now() - startedAt });
    this.callbacks.onTranscript?.(transcript);

    startedAt = Date.now();
    const { embedding, source } = await this.speakerEmbedding(input);
    logStage(this.log, "EMBEDDING_EXTRACTED", { dimension: embedding.length, source, durationMs: Date.now() - startedAt });
    this.callbacks.onEmbedding?.(embedding);

    startedAt = Date.now();
    const output = await this.synthesizer.synthesize(transcript.text, embedding, accent);
    logStage(this.log, "SYNTHESIZED", {
      accent,
      sampleRateHz: output.sampleRateHz,
      durationSec: audioDurationSec(output),
      durationMs: Date.now() - startedAt,
    });
    this.callbacks.onSynthesized?.(output);

    const outputBytes = writeOutputAudio(request.outputPath, output);
    logStage(this.log, "OUTPUT_WRITTEN", { path: request.outputPath, bytes: outputBytes });

    return {
      inputPath: input.path,
      outputPath: request.outputPath,
      accent,
      transcript,
      embedding,
      embeddingSource: source,
      output,
      outputBytes,
    };
  }

  /**
   * Stored profile when configured and present; otherwise extract from the input.
   * A missing or unreadable profile is logged and extraction is used instead.
   */
  private async speakerEmbedding(
    input: InputAudio
  ): Promise<{ embedding: EmbeddingVector; source: PipelineResult["embeddingSource"] }> {
    const profilePath = this.config.voiceProfilePath;
    if (profilePath) {
      try {
        return { embedding: loadVoiceProfile(profilePath, this.extractor.dimension), source: "voice-profile" };
      } catch (err) {
        if (err instanceof InputNotFoundError) {
          this.log.warn({ event: "VOICE_PROFILE_MISSING", path: err.path }, "Voice profile not found; extracting from input");
        } else if (err instanceof VoiceProfileError) {
          logError(this.log, err, { event: "VOICE_PROFILE_INVALID", path: profilePath });
        } else {
          throw err;
        }
      }
    }
    return { embedding: await this.extractor.extract(input), source: "extractor" };
  }
}

/** Wire adapters from config. */
export function createOrchestrator(config: AppConfig, log?: pino.Logger, callbacks?: PipelineCallbacks): Orchestrator {
  return new Orchestrator(
    createTranscriber(config),
    createEmbeddingExtractor(config),
    createSynthesizer(config),
    { voiceProfilePath: config.pipeline.voiceProfilePath },
    callbacks,
    log
  );
}
