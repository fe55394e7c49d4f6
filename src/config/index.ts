/**
 * Env-based configuration for the accent conversion pipeline.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type TranscriberProvider = "stub";
export type EmbeddingProvider = "stub";
export type SynthesizerProvider = "stub";
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  /** Speech-to-text stage (Whisper later). */
  transcriber: {
    provider: TranscriberProvider;
  };

  /** Speaker embedding stage (ECAPA-TDNN later). */
  embedding: {
    provider: EmbeddingProvider;
  };

  /** Accented speech synthesis stage (YourTTS / StyleVC later). */
  synthesizer: {
    provider: SynthesizerProvider;
  };

  pipeline: {
    /** Stored speaker embedding to use instead of extracting one from the input. */
    voiceProfilePath?: string;
  };

  logging: {
    level: LogLevel;
    /** Human-readable output via pino-pretty; off in production. */
    pretty: boolean;
    /** Also append logs to this file. */
    file?: string;
  };
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function getEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const v = env[key];
  if (v === undefined || v.trim() === "") return undefined;
  return v.trim();
}

function parseLogLevel(v: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((l) => l === v?.toLowerCase());
  return level ?? "info";
}

const STAGE_PROVIDERS = ["stub"] as const;

/** Only the stub exists for each stage so far; unknown values fall back to it. */
function parseProvider(v: string | undefined): (typeof STAGE_PROVIDERS)[number] {
  return STAGE_PROVIDERS.find((p) => p === v?.toLowerCase()) ?? "stub";
}

/**
 * Build config from environment variables.
 * TRANSCRIBER_PROVIDER, EMBEDDING_PROVIDER, SYNTHESIZER_PROVIDER select adapters (stub only for now).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const read = (key: string): string | undefined => getEnv(env, key);

  return {
    transcriber: { provider: parseProvider(read("TRANSCRIBER_PROVIDER")) },
    embedding: { provider: parseProvider(read("EMBEDDING_PROVIDER")) },
    synthesizer: { provider: parseProvider(read("SYNTHESIZER_PROVIDER")) },
    pipeline: {
      voiceProfilePath: read("VOICE_PROFILE_PATH"),
    },
    logging: {
      level: parseLogLevel(read("LOG_LEVEL")),
      pretty: read("NODE_ENV") !== "production",
      file: read("LOG_FILE"),
    },
  };
}
