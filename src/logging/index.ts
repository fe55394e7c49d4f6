/**
 * Structured logging for the accent conversion pipeline.
 * Logs each stage and errors with timestamps. JSON output for shipping.
 * Everything goes to stderr so stdout stays free for the CLI result line.
 *
 * Env (via loadConfig):
 *   LOG_LEVEL  - debug | info | warn | error (default: info)
 *   LOG_FILE   - If set, also append all logs to this path (creates dirs if needed).
 */

import pino from "pino";
import type { LogLevel } from "../config";

export type { LogLevel } from "../config";

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
  file?: string;
}

const STDERR_FD = 2;

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? "info",
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const streams: pino.StreamEntry[] = [];
  if (config.pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true, destination: STDERR_FD } }),
    });
  } else {
    streams.push({ stream: pino.destination({ dest: STDERR_FD, sync: true }) });
  }
  if (config.file) {
    streams.push({
      stream: pino.destination({ dest: config.file, append: true, mkdir: true, sync: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

/** Logger that drops everything; used by tests and library callers that bring none. */
export const silentLogger: pino.Logger = pino({ level: "silent" });

export type PipelineStage = "INPUT_LOADED" | "TRANSCRIBED" | "EMBEDDING_EXTRACTED" | "SYNTHESIZED" | "OUTPUT_WRITTEN";

/** Log completion of one pipeline stage. Avoid logging transcript text itself. */
export function logStage(log: pino.Logger, stage: PipelineStage, fields: Record<string, unknown> = {}): void {
  log.info({ event: stage, ...fields }, `${stage.toLowerCase().replace(/_/g, " ")}`);
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
  log.error({ err: err.message, code, stack: err.stack, ...context }, "Error");
}
