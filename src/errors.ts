/**
 * Error types surfaced by the pipeline and the CLI.
 * Every failure carries a code so the CLI can map it to an exit status.
 */

export type PipelineErrorCode =
  | "INPUT_NOT_FOUND"
  | "INPUT_READ_FAILED"
  | "AUDIO_FORMAT"
  | "OUTPUT_NOT_WRITABLE"
  | "VOICE_PROFILE"
  | "USAGE";

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PipelineError";
  }
}

/** Input path does not exist or is not a regular file. */
export class InputNotFoundError extends PipelineError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(`Input file not found: ${path}`, "INPUT_NOT_FOUND", options);
    this.name = "InputNotFoundError";
  }
}

export class InputReadError extends PipelineError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(`Could not read input file: ${path}`, "INPUT_READ_FAILED", options);
    this.name = "InputReadError";
  }
}

export class AudioFormatError extends PipelineError {
  constructor(message: string) {
    super(message, "AUDIO_FORMAT");
    this.name = "AudioFormatError";
  }
}

/** Output path cannot be written (missing directory, permissions, is a directory). */
export class OutputWriteError extends PipelineError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(`Could not write output file: ${path}`, "OUTPUT_NOT_WRITABLE", options);
    this.name = "OutputWriteError";
  }
}

export class VoiceProfileError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "VOICE_PROFILE", options);
    this.name = "VoiceProfileError";
  }
}

export class UsageError extends PipelineError {
  constructor(message: string) {
    super(message, "USAGE");
    this.name = "UsageError";
  }
}

/** Node fs error code (ENOENT, EACCES, ...) when present. */
export function fsErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
