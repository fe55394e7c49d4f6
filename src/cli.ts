/**
 * Command-line surface: `accent-pipeline <input_wav> <accent_label> <output_wav>`.
 * No flags. Exit 0 on success, 1 when the pipeline fails, 2 on bad usage.
 */

import type pino from "pino";
import { loadConfig, type AppConfig } from "./config";
import { PipelineError, UsageError } from "./errors";
import { createLogger, logError } from "./logging";
import { createOrchestrator, type PipelineRequest } from "./pipeline/orchestrator";

export const USAGE = "Usage: accent-pipeline <input_wav> <accent_label> <output_wav>";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliDeps {
  config?: AppConfig;
  logger?: pino.Logger;
  /** Where the result and usage lines go (default: process.stdout / process.stderr). */
  out?: (line: string) => void;
  err?: (line: string) => void;
}

export function parseArgs(argv: readonly string[]): PipelineRequest {
  if (argv.length !== 3) {
    throw new UsageError(`Expected 3 arguments, got ${argv.length}`);
  }
  const [inputPath, accent, outputPath] = argv;
  if (!inputPath || !accent.trim() || !outputPath) {
    throw new UsageError("Arguments must not be empty");
  }
  return { inputPath, accent, outputPath };
}

/** Run one conversion and return the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.out ?? ((line: string) => process.stdout.write(line + "\n"));
  const err = deps.err ?? ((line: string) => process.stderr.write(line + "\n"));

  let request: PipelineRequest;
  try {
    request = parseArgs(argv);
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    err(`${e.message}\n${USAGE}`);
    return EXIT_USAGE;
  }

  const config = deps.config ?? loadConfig();
  const log = deps.logger ?? createLogger(config.logging);
  const orchestrator = createOrchestrator(config, log);

  try {
    const result = await orchestrator.run(request);
    out(`Accent converted audio saved to ${result.outputPath}`);
    return EXIT_OK;
  } catch (e) {
    // Anything that is not a PipelineError is a bug; let it propagate.
    if (!(e instanceof PipelineError)) throw e;
    logError(log, e, { inputPath: request.inputPath, outputPath: request.outputPath });
    err(e.message);
    return EXIT_FAILURE;
  }
}
