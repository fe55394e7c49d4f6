#!/usr/bin/env node
/**
 * Entry point: run the accent conversion pipeline on the command-line arguments.
 */

import { EXIT_FAILURE, runCli } from "./cli";
import { createLogger, logError } from "./logging";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((err: unknown) => {
  logError(createLogger({ pretty: false }), err instanceof Error ? err : new Error(String(err)));
  process.exitCode = EXIT_FAILURE;
});
