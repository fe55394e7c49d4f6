/**
 * Input loader: reads the source recording from disk.
 * WAV is decoded when its encoding is one we read; anything else (A-law, ADPCM,
 * mp3, ogg, flac) is passed on as raw bytes. Only a missing or unreadable file fails.
 */

import * as fs from "fs";
import * as path from "path";
import type pino from "pino";
import { AudioFormatError, fsErrorCode, InputNotFoundError, InputReadError } from "../errors";
import { silentLogger } from "../logging";
import { decodeWav, isWav } from "./audio-utils";
import type { AudioBuffer, InputAudio } from "./types";

export function loadInputAudio(inputPath: string, log: pino.Logger = silentLogger): InputAudio {
  const resolved = path.resolve(inputPath);

  let stat: fs.Stats;
  try {
    stat = fs.statSync(resolved);
  } catch (err) {
    if (fsErrorCode(err) === "ENOENT" || fsErrorCode(err) === "ENOTDIR") {
      throw new InputNotFoundError(resolved, { cause: err });
    }
    throw new InputReadError(resolved, { cause: err });
  }
  if (!stat.isFile()) throw new InputNotFoundError(resolved);

  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(resolved);
  } catch (err) {
    throw new InputReadError(resolved, { cause: err });
  }

  const input: InputAudio = isWav(bytes)
    ? { path: resolved, bytes, container: "wav", audio: tryDecodeWav(resolved, bytes, log) }
    : { path: resolved, bytes, container: "unknown", audio: null };
  return Object.freeze(input);
}

/** Stages never need samples, so a WAV we cannot decode is carried on undecoded. */
function tryDecodeWav(resolved: string, bytes: Buffer, log: pino.Logger): AudioBuffer | null {
  try {
    return decodeWav(bytes);
  } catch (err) {
    if (!(err instanceof AudioFormatError)) throw err;
    log.warn({ event: "INPUT_NOT_DECODED", path: resolved, reason: err.message }, "Could not decode WAV; passing it on undecoded");
    return null;
  }
}
