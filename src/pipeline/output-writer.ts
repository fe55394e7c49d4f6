/**
 * Output writer: encodes the synthesized audio as WAV and writes it.
 * Does not create directories; a missing parent is a write failure.
 */

import * as fs from "fs";
import * as path from "path";
import { OutputWriteError } from "../errors";
import { encodeWav } from "./audio-utils";
import type { AudioBuffer } from "./types";

/** Write `audio` to `outputPath` as 16-bit PCM WAV. Returns bytes written. */
export function writeOutputAudio(outputPath: string, audio: AudioBuffer): number {
  const resolved = path.resolve(outputPath);
  const wav = encodeWav(audio);
  try {
    fs.writeFileSync(resolved, wav);
  } catch (err) {
    throw new OutputWriteError(resolved, { cause: err });
  }
  return wav.length;
}
