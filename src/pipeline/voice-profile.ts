/**
 * Voice profiles: a speaker embedding saved to disk so later runs can reuse it
 * instead of extracting one from each recording.
 *
 * File format (JSON): { "dimension": 192, "embedding": [0, 0, ...] }
 * Profiles are produced outside this pipeline (by the extraction model's own tooling).
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { fsErrorCode, InputNotFoundError, VoiceProfileError } from "../errors";
import type { EmbeddingVector } from "./types";

const voiceProfileSchema = z
  .object({
    dimension: z.number().int().positive(),
    embedding: z.array(z.number().finite()),
  })
  .refine((p) => p.embedding.length === p.dimension, {
    message: "embedding length does not match dimension",
    path: ["embedding"],
  });

export type VoiceProfile = z.infer<typeof voiceProfileSchema>;

/**
 * Load a stored embedding. `dimension` is the size the current extractor produces;
 * a profile of another size belongs to a different model and is rejected.
 */
export function loadVoiceProfile(profilePath: string, dimension: number): EmbeddingVector {
  const resolved = path.resolve(profilePath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, "utf8");
  } catch (err) {
    if (fsErrorCode(err) === "ENOENT") throw new InputNotFoundError(resolved, { cause: err });
    throw new VoiceProfileError(`Could not read voice profile: ${resolved}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new VoiceProfileError(`Voice profile is not valid JSON: ${resolved}`, { cause: err });
  }

  const parsed = voiceProfileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new VoiceProfileError(`Invalid voice profile ${resolved}: ${issue?.path.join(".") || "(root)"}: ${issue?.message}`);
  }
  if (parsed.data.dimension !== dimension) {
    throw new VoiceProfileError(
      `Voice profile ${resolved} has dimension ${parsed.data.dimension}, expected ${dimension}`
    );
  }
  return Float32Array.from(parsed.data.embedding);
}
