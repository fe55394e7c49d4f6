/**
 * Unit tests for voice profile storage.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { loadVoiceProfile } from "../../../src/pipeline/voice-profile";
import { InputNotFoundError, VoiceProfileError } from "../../../src/errors";

describe("voice profiles", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "voice-profile-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads a stored embedding", () => {
    const file = path.join(dir, "speaker.json");
    fs.writeFileSync(file, JSON.stringify({ dimension: 3, embedding: [0.25, -0.5, 1] }));
    expect(Array.from(loadVoiceProfile(file, 3))).toEqual([0.25, -0.5, 1]);
  });

  it("throws InputNotFoundError when the file is missing", () => {
    expect(() => loadVoiceProfile(path.join(dir, "nope.json"), 192)).toThrow(InputNotFoundError);
  });

  it("rejects invalid JSON", () => {
    const file = path.join(dir, "bad.json");
    fs.writeFileSync(file, "{ not json");
    expect(() => loadVoiceProfile(file, 3)).toThrow(VoiceProfileError);
  });

  it("rejects an embedding whose length does not match its dimension", () => {
    const file = path.join(dir, "short.json");
    fs.writeFileSync(file, JSON.stringify({ dimension: 3, embedding: [1, 2] }));
    expect(() => loadVoiceProfile(file, 3)).toThrow("embedding: embedding length does not match dimension");
  });

  it("rejects a profile from a model with another dimension", () => {
    const file = path.join(dir, "other.json");
    fs.writeFileSync(file, JSON.stringify({ dimension: 2, embedding: [1, 2] }));
    expect(() => loadVoiceProfile(file, 192)).toThrow("has dimension 2, expected 192");
  });
});
