/**
 * Unit tests for transcriber adapters (stub and factory).
 */

import { StubTranscriber, PLACEHOLDER_TRANSCRIPT, createTranscriber } from "../../../src/adapters/transcriber";
import { loadConfig } from "../../../src/config";
import type { InputAudio } from "../../../src/pipeline/types";

const input = (bytes: string): InputAudio => ({ path: "/tmp/x.wav", bytes: Buffer.from(bytes), container: "unknown", audio: null });

describe("StubTranscriber", () => {
  it("returns the placeholder sentence for any input", async () => {
    const asr = new StubTranscriber();
    const a = await asr.transcribe(input("first"));
    const b = await asr.transcribe(input("something else entirely"));
    expect(a.text).toBe("This is a sample transcription.");
    expect(a.text).toBe(PLACEHOLDER_TRANSCRIPT);
    expect(b).toEqual(a);
  });
});

describe("createTranscriber", () => {
  it("returns StubTranscriber by default", () => {
    expect(createTranscriber(loadConfig({}))).toBeInstanceOf(StubTranscriber);
  });
});
