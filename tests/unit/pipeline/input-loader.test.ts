/**
 * Unit tests for the input loader.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { loadInputAudio } from "../../../src/pipeline/input-loader";
import { pcmToWav } from "../../../src/pipeline/audio-utils";
import pino from "pino";
import { InputNotFoundError } from "../../../src/errors";

describe("loadInputAudio", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "input-loader-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("decodes WAV input", () => {
    const file = path.join(dir, "speech.wav");
    fs.writeFileSync(file, pcmToWav(Buffer.alloc(16000 * 2), 16000));
    const input = loadInputAudio(file);
    expect(input.path).toBe(file);
    expect(input.container).toBe("wav");
    expect(input.bytes.length).toBe(44 + 32000);
    expect(input.audio?.sampleRateHz).toBe(16000);
    expect(input.audio?.samples.length).toBe(16000);
    expect(Object.isFrozen(input)).toBe(true);
  });

  it("passes other containers through undecoded", () => {
    const file = path.join(dir, "speech.mp3");
    fs.writeFileSync(file, Buffer.from("ID3 fake mp3 payload"));
    const input = loadInputAudio(file);
    expect(input.container).toBe("unknown");
    expect(input.audio).toBeNull();
    expect(input.bytes.toString()).toBe("ID3 fake mp3 payload");
  });

  it("resolves relative paths", () => {
    const file = path.join(dir, "rel.wav");
    fs.writeFileSync(file, pcmToWav(Buffer.alloc(4), 8000));
    const input = loadInputAudio(path.relative(process.cwd(), file));
    expect(input.path).toBe(file);
  });

  it("throws InputNotFoundError for a missing file", () => {
    const missing = path.join(dir, "missing.wav");
    expect(() => loadInputAudio(missing)).toThrow(InputNotFoundError);
    expect(() => loadInputAudio(missing)).toThrow(`Input file not found: ${missing}`);
  });

  it("throws InputNotFoundError for a directory", () => {
    expect(() => loadInputAudio(dir)).toThrow(InputNotFoundError);
  });

  it("passes a WAV with no chunks on undecoded", () => {
    const file = path.join(dir, "broken.wav");
    fs.writeFileSync(file, Buffer.from("RIFF\u0004\u0000\u0000\u0000WAVE", "latin1"));
    const input = loadInputAudio(file);
    expect(input.container).toBe("wav");
    expect(input.audio).toBeNull();
    expect(input.bytes.length).toBe(12);
  });

  it("passes an A-law WAV on undecoded and logs why", () => {
    const file = path.join(dir, "alaw.wav");
    const wav = pcmToWav(Buffer.alloc(800, 0xd5), 8000);
    wav.writeUInt16LE(6, 20);
    wav.writeUInt32LE(8000, 28);
    wav.writeUInt16LE(1, 32);
    wav.writeUInt16LE(8, 34);
    fs.writeFileSync(file, wav);
    const log = pino({ level: "silent" });
    const warn = jest.spyOn(log, "warn");

    const input = loadInputAudio(file, log);

    expect(input.container).toBe("wav");
    expect(input.audio).toBeNull();
    expect(warn).toHaveBeenCalledWith(
      { event: "INPUT_NOT_DECODED", path: file, reason: "Unsupported WAV encoding: format 6, 8-bit" },
      "Could not decode WAV; passing it on undecoded"
    );
  });
});
