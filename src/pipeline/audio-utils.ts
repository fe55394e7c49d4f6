/**
 * Audio format helpers: WAV (RIFF) decode and encode.
 *
 * Decoding accepts integer PCM (8/16/24/32-bit), IEEE float (32/64-bit) and
 * WAVE_FORMAT_EXTENSIBLE wrapping either. Encoding always writes 16-bit PCM.
 */

import { AudioFormatError } from "../errors";
import { createAudioBuffer, type AudioBuffer } from "./types";

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export const WAV_HEADER_BYTES = 44;

/**
 * Prepend a 44-byte WAV header to 16-bit little-endian PCM.
 */
export function pcmToWav(pcm: Buffer, sampleRateHz: number, channels: number = 1): Buffer {
  const bitsPerSample = 16;
  const blockAlign = (channels * bitsPerSample) / 8;
  const byteRate = sampleRateHz * blockAlign;
  const dataSize = pcm.length;
  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write("RIFF", 0);
  header.writeUInt32LE(WAV_HEADER_BYTES - 8 + dataSize, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataSize, 40);
  return Buffer.concat([header, pcm]);
}

/** True when the bytes start with a RIFF/WAVE header. */
export function isWav(bytes: Buffer): boolean {
  return bytes.length >= 12 && bytes.toString("ascii", 0, 4) === "RIFF" && bytes.toString("ascii", 8, 12) === "WAVE";
}

interface WavFormat {
  formatTag: number;
  channels: number;
  sampleRateHz: number;
  bitsPerSample: number;
  blockAlign: number;
}

function readFormat(bytes: Buffer, offset: number, size: number): WavFormat {
  if (size < 16) throw new AudioFormatError(`WAV fmt chunk too short (${size} bytes)`);
  let formatTag = bytes.readUInt16LE(offset);
  const channels = bytes.readUInt16LE(offset + 2);
  const sampleRateHz = bytes.readUInt32LE(offset + 4);
  const blockAlign = bytes.readUInt16LE(offset + 12);
  const bitsPerSample = bytes.readUInt16LE(offset + 14);
  if (formatTag === WAVE_FORMAT_EXTENSIBLE) {
    // Sub-format GUID starts 24 bytes into the chunk; its first two bytes are the real tag.
    if (size < 40) throw new AudioFormatError("WAV extensible fmt chunk too short");
    formatTag = bytes.readUInt16LE(offset + 24);
  }
  return { formatTag, channels, sampleRateHz, bitsPerSample, blockAlign };
}

function sampleReader(fmt: WavFormat): (bytes: Buffer, offset: number) => number {
  if (fmt.formatTag === WAVE_FORMAT_PCM) {
    switch (fmt.bitsPerSample) {
      case 8:
        return (b, o) => (b.readUInt8(o) - 128) / 128;
      case 16:
        return (b, o) => b.readInt16LE(o) / 32768;
      case 24:
        return (b, o) => b.readIntLE(o, 3) / 8388608;
      case 32:
        return (b, o) => b.readInt32LE(o) / 2147483648;
    }
  }
  if (fmt.formatTag === WAVE_FORMAT_IEEE_FLOAT) {
    if (fmt.bitsPerSample === 32) return (b, o) => b.readFloatLE(o);
    if (fmt.bitsPerSample === 64) return (b, o) => b.readDoubleLE(o);
  }
  throw new AudioFormatError(`Unsupported WAV encoding: format ${fmt.formatTag}, ${fmt.bitsPerSample}-bit`);
}

/**
 * Decode a WAV file into an AudioBuffer.
 * Walks RIFF chunks, so LIST/fact/etc. chunks and a `fmt ` placed after `data` are fine.
 */
export function decodeWav(bytes: Buffer): AudioBuffer {
  if (!isWav(bytes)) throw new AudioFormatError("Not a RIFF/WAVE file");

  let fmt: WavFormat | null = null;
  let data: Buffer | null = null;
  let offset = 12;
  while (offset + 8 <= bytes.length) {
    const id = bytes.toString("ascii", offset, offset + 4);
    const size = bytes.readUInt32LE(offset + 4);
    const body = offset + 8;
    if (id === "fmt ") {
      if (body + size > bytes.length) throw new AudioFormatError("WAV fmt chunk truncated");
      fmt = readFormat(bytes, body, size);
    } else if (id === "data") {
      // Some writers leave the data size unset when streaming; clamp to what is there.
      data = bytes.subarray(body, Math.min(body + size, bytes.length));
    }
    if (fmt && data) break;
    // Chunks are word aligned.
    offset = body + size + (size % 2);
  }

  if (!fmt) throw new AudioFormatError("WAV file has no fmt chunk");
  if (!data) throw new AudioFormatError("WAV file has no data chunk");
  if (fmt.channels < 1) throw new AudioFormatError("WAV file declares zero channels");
  if (fmt.sampleRateHz < 1) throw new AudioFormatError("WAV file declares zero sample rate");

  const bytesPerSample = fmt.bitsPerSample / 8;
  if (!Number.isInteger(bytesPerSample) || fmt.blockAlign !== bytesPerSample * fmt.channels) {
    throw new AudioFormatError(`Inconsistent WAV block alignment (${fmt.blockAlign})`);
  }
  const read = sampleReader(fmt);
  const frames = Math.floor(data.length / fmt.blockAlign);
  const samples = new Float32Array(frames * fmt.channels);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = read(data, i * bytesPerSample);
  }
  return createAudioBuffer(fmt.sampleRateHz, fmt.channels, samples);
}

/**
 * Encode an AudioBuffer as 16-bit PCM WAV. Samples outside [-1, 1] are clamped.
 * Same input always gives the same bytes.
 */
export function encodeWav(audio: AudioBuffer): Buffer {
  const pcm = Buffer.alloc(audio.samples.length * 2);
  for (let i = 0; i < audio.samples.length; i++) {
    const s = Math.max(-1, Math.min(1, audio.samples[i]));
    pcm.writeInt16LE(s < 0 ? Math.round(s * 32768) : Math.round(s * 32767), i * 2);
  }
  return pcmToWav(pcm, audio.sampleRateHz, audio.channels);
}

/** All-zero audio of the given length. */
export function createSilence(sampleRateHz: number, durationSec: number, channels: number = 1): AudioBuffer {
  const frames = Math.round(sampleRateHz * durationSec);
  return createAudioBuffer(sampleRateHz, channels, new Float32Array(frames * channels));
}
