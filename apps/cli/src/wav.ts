/**
 * WAV Loader
 *
 * Minimal RIFF/WAVE reader for stereo recordings. Integer PCM is scaled
 * to [-1, 1]; IEEE float samples pass through unchanged.
 */

import { readFile } from "node:fs/promises";

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

// ============================================================================
// Types
// ============================================================================

export type WavFormatReason =
  | "not_riff"
  | "not_wave"
  | "missing_chunk"
  | "unsupported_encoding"
  | "not_stereo";

export class WavFormatError extends Error {
  public readonly reason: WavFormatReason;

  constructor(reason: WavFormatReason, message: string) {
    super(message);
    this.name = "WavFormatError";
    this.reason = reason;
  }
}

export type WavEncoding = "pcm" | "float";

export interface WavInfo {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
  encoding: WavEncoding;
  dataOffset: number;
  dataSize: number;
  samplesPerChannel: number;
}

export interface StereoAudio {
  sampleRate: number;
  left: Float64Array;
  right: Float64Array;
}

interface FormatChunk {
  formatTag: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

type SampleReader = (view: DataView, offset: number) => number;

// ============================================================================
// Header Parsing
// ============================================================================

function fourCC(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset),
    view.getUint8(offset + 1),
    view.getUint8(offset + 2),
    view.getUint8(offset + 3),
  );
}

function readFormatChunk(view: DataView, offset: number, size: number): FormatChunk {
  let formatTag = view.getUint16(offset, true);

  // Extensible headers carry the real format in the first two bytes of the sub-format GUID
  if (formatTag === WAVE_FORMAT_EXTENSIBLE && size >= 40) {
    formatTag = view.getUint16(offset + 24, true);
  }

  return {
    formatTag,
    channels: view.getUint16(offset + 2, true),
    sampleRate: view.getUint32(offset + 4, true),
    bitsPerSample: view.getUint16(offset + 14, true),
  };
}

function resolveEncoding(formatTag: number, bitsPerSample: number): WavEncoding {
  if (formatTag === WAVE_FORMAT_PCM && [8, 16, 24, 32].includes(bitsPerSample)) {
    return "pcm";
  }
  if (formatTag === WAVE_FORMAT_IEEE_FLOAT && (bitsPerSample === 32 || bitsPerSample === 64)) {
    return "float";
  }
  throw new WavFormatError(
    "unsupported_encoding",
    `Unsupported WAV encoding: format ${formatTag}, ${bitsPerSample} bits per sample`,
  );
}

export function readWavInfo(view: DataView): WavInfo {
  if (view.byteLength < 12 || fourCC(view, 0) !== "RIFF") {
    throw new WavFormatError("not_riff", "Not a RIFF file");
  }
  if (fourCC(view, 8) !== "WAVE") {
    throw new WavFormatError("not_wave", "RIFF file is not WAVE audio");
  }

  let format: FormatChunk | undefined;
  let dataOffset = -1;
  let dataSize = 0;
  let offset = 12;

  while (offset + 8 <= view.byteLength) {
    const id = fourCC(view, offset);
    const size = view.getUint32(offset + 4, true);
    const body = offset + 8;

    if (id === "fmt " && size >= 16 && body + 16 <= view.byteLength) {
      format = readFormatChunk(view, body, size);
    } else if (id === "data") {
      dataOffset = body;
      dataSize = Math.min(size, view.byteLength - body);
    }

    // Chunks are word aligned
    offset = body + size + (size % 2);
  }

  if (!format || dataOffset < 0) {
    throw new WavFormatError("missing_chunk", `WAV file has no ${format ? "data" : "fmt "} chunk`);
  }

  const encoding = resolveEncoding(format.formatTag, format.bitsPerSample);

  if (format.channels !== 2) {
    throw new WavFormatError(
      "not_stereo",
      `Expected stereo WAV (2 channels), got ${format.channels} channel(s)`,
    );
  }

  const frameBytes = (format.bitsPerSample / 8) * format.channels;

  return {
    sampleRate: format.sampleRate,
    channels: format.channels,
    bitsPerSample: format.bitsPerSample,
    encoding,
    dataOffset,
    dataSize,
    samplesPerChannel: Math.floor(dataSize / frameBytes),
  };
}

// ============================================================================
// Sample Decoding
// ============================================================================

function sampleReader(encoding: WavEncoding, bitsPerSample: number): SampleReader {
  if (encoding === "float") {
    return bitsPerSample === 64
      ? (view, offset) => view.getFloat64(offset, true)
      : (view, offset) => view.getFloat32(offset, true);
  }

  switch (bitsPerSample) {
    case 8:
      return (view, offset) => (view.getUint8(offset) - 128) / 128;
    case 16:
      return (view, offset) => view.getInt16(offset, true) / 32768;
    case 24:
      return (view, offset) =>
        (view.getUint8(offset) |
          (view.getUint8(offset + 1) << 8) |
          (view.getInt8(offset + 2) << 16)) /
        8388608;
    default:
      return (view, offset) => view.getInt32(offset, true) / 2147483648;
  }
}

/**
 * Decode an in-memory stereo WAV file into normalised channels.
 */
export function decodeWav(bytes: Uint8Array): StereoAudio {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const info = readWavInfo(view);

  const read = sampleReader(info.encoding, info.bitsPerSample);
  const sampleBytes = info.bitsPerSample / 8;
  const frameBytes = sampleBytes * info.channels;
  const left = new Float64Array(info.samplesPerChannel);
  const right = new Float64Array(info.samplesPerChannel);

  for (let i = 0; i < info.samplesPerChannel; i++) {
    const offset = info.dataOffset + i * frameBytes;
    left[i] = read(view, offset);
    right[i] = read(view, offset + sampleBytes);
  }

  return { sampleRate: info.sampleRate, left, right };
}

export async function loadWav(path: string): Promise<StereoAudio> {
  return decodeWav(await readFile(path));
}
