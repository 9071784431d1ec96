// ABOUTME: Minimal RIFF/WAVE reader and writer for captured voice takes.
// ABOUTME: Decodes PCM 16-bit and IEEE float 32-bit data into normalized samples of the first channel.

const FORMAT_PCM = 0x0001;
const FORMAT_IEEE_FLOAT = 0x0003;
const FORMAT_EXTENSIBLE = 0xfffe;

export class WavFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WavFormatError";
  }
}

export interface DecodedWav {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
  /** Frames per channel. */
  frames: number;
  /** First channel, normalized to -1..1. */
  samples: Float32Array;
}

interface FormatChunk {
  format: number;
  channels: number;
  sampleRate: number;
  blockAlign: number;
  bitsPerSample: number;
}

function readFormatChunk(buf: Buffer, offset: number, size: number): FormatChunk {
  if (size < 16) throw new WavFormatError("fmt chunk too short");
  let format = buf.readUInt16LE(offset);
  if (format === FORMAT_EXTENSIBLE && size >= 26) {
    // First two bytes of the sub-format GUID carry the actual format tag
    format = buf.readUInt16LE(offset + 24);
  }
  return {
    format,
    channels: buf.readUInt16LE(offset + 2),
    sampleRate: buf.readUInt32LE(offset + 4),
    blockAlign: buf.readUInt16LE(offset + 12),
    bitsPerSample: buf.readUInt16LE(offset + 14),
  };
}

/**
 * Decode a WAV file held in memory.
 */
export function decodeWav(buf: Buffer): DecodedWav {
  if (buf.length < 12 || buf.toString("ascii", 0, 4) !== "RIFF" || buf.toString("ascii", 8, 12) !== "WAVE") {
    throw new WavFormatError("not a RIFF/WAVE file");
  }

  let fmt: FormatChunk | null = null;
  let dataOffset = -1;
  let dataSize = 0;

  let offset = 12;
  while (offset + 8 <= buf.length) {
    const id = buf.toString("ascii", offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === "fmt ") {
      fmt = readFormatChunk(buf, body, size);
    } else if (id === "data") {
      dataOffset = body;
      // Writers that were interrupted leave a placeholder size; trust the file length
      dataSize = Math.min(size, buf.length - body);
      break;
    }
    offset = body + size + (size % 2);
  }

  if (!fmt) throw new WavFormatError("missing fmt chunk");
  if (dataOffset < 0) throw new WavFormatError("missing data chunk");
  if (fmt.channels < 1 || fmt.sampleRate < 1 || fmt.blockAlign < 1) {
    throw new WavFormatError("invalid fmt chunk");
  }

  const isPcm16 = fmt.format === FORMAT_PCM && fmt.bitsPerSample === 16;
  const isFloat32 = fmt.format === FORMAT_IEEE_FLOAT && fmt.bitsPerSample === 32;
  if (!isPcm16 && !isFloat32) {
    throw new WavFormatError(`unsupported sample format ${fmt.format}/${fmt.bitsPerSample}-bit`);
  }

  const frames = Math.floor(dataSize / fmt.blockAlign);
  const samples = new Float32Array(frames);
  for (let i = 0; i < frames; i++) {
    const at = dataOffset + i * fmt.blockAlign;
    samples[i] = isPcm16 ? buf.readInt16LE(at) / 32768 : buf.readFloatLE(at);
  }

  return {
    sampleRate: fmt.sampleRate,
    channels: fmt.channels,
    bitsPerSample: fmt.bitsPerSample,
    frames,
    samples,
  };
}

/**
 * Encode mono samples (-1..1) as a 16-bit PCM WAV file.
 */
export function encodeWav(samples: ArrayLike<number>, sampleRate: number): Buffer {
  const dataSize = samples.length * 2;
  const buf = Buffer.alloc(44 + dataSize);

  buf.write("RIFF", 0, "ascii");
  buf.writeUInt32LE(36 + dataSize, 4);
  buf.write("WAVE", 8, "ascii");
  buf.write("fmt ", 12, "ascii");
  buf.writeUInt32LE(16, 16);
  buf.writeUInt16LE(FORMAT_PCM, 20);
  buf.writeUInt16LE(1, 22);
  buf.writeUInt32LE(sampleRate, 24);
  buf.writeUInt32LE(sampleRate * 2, 28);
  buf.writeUInt16LE(2, 32);
  buf.writeUInt16LE(16, 34);
  buf.write("data", 36, "ascii");
  buf.writeUInt32LE(dataSize, 40);

  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i] ?? 0));
    buf.writeInt16LE(Math.round(clamped * 32767), 44 + i * 2);
  }
  return buf;
}

/**
 * Peak absolute amplitude of little-endian 16-bit PCM, normalized to 0..1.
 */
export function peakLevelPcm16(chunk: Buffer): number {
  let peak = 0;
  for (let at = 0; at + 1 < chunk.length; at += 2) {
    const value = Math.abs(chunk.readInt16LE(at));
    if (value > peak) peak = value;
  }
  return Math.min(1, peak / 32768);
}
