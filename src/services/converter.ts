// ABOUTME: Converts a finished take into a transport-ready OGG/Opus file plus its waveform.
// ABOUTME: Failures are returned, not thrown: the raw take stays valid as a fallback payload.

import { readFile, rm } from "node:fs/promises";
import { extname } from "node:path";
import { type DecodedWav, WavFormatError, decodeWav } from "../audio/wav.js";
import { type ConversionFailure, ConversionError, errorMessage } from "../errors.js";
import { type ConvertedArtifact, type Take, WAVEFORM_BUCKETS, WAVEFORM_MAX } from "../types.js";
import type { AudioEncoder } from "./encoder.js";

export type ConversionResult =
  | { ok: true; artifact: ConvertedArtifact }
  | { ok: false; error: ConversionError };

/**
 * Anything that can turn a take into a sendable artifact.
 */
export interface TakeConverter {
  convert(take: Take): Promise<ConversionResult>;
}

/**
 * Bucket peak amplitudes into a fixed-length waveform.
 *
 * The sample span is split into `buckets` equal slices. Each slice's peak
 * absolute amplitude is scaled linearly against full scale (1.0) and rounded,
 * so values are monotonic in loudness and independent of the clip's own
 * maximum. Slices with no samples are 0.
 */
export function computeWaveform(samples: ArrayLike<number>, buckets = WAVEFORM_BUCKETS): number[] {
  const n = samples.length;
  const waveform: number[] = [];

  for (let i = 0; i < buckets; i++) {
    const start = Math.floor((i * n) / buckets);
    const end = Math.floor(((i + 1) * n) / buckets);

    let peak = 0;
    for (let j = start; j < end; j++) {
      const value = Math.abs(samples[j] ?? 0);
      if (value > peak) peak = value;
    }

    waveform.push(Math.min(WAVEFORM_MAX, Math.round(Math.min(1, peak) * WAVEFORM_MAX)));
  }

  return waveform;
}

function outputPathFor(rawPath: string): string {
  const ext = extname(rawPath);
  const base = ext ? rawPath.slice(0, -ext.length) : rawPath;
  return `${base}.ogg`;
}

export class Converter implements TakeConverter {
  constructor(private readonly encoder: AudioEncoder) {}

  async convert(take: Take): Promise<ConversionResult> {
    let source: Buffer;
    try {
      source = await readFile(take.rawPath);
    } catch (err) {
      return failure(`Cannot read recording: ${errorMessage(err)}`, "SOURCE_UNREADABLE", err);
    }

    if (source.length === 0) {
      return failure("Recording is empty", "EMPTY_SOURCE");
    }

    let decoded: DecodedWav;
    try {
      decoded = decodeWav(source);
    } catch (err) {
      const kind = err instanceof WavFormatError ? "UNSUPPORTED_FORMAT" : "SOURCE_UNREADABLE";
      return failure(`Cannot decode recording: ${errorMessage(err)}`, kind, err);
    }

    const durationSeconds = Math.round(decoded.frames / decoded.sampleRate);
    if (decoded.frames === 0 || durationSeconds === 0) {
      return failure("Recording is too short to encode", "EMPTY_SOURCE");
    }

    const outputPath = outputPathFor(take.rawPath);
    try {
      await this.encoder.encode(take.rawPath, outputPath);
    } catch (err) {
      await rm(outputPath, { force: true }).catch((rmErr: unknown) => {
        console.warn("[Converter] Could not remove partial output:", errorMessage(rmErr));
      });
      return failure(errorMessage(err), "ENCODER_FAILED", err);
    }

    const artifact: ConvertedArtifact = {
      path: outputPath,
      durationSeconds,
      waveform: computeWaveform(decoded.samples),
      takeId: take.id,
    };
    console.log(`[Converter] Converted ${take.id} to OGG/Opus (${durationSeconds}s)`);
    return { ok: true, artifact };
  }
}

function failure(
  message: string,
  kind: ConversionFailure,
  cause?: unknown,
): ConversionResult {
  console.warn(`[Converter] ${kind}: ${message}`);
  return { ok: false, error: new ConversionError(message, kind, { cause }) };
}
