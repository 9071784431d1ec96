// ABOUTME: Tests for take conversion and waveform bucketing.
// ABOUTME: Uses real WAV files in a temp directory and an in-process encoder.

import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { encodeWav } from "../../src/audio/wav.js";
import { Converter, computeWaveform } from "../../src/services/converter.js";
import type { Take } from "../../src/types.js";
import { FakeEncoder, SAMPLE_RATE, makeTempDir, removeDir, toneWav } from "../helpers/fakes.js";

function takeAt(rawPath: string): Take {
  return {
    id: "take-1",
    rawPath,
    durationSeconds: 1,
    durationMs: 1000,
    stopReason: "released",
    autoStopped: false,
    cancelled: false,
    createdAt: 0,
  };
}

describe("computeWaveform", () => {
  it("always yields 63 buckets", () => {
    expect(computeWaveform(new Float32Array(1000).fill(0.5))).toHaveLength(63);
    expect(computeWaveform([])).toEqual(new Array(63).fill(0));
  });

  it("quantizes peaks linearly against full scale", () => {
    expect(computeWaveform(new Array(63).fill(1))).toEqual(new Array(63).fill(31));
    expect(computeWaveform(new Array(63).fill(0.5))[0]).toBe(16);
    expect(computeWaveform(new Array(63).fill(0.25))[0]).toBe(8);
    expect(computeWaveform(new Array(63).fill(0))[0]).toBe(0);
  });

  it("uses absolute amplitude and clips above full scale", () => {
    expect(computeWaveform(new Array(63).fill(-0.5))[0]).toBe(16);
    expect(computeWaveform(new Array(63).fill(1.7))[0]).toBe(31);
  });

  it("is monotonic in loudness", () => {
    const quiet = computeWaveform(new Array(630).fill(0.1));
    const loud = computeWaveform(new Array(630).fill(0.6));
    quiet.forEach((value, i) => expect(loud[i]).toBeGreaterThanOrEqual(value));
  });

  it("leaves empty slices at zero when there are fewer samples than buckets", () => {
    const waveform = computeWaveform([1]);
    expect(waveform[62]).toBe(31);
    expect(waveform.slice(0, 62)).toEqual(new Array(62).fill(0));
  });

  it("keeps each slice's own peak", () => {
    const samples = new Array(126).fill(0);
    samples[0] = 1;
    samples[125] = 0.5;
    const waveform = computeWaveform(samples);
    expect(waveform[0]).toBe(31);
    expect(waveform[62]).toBe(16);
    expect(waveform.slice(1, 62)).toEqual(new Array(61).fill(0));
  });
});

describe("Converter", () => {
  let dir: string;
  let encoder: FakeEncoder;
  let converter: Converter;

  beforeEach(async () => {
    dir = await makeTempDir();
    encoder = new FakeEncoder();
    converter = new Converter(encoder);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("encodes a take and computes its waveform", async () => {
    const rawPath = join(dir, "take.wav");
    await writeFile(rawPath, toneWav(5));

    const result = await converter.convert(takeAt(rawPath));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.artifact).toEqual({
      path: join(dir, "take.ogg"),
      durationSeconds: 5,
      waveform: new Array(63).fill(16),
      takeId: "take-1",
    });
    expect(encoder.calls).toEqual([{ inputPath: rawPath, outputPath: join(dir, "take.ogg") }]);
    expect(existsSync(rawPath)).toBe(true);
  });

  it("fails with EMPTY_SOURCE for a zero-byte recording", async () => {
    const rawPath = join(dir, "take.wav");
    await writeFile(rawPath, Buffer.alloc(0));

    const result = await converter.convert(takeAt(rawPath));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.failure).toBe("EMPTY_SOURCE");
    expect(result.error.message).toBe("Recording is empty");
    expect(encoder.calls).toEqual([]);
  });

  it("fails with EMPTY_SOURCE when the take rounds to zero seconds", async () => {
    const rawPath = join(dir, "take.wav");
    await writeFile(rawPath, encodeWav(new Float32Array(100).fill(0.5), SAMPLE_RATE));

    const result = await converter.convert(takeAt(rawPath));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.failure).toBe("EMPTY_SOURCE");
    expect(result.error.message).toBe("Recording is too short to encode");
  });

  it("fails with SOURCE_UNREADABLE when the file is missing", async () => {
    const result = await converter.convert(takeAt(join(dir, "missing.wav")));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.failure).toBe("SOURCE_UNREADABLE");
    expect(result.error.recoverable).toBe(true);
  });

  it("fails with UNSUPPORTED_FORMAT for a non-WAV file", async () => {
    const rawPath = join(dir, "take.wav");
    await writeFile(rawPath, "definitely not audio");

    const result = await converter.convert(takeAt(rawPath));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.failure).toBe("UNSUPPORTED_FORMAT");
    expect(result.error.message).toBe("Cannot decode recording: not a RIFF/WAVE file");
  });

  it("removes partial output when the encoder fails", async () => {
    const rawPath = join(dir, "take.wav");
    await writeFile(rawPath, toneWav(2));
    encoder.error = new Error("Opus encoding failed: no libopus");

    const result = await converter.convert(takeAt(rawPath));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.failure).toBe("ENCODER_FAILED");
    expect(result.error.message).toBe("Opus encoding failed: no libopus");
    expect(existsSync(join(dir, "take.ogg"))).toBe(false);
    expect(existsSync(rawPath)).toBe(true);
  });
});
