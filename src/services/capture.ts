// ABOUTME: Capture device abstraction and the ffmpeg-backed microphone implementation.
// ABOUTME: ffmpeg writes the take to a WAV file and pipes a low-rate PCM copy for level metering.

import { type ChildProcess, spawn } from "node:child_process";
import { stat } from "node:fs/promises";
import { createInterface } from "node:readline";
import { peakLevelPcm16 } from "../audio/wav.js";
import type { CaptureInput } from "../config.js";

/**
 * An open capture writing to a file.
 */
export interface CaptureSession {
  /** Most recent normalized amplitude, 0..1. */
  level(): number;
  /** Stop capturing and finalize the file. */
  close(): Promise<void>;
  /** Stop capturing without finalizing; the file may be partial. */
  abort(): Promise<void>;
}

export interface CaptureDevice {
  open(outputPath: string): Promise<CaptureSession>;
}

const SAMPLE_RATE = 48_000;
const METER_SAMPLE_RATE = 16_000;
const OPEN_TIMEOUT_MS = 3000;
const CLOSE_TIMEOUT_MS = 5000;
const GRACEFUL_QUIT_EXIT_CODE = 255;
const WAV_HEADER_BYTES = 44;

export interface FfmpegCaptureOptions {
  ffmpegPath: string;
  input: CaptureInput;
}

function waitForExit(proc: ChildProcess, timeoutMs: number): Promise<number | null> {
  if (proc.exitCode !== null) return Promise.resolve(proc.exitCode);
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      proc.kill("SIGKILL");
    }, timeoutMs);
    proc.once("exit", (code) => {
      clearTimeout(timer);
      resolve(code);
    });
  });
}

/**
 * Whether ffmpeg finished writing the take. Some builds exit with 255 after a
 * graceful "q" even though the file is complete.
 */
export async function captureFinalized(code: number | null, outputPath: string): Promise<boolean> {
  if (code === 0) return true;
  if (code !== GRACEFUL_QUIT_EXIT_CODE) return false;
  try {
    const info = await stat(outputPath);
    return info.size > WAV_HEADER_BYTES;
  } catch {
    return false;
  }
}

class FfmpegCaptureSession implements CaptureSession {
  private latestLevel = 0;

  constructor(
    private readonly proc: ChildProcess,
    private readonly outputPath: string,
  ) {
    proc.stdout?.on("data", (chunk: Buffer) => {
      this.latestLevel = peakLevelPcm16(chunk);
    });
  }

  level(): number {
    return this.latestLevel;
  }

  async close(): Promise<void> {
    // "q" on stdin makes ffmpeg flush and write the final WAV header
    this.proc.stdin?.end("q");
    const code = await waitForExit(this.proc, CLOSE_TIMEOUT_MS);
    if (!(await captureFinalized(code, this.outputPath))) {
      throw new Error(`ffmpeg exited with code ${code} while finalizing capture`);
    }
  }

  async abort(): Promise<void> {
    this.proc.kill("SIGTERM");
    await waitForExit(this.proc, CLOSE_TIMEOUT_MS);
  }
}

/**
 * Microphone capture through an ffmpeg child process.
 */
export class FfmpegCaptureDevice implements CaptureDevice {
  constructor(private readonly options: FfmpegCaptureOptions) {}

  open(outputPath: string): Promise<CaptureSession> {
    const { ffmpegPath, input } = this.options;
    const args = [
      "-hide_banner",
      "-loglevel", "error",
      "-f", input.format,
      "-i", input.device,
      // Take file
      "-ac", "1",
      "-ar", String(SAMPLE_RATE),
      "-c:a", "pcm_s16le",
      "-y", outputPath,
      // Metering copy
      "-ac", "1",
      "-ar", String(METER_SAMPLE_RATE),
      "-f", "s16le",
      "pipe:1",
    ];

    const proc = spawn(ffmpegPath, args, { stdio: ["pipe", "pipe", "pipe"] });

    const stderrTail: string[] = [];
    if (proc.stderr) {
      const rl = createInterface({ input: proc.stderr });
      rl.on("line", (line: string) => {
        stderrTail.push(line);
        if (stderrTail.length > 5) stderrTail.shift();
        console.log(`[Capture stderr] ${line}`);
      });
    }

    return new Promise((resolve, reject) => {
      const fail = (reason: string) => {
        clearTimeout(timer);
        proc.kill("SIGKILL");
        reject(new Error(reason));
      };

      const timer = setTimeout(() => {
        fail("capture device did not produce audio in time");
      }, OPEN_TIMEOUT_MS);

      proc.once("error", (err) => fail(`failed to start ffmpeg: ${err.message}`));
      proc.once("exit", (code) => {
        const detail = stderrTail.length > 0 ? `: ${stderrTail.join(" | ")}` : "";
        fail(`ffmpeg exited with code ${code}${detail}`);
      });

      // First metered audio means the device is live
      proc.stdout?.once("data", () => {
        clearTimeout(timer);
        proc.removeAllListeners("exit");
        proc.removeAllListeners("error");
        proc.on("error", (err) => console.error("[Capture] ffmpeg error:", err.message));
        resolve(new FfmpegCaptureSession(proc, outputPath));
      });
    });
  }
}
