// ABOUTME: Transport codec encoder: re-encodes a captured WAV take to OGG/Opus.
// ABOUTME: Runs ffmpeg as a child process; callers only see success or a rejected promise.

import { execFile } from "node:child_process";

export interface AudioEncoder {
  encode(inputPath: string, outputPath: string): Promise<void>;
}

const ENCODE_TIMEOUT_MS = 60_000;

export class FfmpegOpusEncoder implements AudioEncoder {
  constructor(
    private readonly ffmpegPath: string,
    private readonly bitrate = "32k",
  ) {}

  encode(inputPath: string, outputPath: string): Promise<void> {
    const args = [
      "-hide_banner",
      "-loglevel", "error",
      "-y",
      "-i", inputPath,
      "-ac", "1",
      "-ar", "48000",
      "-c:a", "libopus",
      "-b:a", this.bitrate,
      "-application", "voip",
      outputPath,
    ];

    return new Promise((resolve, reject) => {
      execFile(this.ffmpegPath, args, { timeout: ENCODE_TIMEOUT_MS }, (err, _stdout, stderr) => {
        if (err) {
          const detail = stderr.trim() || err.message;
          reject(new Error(`Opus encoding failed: ${detail}`));
        } else {
          resolve();
        }
      });
    });
  }
}
