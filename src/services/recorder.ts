// ABOUTME: Voice take recorder with silence detection and a max-duration ceiling.
// ABOUTME: Emits exactly one terminal event per start: finished, cancelled or failed.

import { randomUUID } from "node:crypto";
import { rm } from "node:fs/promises";
import { join } from "node:path";
import { DeviceUnavailableError, RecordingInProgressError, errorMessage } from "../errors.js";
import type { RecorderSnapshot, StopReason, Take } from "../types.js";
import type { CaptureDevice, CaptureSession } from "./capture.js";

export interface RecorderSettings {
  silenceDetection: boolean;
  silenceAmplitudeThreshold: number;
  silenceDurationMs: number;
  maxDurationMs: number;
}

export type RecorderEvent =
  | { type: "finished"; take: Take }
  | { type: "cancelled"; takeId: string }
  | { type: "failed"; takeId: string; error: DeviceUnavailableError };

export type RecorderListener = (event: RecorderEvent) => void;

export interface RecorderOptions {
  device: CaptureDevice;
  mediaDir: string;
  /** Read at every start so preference changes apply to the next take. */
  settings: () => RecorderSettings;
  sampleIntervalMs?: number;
  now?: () => number;
}

interface ActiveCapture {
  takeId: string;
  rawPath: string;
  startedAt: number;
  settings: RecorderSettings;
  session: CaptureSession | null;
  silenceStartedAt: number | null;
  level: number;
  sampleTimer: ReturnType<typeof setInterval> | null;
  ceilingTimer: ReturnType<typeof setTimeout> | null;
  /** Set once a stop, cancel or failure has been decided. */
  ending: boolean;
  /** Released before the device finished opening. */
  stopRequested: boolean;
  /** Settles once the device open has succeeded or failed. */
  opened: Promise<void>;
}

const DEFAULT_SAMPLE_INTERVAL_MS = 50;

export class Recorder {
  private readonly device: CaptureDevice;
  private readonly mediaDir: string;
  private readonly settings: () => RecorderSettings;
  private readonly sampleIntervalMs: number;
  private readonly now: () => number;
  private readonly listeners = new Set<RecorderListener>();
  private active: ActiveCapture | null = null;

  constructor(options: RecorderOptions) {
    this.device = options.device;
    this.mediaDir = options.mediaDir;
    this.settings = options.settings;
    this.sampleIntervalMs = options.sampleIntervalMs ?? DEFAULT_SAMPLE_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  onEvent(listener: RecorderListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  isRecording(): boolean {
    return this.active !== null;
  }

  snapshot(): RecorderSnapshot {
    const capture = this.active;
    if (!capture) {
      return { recording: false, takeId: null, elapsedMs: 0, level: 0 };
    }
    return {
      recording: true,
      takeId: capture.takeId,
      elapsedMs: this.now() - capture.startedAt,
      level: capture.level,
    };
  }

  /**
   * Open the capture device and begin a take. Resolves with the take id, or
   * null when the take was cancelled while the device was opening.
   */
  async start(): Promise<string | null> {
    if (this.active) {
      throw new RecordingInProgressError();
    }

    const takeId = randomUUID();
    let markOpened: () => void = () => {};
    const capture: ActiveCapture = {
      takeId,
      rawPath: join(this.mediaDir, `take_${takeId}.wav`),
      startedAt: this.now(),
      settings: this.settings(),
      session: null,
      silenceStartedAt: null,
      level: 0,
      sampleTimer: null,
      ceilingTimer: null,
      ending: false,
      stopRequested: false,
      opened: new Promise<void>((resolve) => {
        markOpened = resolve;
      }),
    };
    this.active = capture;

    try {
      capture.session = await this.device.open(capture.rawPath);
    } catch (err) {
      this.active = null;
      await removeQuietly(capture.rawPath);
      const error = new DeviceUnavailableError(`Microphone unavailable: ${errorMessage(err)}`, { cause: err });
      console.error("[Recorder] Failed to open capture device:", error.message);
      this.publish({ type: "failed", takeId, error });
      markOpened();
      throw error;
    }

    // Cancelled while the device was opening
    if (capture.ending) {
      await capture.session.abort().catch((err: unknown) => {
        console.warn("[Recorder] Abort after early cancel failed:", errorMessage(err));
      });
      await removeQuietly(capture.rawPath);
      this.active = null;
      markOpened();
      console.log(`[Recorder] Recording cancelled: ${takeId}`);
      this.publish({ type: "cancelled", takeId });
      return null;
    }

    capture.startedAt = this.now();
    markOpened();
    if (capture.stopRequested) {
      // stop() finishes the take once it sees the open settle
      console.log(`[Recorder] Recording started and released: ${takeId}`);
      return takeId;
    }

    capture.ceilingTimer = setTimeout(() => {
      void this.finish(capture, "maxDuration");
    }, capture.settings.maxDurationMs);
    capture.sampleTimer = setInterval(() => this.sample(capture), this.sampleIntervalMs);

    console.log(`[Recorder] Recording started: ${takeId}`);
    return takeId;
  }

  /**
   * End the take on user release. Resolves with the finished take, or null when
   * nothing was recording or the take could not be finalized.
   */
  async stop(): Promise<Take | null> {
    const capture = this.active;
    if (!capture || capture.ending) return null;
    if (!capture.session) {
      capture.stopRequested = true;
      await capture.opened;
    }
    return this.finish(capture, "released");
  }

  /**
   * End the take and throw it away.
   */
  async cancel(): Promise<void> {
    const capture = this.active;
    if (!capture || capture.ending) return;

    capture.ending = true;
    this.clearTimers(capture);

    if (!capture.session) {
      // start() aborts the device and reports the cancel once the open settles
      await capture.opened;
      return;
    }

    this.active = null;
    await capture.session.abort().catch((err: unknown) => {
      console.warn("[Recorder] Abort failed:", errorMessage(err));
    });
    await removeQuietly(capture.rawPath);

    console.log(`[Recorder] Recording cancelled: ${capture.takeId}`);
    this.publish({ type: "cancelled", takeId: capture.takeId });
  }

  private sample(capture: ActiveCapture): void {
    if (capture.ending || !capture.session) return;

    const t = this.now();
    const level = capture.session.level();
    capture.level = level;

    if (t - capture.startedAt >= capture.settings.maxDurationMs) {
      void this.finish(capture, "maxDuration");
      return;
    }

    if (!capture.settings.silenceDetection) return;

    if (level < capture.settings.silenceAmplitudeThreshold) {
      if (capture.silenceStartedAt === null) {
        capture.silenceStartedAt = t;
      } else if (t - capture.silenceStartedAt >= capture.settings.silenceDurationMs) {
        console.log("[Recorder] Silence detected, auto-stopping");
        void this.finish(capture, "silence");
      }
    } else {
      capture.silenceStartedAt = null;
    }
  }

  private async finish(capture: ActiveCapture, reason: StopReason): Promise<Take | null> {
    if (capture.ending || !capture.session) return null;
    capture.ending = true;
    this.clearTimers(capture);

    const stoppedAt = this.now();
    const elapsedMs = Math.min(stoppedAt - capture.startedAt, capture.settings.maxDurationMs);

    try {
      await capture.session.close();
    } catch (err) {
      this.active = null;
      await removeQuietly(capture.rawPath);
      const error = new DeviceUnavailableError(`Capture failed: ${errorMessage(err)}`, { cause: err });
      console.error("[Recorder] Failed to finalize take:", error.message);
      this.publish({ type: "failed", takeId: capture.takeId, error });
      return null;
    }

    this.active = null;
    const take: Take = {
      id: capture.takeId,
      rawPath: capture.rawPath,
      durationSeconds: Math.round(elapsedMs / 1000),
      durationMs: elapsedMs,
      stopReason: reason,
      autoStopped: reason === "silence",
      cancelled: false,
      createdAt: capture.startedAt,
    };

    console.log(`[Recorder] Recording stopped (${reason}). Duration: ${take.durationSeconds}s`);
    this.publish({ type: "finished", take });
    return take;
  }

  private clearTimers(capture: ActiveCapture): void {
    if (capture.sampleTimer) {
      clearInterval(capture.sampleTimer);
      capture.sampleTimer = null;
    }
    if (capture.ceilingTimer) {
      clearTimeout(capture.ceilingTimer);
      capture.ceilingTimer = null;
    }
  }

  private publish(event: RecorderEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error("[Recorder] Listener error:", err);
      }
    }
  }
}

async function removeQuietly(path: string): Promise<void> {
  await rm(path, { force: true }).catch((err: unknown) => {
    console.warn(`[Recorder] Could not remove ${path}:`, errorMessage(err));
  });
}
