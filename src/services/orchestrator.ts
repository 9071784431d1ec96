// ABOUTME: Drives each finished take through convert -> send, with fallback, retry and discard.
// ABOUTME: Owns all send attempts and pushes their status events in order.

import { randomUUID } from "node:crypto";
import type { Settings } from "../config.js";
import {
  AttemptInFlightError,
  AttemptNotFoundError,
  ConversionError,
  NoTargetChatError,
  RecordingInProgressError,
  TransportUnauthenticatedError,
  errorMessage,
} from "../errors.js";
import type { EmitFn } from "../events.js";
import type {
  SendAttemptSnapshot,
  SendPayload,
  SendPhase,
  SendStatus,
  Take,
  VoiceStateSnapshot,
} from "../types.js";
import type { AuthStateMachine } from "./auth.js";
import type { ConversionResult, TakeConverter } from "./converter.js";
import type { Recorder, RecorderEvent } from "./recorder.js";
import type { StatusSink } from "./status.js";
import { purgeFiles } from "./temp-files.js";
import type { SendVoiceMessageRequest, SessionOperations } from "./transport.js";

export type OrchestratorSettings = Pick<
  Settings,
  "busyPolicy" | "failedAttemptPolicy" | "hapticFeedback" | "targetChatId" | "minRecordingDurationSeconds"
>;

/**
 * Whether the voice pipeline is using the microphone or the network, and when it stops.
 */
export interface PipelineActivity {
  isBusy(): boolean;
  onIdle(listener: () => void): () => void;
}

export interface SendOrchestratorOptions {
  recorder: Recorder;
  converter: TakeConverter;
  transport: Pick<SessionOperations, "sendVoiceMessage">;
  auth: Pick<AuthStateMachine, "state">;
  status: StatusSink;
  settings: () => OrchestratorSettings;
  emit: EmitFn;
  purge?: (paths: Iterable<string>) => Promise<void>;
  now?: () => number;
}

interface SendAttempt {
  id: string;
  take: Take;
  chatId: string;
  phase: SendPhase;
  attemptCount: number;
  payload: SendPayload | null;
  lastError: string | null;
  createdAt: number;
  /** Discarded while converting or sending; the pending result is dropped. */
  withdrawn: boolean;
  files: Set<string>;
}

function toSnapshot(attempt: SendAttempt): SendAttemptSnapshot {
  return {
    id: attempt.id,
    takeId: attempt.take.id,
    chatId: attempt.chatId,
    phase: attempt.phase,
    attemptCount: attempt.attemptCount,
    payloadKind: attempt.payload?.kind ?? null,
    lastError: attempt.lastError,
    createdAt: attempt.createdAt,
  };
}

function requestFor(chatId: string, payload: SendPayload): SendVoiceMessageRequest {
  if (payload.kind === "converted") {
    return {
      chatId,
      path: payload.artifact.path,
      durationSeconds: payload.artifact.durationSeconds,
      waveform: payload.artifact.waveform,
    };
  }
  return {
    chatId,
    path: payload.take.rawPath,
    durationSeconds: payload.take.durationSeconds,
  };
}

export class SendOrchestrator implements PipelineActivity {
  private active: SendAttempt | null = null;
  private readonly failed = new Map<string, SendAttempt>();
  private readonly tasks = new Set<Promise<void>>();
  private readonly idleListeners = new Set<() => void>();
  private recordingChatId: string | null = null;
  private starting = false;
  private readonly detachRecorder: () => void;

  private readonly recorder: Recorder;
  private readonly converter: TakeConverter;
  private readonly transport: Pick<SessionOperations, "sendVoiceMessage">;
  private readonly auth: Pick<AuthStateMachine, "state">;
  private readonly status: StatusSink;
  private readonly settings: () => OrchestratorSettings;
  private readonly emit: EmitFn;
  private readonly purge: (paths: Iterable<string>) => Promise<void>;
  private readonly now: () => number;

  constructor(options: SendOrchestratorOptions) {
    this.recorder = options.recorder;
    this.converter = options.converter;
    this.transport = options.transport;
    this.auth = options.auth;
    this.status = options.status;
    this.settings = options.settings;
    this.emit = options.emit;
    this.purge = options.purge ?? purgeFiles;
    this.now = options.now ?? Date.now;
    this.detachRecorder = this.recorder.onEvent((event) => this.handleRecorderEvent(event));
  }

  snapshot(): VoiceStateSnapshot {
    return {
      recorder: this.recorder.snapshot(),
      active: this.active ? toSnapshot(this.active) : null,
      failed: [...this.failed.values()].map(toSnapshot),
    };
  }

  /** True while a take is starting or recording, or an attempt is converting or sending. */
  isBusy(): boolean {
    return this.starting || this.recorder.isRecording() || this.active !== null;
  }

  onIdle(listener: () => void): () => void {
    this.idleListeners.add(listener);
    return () => {
      this.idleListeners.delete(listener);
    };
  }

  /**
   * Begin a new take for the selected chat. Resolves with the take id, or null
   * when the take was cancelled before the microphone opened.
   */
  async startRecording(): Promise<string | null> {
    if (this.auth.state !== "ready") {
      throw new TransportUnauthenticatedError(this.auth.state);
    }
    const settings = this.settings();
    const chatId = settings.targetChatId;
    if (!chatId) {
      throw new NoTargetChatError();
    }
    if (this.recorder.isRecording()) {
      throw new RecordingInProgressError();
    }

    if (this.active && settings.busyPolicy === "reject") {
      throw new AttemptInFlightError(this.active.id);
    }

    this.starting = true;
    try {
      if (this.active) {
        console.log(`[SendOrchestrator] Withdrawing ${this.active.id} for a new recording`);
        await this.withdraw(this.active);
      }

      if (settings.failedAttemptPolicy === "discard") {
        for (const attempt of [...this.failed.values()]) {
          await this.discardFailed(attempt);
        }
      }

      this.recordingChatId = chatId;
      const takeId = await this.recorder.start();
      if (takeId === null) {
        console.log("[SendOrchestrator] Take cancelled before the microphone opened");
        return null;
      }
      this.emit("recording:started", { takeId });
      if (settings.hapticFeedback) {
        this.emit("feedback:haptic", { style: "medium" });
      }
      return takeId;
    } finally {
      this.starting = false;
      this.notifyIfIdle();
    }
  }

  stopRecording(): Promise<Take | null> {
    return this.recorder.stop();
  }

  cancelRecording(): Promise<void> {
    return this.recorder.cancel();
  }

  /**
   * Re-send a failed attempt with the payload it already has.
   * Resolves with the attempt's state once the send settles.
   */
  async retry(attemptId: string): Promise<SendAttemptSnapshot> {
    const attempt = this.failed.get(attemptId);
    if (!attempt) {
      if (this.active?.id === attemptId) throw new AttemptInFlightError(attemptId);
      throw new AttemptNotFoundError(attemptId);
    }
    if (this.active) {
      throw new AttemptInFlightError(this.active.id);
    }
    if (this.recorder.isRecording()) {
      throw new RecordingInProgressError();
    }
    if (this.auth.state !== "ready") {
      throw new TransportUnauthenticatedError(this.auth.state);
    }

    this.failed.delete(attemptId);
    console.log(`[SendOrchestrator] Retrying ${attemptId}`);
    await this.track(this.send(attempt));
    return toSnapshot(attempt);
  }

  /**
   * Drop an attempt. Failed attempts are removed at once; an attempt that is
   * converting or sending is withdrawn and its pending result ignored.
   */
  async discard(attemptId: string): Promise<void> {
    const failed = this.failed.get(attemptId);
    if (failed) {
      await this.discardFailed(failed);
      return;
    }
    if (this.active?.id === attemptId) {
      await this.withdraw(this.active);
      return;
    }
    throw new AttemptNotFoundError(attemptId);
  }

  /**
   * Resolves once every in-flight conversion and send has settled.
   */
  async idle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  dispose(): void {
    this.detachRecorder();
  }

  private handleRecorderEvent(event: RecorderEvent): void {
    const chatId = this.recordingChatId;
    this.recordingChatId = null;

    switch (event.type) {
      case "finished": {
        if (this.settings().hapticFeedback) {
          this.emit("feedback:haptic", { style: "light" });
        }
        if (event.take.autoStopped) {
          this.emit("recording:auto-stopped", undefined);
        }
        if (!chatId) {
          console.warn(`[SendOrchestrator] Take ${event.take.id} has no target chat, dropping`);
          void this.track(this.purge([event.take.rawPath]));
          this.notifyIfIdle();
          return;
        }
        const minMs = this.settings().minRecordingDurationSeconds * 1000;
        if (event.take.durationMs < minMs) {
          console.log(`[SendOrchestrator] Take ${event.take.id} too short (${event.take.durationMs}ms), discarding`);
          this.emit("recording:too-short", { takeId: event.take.id, durationMs: event.take.durationMs });
          void this.track(this.purge([event.take.rawPath]));
          this.notifyIfIdle();
          return;
        }
        void this.track(this.process(event.take, chatId));
        break;
      }
      case "failed":
        this.emit("recording:failed", { reason: event.error.message });
        this.notifyIfIdle();
        break;
      case "cancelled":
        this.notifyIfIdle();
        break;
    }
  }

  private async process(take: Take, chatId: string): Promise<void> {
    const attempt: SendAttempt = {
      id: randomUUID(),
      take,
      chatId,
      phase: "converting",
      attemptCount: 0,
      payload: null,
      lastError: null,
      createdAt: this.now(),
      withdrawn: false,
      files: new Set([take.rawPath]),
    };
    this.active = attempt;
    this.push({ kind: "converting", attemptId: attempt.id, takeId: take.id });

    const result = await this.convert(take);
    if (result.ok) {
      attempt.files.add(result.artifact.path);
    }
    if (attempt.withdrawn) {
      await this.purge(attempt.files);
      return;
    }

    if (result.ok) {
      attempt.payload = { kind: "converted", artifact: result.artifact };
      attempt.files.delete(take.rawPath);
      await this.purge([take.rawPath]);
    } else {
      attempt.payload = { kind: "raw", take };
      attempt.phase = "conversionFailed";
      attempt.lastError = result.error.message;
      console.warn(`[SendOrchestrator] Conversion failed, sending raw recording: ${result.error.message}`);
      this.push({ kind: "conversionFallback", attemptId: attempt.id, reason: result.error.message });
    }

    await this.send(attempt);
  }

  /** Converter exceptions become ordinary conversion failures, which fall back to the raw take. */
  private async convert(take: Take): Promise<ConversionResult> {
    try {
      return await this.converter.convert(take);
    } catch (err) {
      const error =
        err instanceof ConversionError
          ? err
          : new ConversionError(`Conversion failed: ${errorMessage(err)}`, "ENCODER_FAILED", { cause: err });
      return { ok: false, error };
    }
  }

  private async send(attempt: SendAttempt): Promise<void> {
    const payload = attempt.payload;
    if (!payload) return;

    attempt.phase = "sending";
    attempt.attemptCount++;
    this.active = attempt;
    this.push({ kind: "sending", attemptId: attempt.id, attempt: attempt.attemptCount });

    try {
      const handle = await this.transport.sendVoiceMessage(requestFor(attempt.chatId, payload));
      if (attempt.withdrawn) {
        console.log(`[SendOrchestrator] Withdrawn attempt ${attempt.id} was delivered anyway`);
        await this.purge(attempt.files);
        return;
      }
      attempt.phase = "sent";
      attempt.lastError = null;
      this.active = null;
      await this.purge(attempt.files);
      console.log(`[SendOrchestrator] Sent ${attempt.id} as message ${handle.messageId}`);
      this.push({ kind: "sent", attemptId: attempt.id, message: handle });
      this.notifyIfIdle();
    } catch (err) {
      if (attempt.withdrawn) {
        await this.purge(attempt.files);
        return;
      }
      const reason = errorMessage(err);
      attempt.phase = "sendFailed";
      attempt.lastError = reason;
      this.active = null;
      this.failed.set(attempt.id, attempt);
      console.warn(`[SendOrchestrator] Send failed for ${attempt.id}: ${reason}`);
      this.push({ kind: "sendFailed", attemptId: attempt.id, reason, retryable: true });
      this.notifyIfIdle();
    }
  }

  private async withdraw(attempt: SendAttempt): Promise<void> {
    attempt.withdrawn = true;
    attempt.phase = "discarded";
    if (this.active === attempt) {
      this.active = null;
    }
    await this.purge(attempt.files);
    this.push({ kind: "discarded", attemptId: attempt.id });
    this.notifyIfIdle();
  }

  private async discardFailed(attempt: SendAttempt): Promise<void> {
    this.failed.delete(attempt.id);
    attempt.phase = "discarded";
    await this.purge(attempt.files);
    console.log(`[SendOrchestrator] Discarded ${attempt.id}`);
    this.push({ kind: "discarded", attemptId: attempt.id });
  }

  private notifyIfIdle(): void {
    if (this.isBusy()) return;
    for (const listener of this.idleListeners) {
      try {
        listener();
      } catch (err) {
        console.error("[SendOrchestrator] Idle listener error:", err);
      }
    }
  }

  private push(status: SendStatus): void {
    this.status.push(status);
  }

  private track(task: Promise<void>): Promise<void> {
    const tracked = task
      .catch((err: unknown) => {
        console.error("[SendOrchestrator] Pipeline error:", err);
      })
      .finally(() => {
        this.tasks.delete(tracked);
      });
    this.tasks.add(tracked);
    return tracked;
  }
}
