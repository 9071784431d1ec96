// ABOUTME: Domain types for recorded takes, converted artifacts and send attempts.
// ABOUTME: Shared by the recorder, converter, orchestrator and RPC handlers.

import type { MessageHandle } from "./services/transport.js";

export const WAVEFORM_BUCKETS = 63;
export const WAVEFORM_MAX = 31;

export type StopReason = "released" | "silence" | "maxDuration";

/**
 * One recording attempt from start to stop.
 */
export interface Take {
  id: string;
  rawPath: string;
  /** Whole seconds, rounded. */
  durationSeconds: number;
  durationMs: number;
  stopReason: StopReason;
  autoStopped: boolean;
  cancelled: boolean;
  createdAt: number;
}

export interface ConvertedArtifact {
  path: string;
  durationSeconds: number;
  /** WAVEFORM_BUCKETS values in 0..WAVEFORM_MAX. */
  waveform: number[];
  takeId: string;
}

export type SendPayload =
  | { kind: "converted"; artifact: ConvertedArtifact }
  | { kind: "raw"; take: Take };

export type SendPhase =
  | "idle"
  | "converting"
  | "conversionFailed"
  | "sending"
  | "sent"
  | "sendFailed"
  | "discarded";

export interface SendAttemptSnapshot {
  id: string;
  takeId: string;
  chatId: string;
  phase: SendPhase;
  attemptCount: number;
  payloadKind: SendPayload["kind"] | null;
  lastError: string | null;
  createdAt: number;
}

/**
 * Status events for a single attempt, in emission order.
 */
export type SendStatus =
  | { kind: "converting"; attemptId: string; takeId: string }
  | { kind: "conversionFallback"; attemptId: string; reason: string }
  | { kind: "sending"; attemptId: string; attempt: number }
  | { kind: "sent"; attemptId: string; message: MessageHandle }
  | { kind: "sendFailed"; attemptId: string; reason: string; retryable: true }
  | { kind: "discarded"; attemptId: string };

export interface RecorderSnapshot {
  recording: boolean;
  takeId: string | null;
  elapsedMs: number;
  level: number;
}

export interface VoiceStateSnapshot {
  recorder: RecorderSnapshot;
  active: SendAttemptSnapshot | null;
  failed: SendAttemptSnapshot[];
}
