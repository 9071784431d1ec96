// ABOUTME: RPC handlers for the voice pipeline: recording control, retry and discard.
// ABOUTME: Thin wrappers over the send orchestrator with zod-validated params.

import { z } from "zod";
import { parseParams } from "../rpc.js";
import type { SendOrchestrator } from "../services/orchestrator.js";
import type { SendAttemptSnapshot, Take, VoiceStateSnapshot } from "../types.js";

const AttemptParams = z.object({ attemptId: z.string().min(1) });

export async function getVoiceState(orchestrator: SendOrchestrator): Promise<VoiceStateSnapshot> {
  return orchestrator.snapshot();
}

export async function startRecording(orchestrator: SendOrchestrator): Promise<{ takeId: string | null }> {
  const takeId = await orchestrator.startRecording();
  return { takeId };
}

export async function stopRecording(orchestrator: SendOrchestrator): Promise<{ take: Take | null }> {
  const take = await orchestrator.stopRecording();
  return { take };
}

export async function cancelRecording(orchestrator: SendOrchestrator): Promise<void> {
  await orchestrator.cancelRecording();
}

export async function retrySend(
  orchestrator: SendOrchestrator,
  params: unknown,
): Promise<SendAttemptSnapshot> {
  const { attemptId } = parseParams(AttemptParams, params);
  return orchestrator.retry(attemptId);
}

export async function discardSend(orchestrator: SendOrchestrator, params: unknown): Promise<void> {
  const { attemptId } = parseParams(AttemptParams, params);
  await orchestrator.discard(attemptId);
}
