// ABOUTME: RPC handlers for the login flow: phone number, code, second factor and logout.
// ABOUTME: Submissions resolve with the current auth snapshot; failures arrive as auth:step-failed events.

import { z } from "zod";
import { parseParams } from "../rpc.js";
import type { AuthSnapshot, AuthStateMachine } from "../services/auth.js";

const PhoneParams = z.object({ phoneNumber: z.string().trim().min(3) });
const CodeParams = z.object({ code: z.string().trim().min(1) });
const PasswordParams = z.object({ password: z.string().min(1) });

export async function getAuthState(auth: AuthStateMachine): Promise<AuthSnapshot> {
  return auth.snapshot();
}

export async function submitPhoneNumber(auth: AuthStateMachine, params: unknown): Promise<AuthSnapshot> {
  const { phoneNumber } = parseParams(PhoneParams, params);
  await auth.submitPhoneNumber(phoneNumber);
  return auth.snapshot();
}

export async function submitCode(auth: AuthStateMachine, params: unknown): Promise<AuthSnapshot> {
  const { code } = parseParams(CodeParams, params);
  await auth.submitCode(code);
  return auth.snapshot();
}

export async function submitSecondFactor(auth: AuthStateMachine, params: unknown): Promise<AuthSnapshot> {
  const { password } = parseParams(PasswordParams, params);
  await auth.submitSecondFactor(password);
  return auth.snapshot();
}

export async function logOut(auth: AuthStateMachine): Promise<AuthSnapshot> {
  await auth.logOut();
  return auth.snapshot();
}
