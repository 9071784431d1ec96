// ABOUTME: Authentication checks for UI clients connecting to the runtime WebSocket.
// ABOUTME: Clients must connect from localhost and send the runtime token as their first message.

import { timingSafeEqual } from "node:crypto";
import { z } from "zod";

const AuthMessageSchema = z.object({
  method: z.literal("auth"),
  params: z.object({ token: z.string() }),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
});

export type AuthAttempt =
  | { authenticated: true; requestId: string | number | null }
  | { authenticated: false };

export function isLocalhost(addr: string | undefined): boolean {
  return addr === "127.0.0.1" || addr === "::1" || addr === "::ffff:127.0.0.1";
}

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Check a client's first message against the runtime token.
 */
export function checkAuthMessage(raw: string, token: string): AuthAttempt {
  let message: unknown;
  try {
    message = JSON.parse(raw);
  } catch {
    return { authenticated: false };
  }

  const parsed = AuthMessageSchema.safeParse(message);
  if (!parsed.success || !tokensMatch(parsed.data.params.token, token)) {
    return { authenticated: false };
  }
  return { authenticated: true, requestId: parsed.data.id ?? null };
}
