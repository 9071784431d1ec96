// ABOUTME: Security tests for UI client authentication on the runtime WebSocket.
// ABOUTME: Validates the first-message token check and the localhost filter.

import { describe, expect, it } from "vitest";
import { checkAuthMessage, isLocalhost } from "../src/client-auth.js";

const TOKEN = "test-secret";

describe("checkAuthMessage", () => {
  it("accepts the runtime token and echoes the request id", () => {
    const raw = JSON.stringify({ jsonrpc: "2.0", method: "auth", params: { token: TOKEN }, id: 1 });
    expect(checkAuthMessage(raw, TOKEN)).toEqual({ authenticated: true, requestId: 1 });
  });

  it("accepts an auth notification without id", () => {
    const raw = JSON.stringify({ method: "auth", params: { token: TOKEN } });
    expect(checkAuthMessage(raw, TOKEN)).toEqual({ authenticated: true, requestId: null });
  });

  it("rejects a wrong token", () => {
    const raw = JSON.stringify({ method: "auth", params: { token: "wrong-secret" }, id: 1 });
    expect(checkAuthMessage(raw, TOKEN)).toEqual({ authenticated: false });
  });

  it("rejects a token of a different length", () => {
    const raw = JSON.stringify({ method: "auth", params: { token: "x" }, id: 1 });
    expect(checkAuthMessage(raw, TOKEN)).toEqual({ authenticated: false });
  });

  it("rejects any other method as first message", () => {
    const raw = JSON.stringify({ method: "start_recording", params: { token: TOKEN }, id: 1 });
    expect(checkAuthMessage(raw, TOKEN)).toEqual({ authenticated: false });
  });

  it("rejects malformed JSON", () => {
    expect(checkAuthMessage("{not json", TOKEN)).toEqual({ authenticated: false });
  });
});

describe("isLocalhost", () => {
  it("accepts loopback addresses", () => {
    expect(isLocalhost("127.0.0.1")).toBe(true);
    expect(isLocalhost("::1")).toBe(true);
    expect(isLocalhost("::ffff:127.0.0.1")).toBe(true);
  });

  it("rejects everything else", () => {
    expect(isLocalhost("192.168.1.10")).toBe(false);
    expect(isLocalhost(undefined)).toBe(false);
  });
});
