// ABOUTME: Tests for the runtime event bus.
// ABOUTME: Verifies pub/sub and WebSocket broadcast behavior.

import { once } from "node:events";
import { afterEach, describe, expect, it, vi } from "vitest";
import { WebSocket, WebSocketServer } from "ws";
import { addClient, clearAll, emit, subscribe } from "../src/events.js";

describe("events", () => {
  afterEach(() => {
    clearAll();
  });

  it("delivers events to local subscribers", () => {
    const callback = vi.fn();
    subscribe("recording:started", callback);
    emit("recording:started", { takeId: "t1" });
    expect(callback).toHaveBeenCalledWith({ takeId: "t1" });
  });

  it("supports multiple subscribers for same event", () => {
    const cb1 = vi.fn();
    const cb2 = vi.fn();
    subscribe("feedback:haptic", cb1);
    subscribe("feedback:haptic", cb2);
    emit("feedback:haptic", { style: "light" });
    expect(cb1).toHaveBeenCalledWith({ style: "light" });
    expect(cb2).toHaveBeenCalledWith({ style: "light" });
  });

  it("unsubscribe stops delivery", () => {
    const callback = vi.fn();
    const unsub = subscribe("recording:started", callback);
    unsub();
    emit("recording:started", { takeId: "t1" });
    expect(callback).not.toHaveBeenCalled();
  });

  it("does not deliver events for different event names", () => {
    const callback = vi.fn();
    subscribe("recording:started", callback);
    emit("recording:failed", { reason: "no mic" });
    expect(callback).not.toHaveBeenCalled();
  });

  it("handles events without params", () => {
    const callback = vi.fn();
    subscribe("recording:auto-stopped", callback);
    emit("recording:auto-stopped", undefined);
    expect(callback).toHaveBeenCalledWith(undefined);
  });

  it("keeps delivering when a subscriber throws", () => {
    const callback = vi.fn();
    subscribe("recording:started", () => {
      throw new Error("broken subscriber");
    });
    subscribe("recording:started", callback);
    emit("recording:started", { takeId: "t1" });
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it("broadcasts JSON-RPC notifications to registered clients", async () => {
    const wss = new WebSocketServer({ port: 0, host: "127.0.0.1" });
    await once(wss, "listening");
    const address = wss.address();
    if (typeof address === "string") throw new Error("expected a TCP address");

    const connected = once(wss, "connection");
    const client = new WebSocket(`ws://127.0.0.1:${address.port}`);
    const [serverSide] = await connected;
    if (client.readyState !== WebSocket.OPEN) await once(client, "open");
    addClient(serverSide);

    const received: unknown[] = [];
    const gotTwo = new Promise<void>((resolve) => {
      client.on("message", (data) => {
        received.push(JSON.parse(data.toString()));
        if (received.length === 2) resolve();
      });
    });

    emit("voice://status", { kind: "discarded", attemptId: "a1" });
    emit("recording:auto-stopped", undefined);
    await gotTwo;

    expect(received).toEqual([
      { jsonrpc: "2.0", method: "voice://status", params: { kind: "discarded", attemptId: "a1" } },
      { jsonrpc: "2.0", method: "recording:auto-stopped", params: null },
    ]);

    client.close();
    await new Promise<void>((resolve) => wss.close(() => resolve()));
  });
});
