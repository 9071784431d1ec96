// ABOUTME: End-to-end tests of the runtime over JSON-RPC: login gating, recording and sending.
// ABOUTME: Wires the real services to in-process device, encoder and transport stand-ins.

import { existsSync } from "node:fs";
import { mkdir, utimes, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadRuntimeConfig } from "../src/config.js";
import { clearAll, subscribe } from "../src/events.js";
import { registerAllHandlers } from "../src/handlers/index.js";
import { clearHandlers, handleMessage } from "../src/rpc.js";
import { type Runtime, createRuntime } from "../src/runtime.js";
import type { SendStatus } from "../src/types.js";
import {
  FakeCaptureDevice,
  FakeEncoder,
  FakeTransport,
  authUpdate,
  makeTempDir,
  removeDir,
  toneWav,
} from "./helpers/fakes.js";

let nextId = 1;

async function rpc(method: string, params?: unknown) {
  const raw = await handleMessage(JSON.stringify({ jsonrpc: "2.0", method, params, id: nextId++ }));
  if (raw === null) throw new Error("expected a response");
  return JSON.parse(raw);
}

describe("runtime", () => {
  let dir: string;
  let transport: FakeTransport;
  let device: FakeCaptureDevice;
  let runtime: Runtime;
  let statuses: SendStatus[];

  beforeEach(async () => {
    dir = await makeTempDir();
    transport = new FakeTransport();
    device = new FakeCaptureDevice();
    device.content = toneWav(5);
    const config = loadRuntimeConfig({
      VOICEWIRE_DATA_DIR: dir,
      VOICEWIRE_RUNTIME_TOKEN: "test-secret",
      VOICEWIRE_API_ID: "12345",
      VOICEWIRE_API_HASH: "test-hash",
    });
    runtime = await createRuntime(config, { transport, device, encoder: new FakeEncoder() });
    registerAllHandlers(runtime);
    statuses = [];
    subscribe("voice://status", (s) => statuses.push(s));
  });

  afterEach(async () => {
    await runtime.stop();
    clearHandlers();
    clearAll();
    await removeDir(dir);
  });

  async function signIn(): Promise<void> {
    transport.push(authUpdate("ready"));
    await rpc("select_chat", { chatId: "chat-1" });
    // Takes here are stopped right after they start
    await rpc("set_setting", { key: "minRecordingDurationSeconds", value: 0 });
  }

  it("connects the transport on start and closes it on stop", async () => {
    await runtime.start();
    expect(transport.connect).toHaveBeenCalledTimes(1);

    await runtime.stop();
    expect(transport.close).toHaveBeenCalledTimes(1);
  });

  it("answers session parameter requests", async () => {
    transport.push(authUpdate("waitParameters"));

    await vi.waitFor(() => expect(transport.setParameters).toHaveBeenCalledTimes(1));
    expect(transport.setParameters.mock.calls[0]?.[0]).toMatchObject({
      apiId: 12345,
      apiHash: "test-hash",
      databaseDirectory: join(dir, "session"),
      filesDirectory: join(dir, "files"),
    });
  });

  it("refuses to record before login", async () => {
    const response = await rpc("start_recording");
    expect(response.error).toEqual({
      code: -32000,
      message: "Messaging session is not ready (state: uninitialized)",
      data: { code: "TRANSPORT_UNAUTHENTICATED" },
    });
  });

  it("reports failed login steps in the auth snapshot", async () => {
    transport.push(authUpdate("waitPhoneNumber"));
    transport.submitPhoneNumber.mockRejectedValueOnce(new Error("PHONE_NUMBER_INVALID"));

    const response = await rpc("submit_phone_number", { phoneNumber: "+1000" });

    expect(response.result).toMatchObject({ state: "awaitingPhoneNumber", lastError: "PHONE_NUMBER_INVALID" });
  });

  it("records, converts and sends a voice message", async () => {
    await signIn();

    const started = await rpc("start_recording");
    expect(started.result.takeId).toEqual(expect.any(String));
    const stopped = await rpc("stop_recording");
    expect(stopped.result.take.id).toBe(started.result.takeId);
    await runtime.orchestrator.idle();

    expect(statuses.map((s) => s.kind)).toEqual(["converting", "sending", "sent"]);
    expect(transport.sendVoiceMessage).toHaveBeenCalledWith(
      expect.objectContaining({ chatId: "chat-1", durationSeconds: 5 }),
    );
    const state = await rpc("get_voice_state");
    expect(state.result).toMatchObject({ active: null, failed: [], recorder: { recording: false } });
  });

  it("holds incoming auto-play until the recorded take is sent", async () => {
    await signIn();
    const plays: string[] = [];
    const downloaded: string[] = [];
    subscribe("voice:auto-play", (p) => plays.push(p.message.messageId));
    subscribe("file:downloaded", (p) => downloaded.push(p.fileId));

    await rpc("start_recording");
    transport.push({
      type: "newMessage",
      message: {
        id: "in-1",
        chatId: "chat-1",
        senderId: "u2",
        isOutgoing: false,
        date: 1,
        text: null,
        voice: { fileId: "f1", durationSeconds: 2, waveform: null, localPath: null },
      },
    });
    await vi.waitFor(() => expect(downloaded).toEqual(["f1"]));
    expect(plays).toEqual([]);

    await rpc("stop_recording");
    await runtime.orchestrator.idle();

    expect(plays).toEqual(["in-1"]);
  });

  it("retries a failed send over RPC", async () => {
    await signIn();
    transport.sendVoiceMessage.mockRejectedValueOnce(new Error("network down"));
    await rpc("start_recording");
    await rpc("stop_recording");
    await runtime.orchestrator.idle();

    const attemptId = statuses[0]?.attemptId;
    const retried = await rpc("retry_send", { attemptId });

    expect(retried.result).toMatchObject({ id: attemptId, phase: "sent", attemptCount: 2 });
    expect(statuses.map((s) => s.kind)).toEqual(["converting", "sending", "sendFailed", "sending", "sent"]);
  });

  it("validates pipeline params", async () => {
    const bad = await rpc("retry_send", {});
    expect(bad.error.code).toBe(-32602);

    const missing = await rpc("discard_send", { attemptId: "nope" });
    expect(missing.error.data).toEqual({ code: "ATTEMPT_NOT_FOUND" });
  });

  it("lists chats into the session cache", async () => {
    transport.listChats.mockResolvedValueOnce([
      { id: "chat-1", title: "Alice", username: null, unreadCount: 1, lastMessageAt: 50 },
    ]);

    const before = await rpc("list_chats");
    expect(before.error.data).toEqual({ code: "TRANSPORT_UNAUTHENTICATED" });

    transport.push(authUpdate("ready"));
    const response = await rpc("list_chats", { limit: 10 });

    expect(response.result).toHaveLength(1);
    expect(transport.listChats).toHaveBeenCalledWith(10);
    expect(runtime.store.listChats().map((c) => c.title)).toEqual(["Alice"]);
  });

  it("downloads files through the session", async () => {
    transport.push(authUpdate("ready"));

    const response = await rpc("download_file", { fileId: "f9" });

    expect(response.result).toEqual({ localPath: "/downloads/f9.ogg" });
  });

  it("reads and validates settings", async () => {
    expect((await rpc("get_setting", { key: "autoPlay" })).result).toBe(true);
    expect((await rpc("set_setting", { key: "autoPlay", value: false })).result).toBe(false);

    const invalid = await rpc("set_setting", { key: "busyPolicy", value: "sometimes" });
    expect(invalid.error.data).toEqual({ code: "INVALID_SETTING" });
  });

  it("clears the session cache on logout", async () => {
    transport.push(authUpdate("ready"));
    await rpc("list_chats");

    transport.push(authUpdate("closed"));

    expect((await rpc("get_auth_state")).result.state).toBe("closed");
    expect(runtime.store.listChats()).toEqual([]);
  });
});

describe("runtime startup", () => {
  it("sweeps stale media left by a previous run", async () => {
    const dir = await makeTempDir();
    const mediaDir = join(dir, "media");
    await mkdir(mediaDir, { recursive: true });
    const stale = join(mediaDir, "take_old.wav");
    await writeFile(stale, "x");
    const twoHoursAgo = new Date(Date.now() - 2 * 60 * 60 * 1000);
    await utimes(stale, twoHoursAgo, twoHoursAgo);

    const runtime = await createRuntime(loadRuntimeConfig({ VOICEWIRE_DATA_DIR: dir }), {
      transport: new FakeTransport(),
      device: new FakeCaptureDevice(),
      encoder: new FakeEncoder(),
    });

    expect(existsSync(stale)).toBe(false);
    await runtime.stop();
    await removeDir(dir);
  });
});
