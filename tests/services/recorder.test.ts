// ABOUTME: Tests for the take recorder: release, silence auto-stop, max duration and cancel.
// ABOUTME: Drives sampling with fake timers against an in-process capture device.

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DeviceUnavailableError, RecordingInProgressError } from "../../src/errors.js";
import { Recorder, type RecorderEvent, type RecorderSettings } from "../../src/services/recorder.js";
import { FakeCaptureDevice, deferred } from "../helpers/fakes.js";

const MEDIA_DIR = "/tmp/voicewire-recorder-test";

describe("Recorder", () => {
  let device: FakeCaptureDevice;
  let settings: RecorderSettings;
  let recorder: Recorder;
  let events: RecorderEvent[];

  beforeEach(() => {
    vi.useFakeTimers();
    device = new FakeCaptureDevice();
    device.content = null;
    settings = {
      silenceDetection: true,
      silenceAmplitudeThreshold: 0.02,
      silenceDurationMs: 2000,
      maxDurationMs: 60_000,
    };
    recorder = new Recorder({
      device,
      mediaDir: MEDIA_DIR,
      settings: () => settings,
      now: () => Date.now(),
    });
    events = [];
    recorder.onEvent((e) => events.push(e));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("finishes a released take with its rounded duration", async () => {
    const takeId = await recorder.start();
    expect(recorder.isRecording()).toBe(true);
    expect(device.opened).toEqual([`${MEDIA_DIR}/take_${takeId}.wav`]);

    await vi.advanceTimersByTimeAsync(3000);
    const take = await recorder.stop();

    expect(take).toMatchObject({
      id: takeId,
      durationSeconds: 3,
      stopReason: "released",
      autoStopped: false,
      cancelled: false,
    });
    expect(recorder.isRecording()).toBe(false);
    expect(events).toEqual([{ type: "finished", take }]);
  });

  it("auto-stops after sustained silence", async () => {
    await recorder.start();

    await vi.advanceTimersByTimeAsync(6000);
    device.level = 0;
    await vi.advanceTimersByTimeAsync(2100);

    expect(recorder.isRecording()).toBe(false);
    expect(events).toHaveLength(1);
    const event = events[0];
    expect(event?.type).toBe("finished");
    if (event?.type !== "finished") return;
    expect(event.take.stopReason).toBe("silence");
    expect(event.take.autoStopped).toBe(true);
    expect(event.take.durationSeconds).toBe(8);
  });

  it("resets the silence window when sound returns", async () => {
    await recorder.start();

    device.level = 0;
    await vi.advanceTimersByTimeAsync(1500);
    device.level = 0.5;
    await vi.advanceTimersByTimeAsync(100);
    device.level = 0;
    await vi.advanceTimersByTimeAsync(1500);

    expect(recorder.isRecording()).toBe(true);
    expect(events).toEqual([]);
  });

  it("ignores silence when detection is disabled", async () => {
    settings = { ...settings, silenceDetection: false };
    device.level = 0;
    await recorder.start();

    await vi.advanceTimersByTimeAsync(10_000);

    expect(recorder.isRecording()).toBe(true);
  });

  it("stops at the max-duration ceiling", async () => {
    settings = { ...settings, maxDurationMs: 5000 };
    await recorder.start();

    await vi.advanceTimersByTimeAsync(5000);

    expect(recorder.isRecording()).toBe(false);
    const event = events[0];
    expect(event?.type).toBe("finished");
    if (event?.type !== "finished") return;
    expect(event.take.stopReason).toBe("maxDuration");
    expect(event.take.durationSeconds).toBe(5);
  });

  it("emits exactly one terminal event per take", async () => {
    await recorder.start();
    await vi.advanceTimersByTimeAsync(1000);
    await recorder.stop();

    device.level = 0;
    await vi.advanceTimersByTimeAsync(10_000);

    expect(await recorder.stop()).toBeNull();
    expect(events).toHaveLength(1);
  });

  it("rejects a second start while capturing", async () => {
    await recorder.start();
    await expect(recorder.start()).rejects.toBeInstanceOf(RecordingInProgressError);
  });

  it("reports an unavailable device once and stays idle", async () => {
    device.openError = new Error("permission denied");

    await expect(recorder.start()).rejects.toBeInstanceOf(DeviceUnavailableError);

    expect(recorder.isRecording()).toBe(false);
    expect(events).toHaveLength(1);
    const event = events[0];
    expect(event?.type).toBe("failed");
    if (event?.type !== "failed") return;
    expect(event.error.message).toBe("Microphone unavailable: permission denied");
  });

  it("fails the take when the device cannot finalize it", async () => {
    device.closeError = new Error("device unplugged");
    await recorder.start();

    expect(await recorder.stop()).toBeNull();

    expect(events.map((e) => e.type)).toEqual(["failed"]);
    expect(recorder.isRecording()).toBe(false);
  });

  it("finishes a take released while the device is still opening", async () => {
    const gate = deferred<void>();
    device.openGate = gate.promise;

    const starting = recorder.start();
    const stopping = recorder.stop();
    gate.resolve();
    const takeId = await starting;
    const take = await stopping;

    expect(take).toMatchObject({ id: takeId, stopReason: "released", durationMs: 0 });
    expect(recorder.isRecording()).toBe(false);
    expect(events).toEqual([{ type: "finished", take }]);
  });

  it("holds the take slot until a cancel during open has aborted the device", async () => {
    const gate = deferred<void>();
    device.openGate = gate.promise;

    const starting = recorder.start();
    const cancelling = recorder.cancel();
    await expect(recorder.start()).rejects.toBeInstanceOf(RecordingInProgressError);
    expect(recorder.isRecording()).toBe(true);

    gate.resolve();
    expect(await starting).toBeNull();
    await cancelling;

    expect(device.openCalls).toBe(1);
    expect(device.aborts).toBe(1);
    expect(recorder.isRecording()).toBe(false);
    expect(events).toEqual([{ type: "cancelled", takeId: expect.any(String) }]);
  });

  it("resolves a pending stop with null when the device fails to open", async () => {
    const gate = deferred<void>();
    device.openGate = gate.promise;
    device.openError = new Error("busy");

    const starting = recorder.start();
    const stopping = recorder.stop();
    gate.resolve();

    await expect(starting).rejects.toBeInstanceOf(DeviceUnavailableError);
    expect(await stopping).toBeNull();
    expect(events.map((e) => e.type)).toEqual(["failed"]);
  });

  it("cancels without producing a take", async () => {
    const takeId = await recorder.start();

    await recorder.cancel();
    await vi.advanceTimersByTimeAsync(5000);

    expect(device.aborts).toBe(1);
    expect(events).toEqual([{ type: "cancelled", takeId }]);
    expect(recorder.isRecording()).toBe(false);
  });

  it("reports the live level and elapsed time", async () => {
    const takeId = await recorder.start();
    device.level = 0.25;
    await vi.advanceTimersByTimeAsync(1000);

    expect(recorder.snapshot()).toEqual({
      recording: true,
      takeId,
      elapsedMs: 1000,
      level: 0.25,
    });
  });
});
