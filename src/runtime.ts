// ABOUTME: Composition root: builds the voice pipeline, session and cache from runtime config.
// ABOUTME: Owns startup (stale media sweep, settings load, gateway connect) and orderly shutdown.

import { mkdir } from "node:fs/promises";
import { arch, platform } from "node:os";
import { join } from "node:path";
import { type RuntimeConfig, type Settings, SettingsStore } from "./config.js";
import { errorMessage } from "./errors.js";
import { emit } from "./events.js";
import { AuthStateMachine, SessionTransport } from "./services/auth.js";
import { type CaptureDevice, FfmpegCaptureDevice } from "./services/capture.js";
import { Converter } from "./services/converter.js";
import { type AudioEncoder, FfmpegOpusEncoder } from "./services/encoder.js";
import { GatewayTransportClient } from "./services/gateway.js";
import { IncomingVoiceHandler } from "./services/inbox.js";
import { MessageStore } from "./services/message-store.js";
import { SendOrchestrator } from "./services/orchestrator.js";
import { Recorder, type RecorderSettings } from "./services/recorder.js";
import { StatusNotifier } from "./services/status.js";
import { cleanupStaleMedia } from "./services/temp-files.js";
import type { SessionParameters, TransportClient } from "./services/transport.js";

export const VERSION = "0.1.0";

export interface RuntimeServices {
  config: RuntimeConfig;
  settings: SettingsStore;
  store: MessageStore;
  transport: TransportClient;
  session: SessionTransport;
  auth: AuthStateMachine;
  recorder: Recorder;
  orchestrator: SendOrchestrator;
  inbox: IncomingVoiceHandler;
  status: StatusNotifier;
}

export interface Runtime extends RuntimeServices {
  /** Connect to the gateway. Resolves once connected. */
  start(): Promise<void>;
  stop(): Promise<void>;
}

/** Swap out the parts that touch hardware, ffmpeg or the network. */
export interface RuntimeOverrides {
  transport?: TransportClient;
  device?: CaptureDevice;
  encoder?: AudioEncoder;
}

export function recorderSettings(settings: Settings): RecorderSettings {
  return {
    silenceDetection: settings.silenceDetection,
    silenceAmplitudeThreshold: settings.silenceAmplitudeThreshold,
    silenceDurationMs: settings.silenceDurationSeconds * 1000,
    maxDurationMs: settings.maxRecordingDurationSeconds * 1000,
  };
}

function sessionParameters(config: RuntimeConfig): SessionParameters {
  return {
    apiId: config.apiId,
    apiHash: config.apiHash,
    databaseDirectory: join(config.dataDir, "session"),
    filesDirectory: join(config.dataDir, "files"),
    deviceModel: `${platform()} ${arch()}`,
    applicationVersion: VERSION,
    systemLanguageCode: "en",
  };
}

export async function createRuntime(
  config: RuntimeConfig,
  overrides: RuntimeOverrides = {},
): Promise<Runtime> {
  await mkdir(config.dataDir, { recursive: true });
  await cleanupStaleMedia(config.mediaDir);

  const settings = new SettingsStore(config.settingsPath);
  await settings.load();

  const store = new MessageStore(config.databasePath);
  const transport =
    overrides.transport ?? new GatewayTransportClient({ url: config.gatewayUrl, token: config.gatewayToken });

  const auth = new AuthStateMachine({
    transport,
    parameters: () => sessionParameters(config),
    cache: store,
    emit,
  });
  const session = new SessionTransport(transport, auth);

  const recorder = new Recorder({
    device:
      overrides.device ?? new FfmpegCaptureDevice({ ffmpegPath: config.ffmpegPath, input: config.capture }),
    mediaDir: config.mediaDir,
    settings: () => recorderSettings(settings.get()),
  });
  const converter = new Converter(overrides.encoder ?? new FfmpegOpusEncoder(config.ffmpegPath));
  const status = new StatusNotifier((s) => emit("voice://status", s));

  const orchestrator = new SendOrchestrator({
    recorder,
    converter,
    transport: session,
    auth,
    status,
    settings: () => settings.get(),
    emit,
  });

  const inbox = new IncomingVoiceHandler({
    store,
    transport: session,
    settings: () => settings.get(),
    emit,
    activity: orchestrator,
  });

  const detachAuth = auth.attach();
  const detachInbox = inbox.attach(transport);
  let stopped = false;

  return {
    config,
    settings,
    store,
    transport,
    session,
    auth,
    recorder,
    orchestrator,
    inbox,
    status,

    async start() {
      await transport.connect();
    },

    async stop() {
      if (stopped) return;
      stopped = true;
      await recorder.cancel();
      await orchestrator.idle();
      orchestrator.dispose();
      detachInbox();
      detachAuth();
      await transport.close().catch((err: unknown) => {
        console.warn("[Runtime] Gateway close failed:", errorMessage(err));
      });
      store.close();
    },
  };
}
