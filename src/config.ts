// ABOUTME: Runtime configuration from environment variables and persisted user preferences.
// ABOUTME: Preferences live in a JSON file in the data directory and are validated with zod.

import { randomBytes } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { homedir, platform } from "node:os";
import { dirname, join } from "node:path";
import { z } from "zod";
import { InvalidSettingError } from "./errors.js";

// ── User preferences ─────────────────────────────────────────────────

export const SettingsSchema = z.object({
  /** Play incoming voice messages from the target chat as soon as they download. */
  autoPlay: z.boolean().default(true),
  hapticFeedback: z.boolean().default(true),
  silenceDetection: z.boolean().default(true),
  /** Seconds of sustained silence that end a take. */
  silenceDurationSeconds: z.number().positive().max(30).default(2),
  /** Normalized peak amplitude (0..1) below which a sample counts as silence. */
  silenceAmplitudeThreshold: z.number().min(0).max(1).default(0.02),
  maxRecordingDurationSeconds: z.number().positive().max(3600).default(60),
  /** Takes shorter than this are discarded instead of sent. */
  minRecordingDurationSeconds: z.number().min(0).max(10).default(0.5),
  targetChatId: z.string().min(1).nullable().default(null),
  /** What a new recording does while a take is converting or sending. */
  busyPolicy: z.enum(["reject", "discardPrevious"]).default("reject"),
  /** What a new recording does to attempts still waiting for retry. */
  failedAttemptPolicy: z.enum(["keep", "discard"]).default("keep"),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type SettingKey = keyof Settings;

export const DEFAULT_SETTINGS: Settings = SettingsSchema.parse({});

function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(SettingsSchema.shape, key);
}

/**
 * Preferences backed by a JSON file. Unknown keys in the file are dropped and
 * invalid values fall back to their defaults.
 */
export class SettingsStore {
  private current: Settings = DEFAULT_SETTINGS;

  constructor(private readonly path: string) {}

  async load(): Promise<Settings> {
    let raw: unknown = {};
    try {
      raw = JSON.parse(await readFile(this.path, "utf-8"));
    } catch {
      // No settings yet
    }
    this.current = parseSettingsLeniently(raw);
    return this.current;
  }

  get(): Settings {
    return this.current;
  }

  getValue(key: string): unknown {
    if (!isSettingKey(key)) {
      throw new InvalidSettingError(key, "unknown setting");
    }
    return this.current[key];
  }

  async set(key: string, value: unknown): Promise<Settings> {
    if (!isSettingKey(key)) {
      throw new InvalidSettingError(key, "unknown setting");
    }
    const parsed = SettingsSchema.safeParse({ ...this.current, [key]: value });
    if (!parsed.success) {
      throw new InvalidSettingError(key, parsed.error.issues[0]?.message ?? "invalid value");
    }
    this.current = parsed.data;
    await this.save();
    return this.current;
  }

  private async save(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(this.current, null, 2), "utf-8");
  }
}

function parseSettingsLeniently(raw: unknown): Settings {
  const whole = SettingsSchema.safeParse(raw);
  if (whole.success) return whole.data;

  // Keep every valid field, default the rest
  const result: Record<string, unknown> = {};
  if (typeof raw === "object" && raw !== null) {
    for (const [key, value] of Object.entries(raw)) {
      if (!isSettingKey(key)) continue;
      if (SettingsSchema.shape[key].safeParse(value).success) {
        result[key] = value;
      } else {
        console.warn(`[Config] Ignoring invalid value for ${key}`);
      }
    }
  }
  return SettingsSchema.parse(result);
}

// ── Environment ──────────────────────────────────────────────────────

export interface CaptureInput {
  format: string;
  device: string;
}

export interface RuntimeConfig {
  port: number;
  dataDir: string;
  mediaDir: string;
  settingsPath: string;
  databasePath: string;
  authToken: string;
  gatewayUrl: string;
  gatewayToken: string | null;
  apiId: number;
  apiHash: string;
  ffmpegPath: string;
  capture: CaptureInput;
}

function defaultCaptureInput(): CaptureInput {
  switch (platform()) {
    case "darwin":
      return { format: "avfoundation", device: ":0" };
    case "win32":
      return { format: "dshow", device: "audio=default" };
    default:
      return { format: "pulse", device: "default" };
  }
}

/**
 * Read runtime configuration from the environment.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const dataDir = env.VOICEWIRE_DATA_DIR || join(homedir(), ".voicewire");
  const captureDefaults = defaultCaptureInput();

  return {
    port: Number(env.VOICEWIRE_PORT) || 19430,
    dataDir,
    mediaDir: join(dataDir, "media"),
    settingsPath: join(dataDir, "settings.json"),
    databasePath: join(dataDir, "session.db"),
    authToken: env.VOICEWIRE_RUNTIME_TOKEN || randomBytes(32).toString("hex"),
    gatewayUrl: env.VOICEWIRE_GATEWAY_URL || "ws://127.0.0.1:19431/rpc",
    gatewayToken: env.VOICEWIRE_GATEWAY_TOKEN || null,
    apiId: Number(env.VOICEWIRE_API_ID) || 0,
    apiHash: env.VOICEWIRE_API_HASH || "",
    ffmpegPath: env.VOICEWIRE_FFMPEG || "ffmpeg",
    capture: {
      format: env.VOICEWIRE_CAPTURE_FORMAT || captureDefaults.format,
      device: env.VOICEWIRE_CAPTURE_DEVICE || captureDefaults.device,
    },
  };
}
