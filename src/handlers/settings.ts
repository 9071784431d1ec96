// ABOUTME: RPC handlers for reading and writing user preferences.
// ABOUTME: Values are validated against the settings schema before they are saved.

import { z } from "zod";
import type { SettingsStore } from "../config.js";
import { parseParams } from "../rpc.js";

const GetParams = z.object({ key: z.string().min(1) });
const SetParams = z.object({ key: z.string().min(1), value: z.unknown() });

export async function getSetting(settings: SettingsStore, params: unknown): Promise<unknown> {
  const { key } = parseParams(GetParams, params);
  return settings.getValue(key);
}

export async function setSetting(settings: SettingsStore, params: unknown): Promise<unknown> {
  const { key, value } = parseParams(SetParams, params);
  await settings.set(key, value);
  return settings.getValue(key);
}
