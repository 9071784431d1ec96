// ABOUTME: Registers all RPC handlers with the JSON-RPC router.
// ABOUTME: Called once at server startup with the runtime's services.

import type { RuntimeServices } from "../runtime.js";
import { registerHandler } from "../rpc.js";
import * as auth from "./auth.js";
import * as chats from "./chats.js";
import * as settings from "./settings.js";
import * as voice from "./voice.js";

export function registerAllHandlers(runtime: RuntimeServices): void {
  // Voice pipeline handlers
  registerHandler("get_voice_state", () => voice.getVoiceState(runtime.orchestrator));
  registerHandler("start_recording", () => voice.startRecording(runtime.orchestrator));
  registerHandler("stop_recording", () => voice.stopRecording(runtime.orchestrator));
  registerHandler("cancel_recording", () => voice.cancelRecording(runtime.orchestrator));
  registerHandler("retry_send", (p) => voice.retrySend(runtime.orchestrator, p));
  registerHandler("discard_send", (p) => voice.discardSend(runtime.orchestrator, p));

  // Login flow handlers
  registerHandler("get_auth_state", () => auth.getAuthState(runtime.auth));
  registerHandler("submit_phone_number", (p) => auth.submitPhoneNumber(runtime.auth, p));
  registerHandler("submit_code", (p) => auth.submitCode(runtime.auth, p));
  registerHandler("submit_second_factor", (p) => auth.submitSecondFactor(runtime.auth, p));
  registerHandler("log_out", () => auth.logOut(runtime.auth));

  // Chat handlers
  registerHandler("list_chats", (p) => chats.listChats(runtime.session, runtime.store, p));
  registerHandler("get_chat_history", (p) => chats.getChatHistory(runtime.session, runtime.store, p));
  registerHandler("select_chat", (p) => chats.selectChat(runtime.settings, p));
  registerHandler("download_file", (p) => chats.downloadFile(runtime.inbox, p));

  // Settings handlers
  registerHandler("get_setting", (p) => settings.getSetting(runtime.settings, p));
  registerHandler("set_setting", (p) => settings.setSetting(runtime.settings, p));
}
