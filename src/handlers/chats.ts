// ABOUTME: RPC handlers for chat listing, history, target chat selection and file downloads.
// ABOUTME: Reads go through the session-gated transport and are mirrored into the session cache.

import { z } from "zod";
import type { SettingsStore } from "../config.js";
import { parseParams } from "../rpc.js";
import type { IncomingVoiceHandler } from "../services/inbox.js";
import type { MessageStore } from "../services/message-store.js";
import type { ChatMessage, ChatSummary, SessionOperations } from "../services/transport.js";

const ListChatsParams = z.object({
  limit: z.number().int().min(1).max(500).default(100),
});

const HistoryParams = z.object({
  chatId: z.string().min(1),
  fromMessageId: z.string().min(1).optional(),
  limit: z.number().int().min(1).max(100).default(50),
});

const SelectChatParams = z.object({
  chatId: z.string().min(1).nullable(),
});

const DownloadParams = z.object({ fileId: z.string().min(1) });

export async function listChats(
  session: SessionOperations,
  store: MessageStore,
  params: unknown,
): Promise<ChatSummary[]> {
  const { limit } = parseParams(ListChatsParams, params);
  const chats = await session.listChats(limit);
  store.upsertChats(chats);
  return chats;
}

export async function getChatHistory(
  session: SessionOperations,
  store: MessageStore,
  params: unknown,
): Promise<ChatMessage[]> {
  const query = parseParams(HistoryParams, params);
  const messages = await session.getChatHistory(query);
  for (const message of messages) {
    store.insertMessage(message);
  }
  return messages;
}

export async function selectChat(
  settings: SettingsStore,
  params: unknown,
): Promise<{ targetChatId: string | null }> {
  const { chatId } = parseParams(SelectChatParams, params);
  const updated = await settings.set("targetChatId", chatId);
  console.log(`[Chats] Target chat: ${updated.targetChatId ?? "none"}`);
  return { targetChatId: updated.targetChatId };
}

export async function downloadFile(
  inbox: IncomingVoiceHandler,
  params: unknown,
): Promise<{ localPath: string }> {
  const { fileId } = parseParams(DownloadParams, params);
  const localPath = await inbox.ensureDownloaded(fileId);
  return { localPath };
}
