// ABOUTME: Handles pushed messages: dedupes them, notifies the UI and auto-plays incoming voice notes.
// ABOUTME: Auto-play waits while the voice pipeline is busy; downloads are cached and shared.

import { access } from "node:fs/promises";
import type { Settings } from "../config.js";
import { errorMessage } from "../errors.js";
import type { EmitFn } from "../events.js";
import type { MessageStore } from "./message-store.js";
import type { PipelineActivity } from "./orchestrator.js";
import type {
  ChatMessage,
  MessageHandle,
  SessionOperations,
  TransportClient,
  TransportUpdate,
} from "./transport.js";

export interface IncomingVoiceOptions {
  store: Pick<MessageStore, "insertMessage" | "findLocalPath" | "setLocalPath">;
  transport: Pick<SessionOperations, "downloadFile">;
  settings: () => Pick<Settings, "autoPlay" | "targetChatId">;
  emit: EmitFn;
  /** Auto-play is held back while this reports busy and flushed when it goes idle. */
  activity?: PipelineActivity;
  fileExists?: (path: string) => Promise<boolean>;
}

interface PendingPlayback {
  message: MessageHandle;
  /** Null until the download finishes. */
  localPath: string | null;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export class IncomingVoiceHandler {
  private readonly downloads = new Map<string, Promise<string>>();
  /** Auto-play queue in arrival order. */
  private readonly playback: PendingPlayback[] = [];
  private readonly fileExists: (path: string) => Promise<boolean>;

  constructor(private readonly options: IncomingVoiceOptions) {
    this.fileExists = options.fileExists ?? pathExists;
  }

  attach(source: Pick<TransportClient, "onUpdate">): () => void {
    const offUpdate = source.onUpdate((update) => {
      void this.handleUpdate(update);
    });
    const offIdle = this.options.activity?.onIdle(() => this.flushPlayback());
    return () => {
      offUpdate();
      offIdle?.();
    };
  }

  async handleUpdate(update: TransportUpdate): Promise<void> {
    switch (update.type) {
      case "newMessage":
        try {
          await this.handleMessage(update.message);
        } catch (err) {
          console.warn(`[Inbox] Failed to handle message ${update.message.id}:`, errorMessage(err));
        }
        break;
      case "fileDownloaded":
        this.options.store.setLocalPath(update.fileId, update.localPath);
        break;
      default:
        break;
    }
  }

  /**
   * Record a pushed message. Returns false for a duplicate, which is dropped.
   */
  async handleMessage(message: ChatMessage): Promise<boolean> {
    if (!this.options.store.insertMessage(message)) {
      return false;
    }
    this.options.emit("chat:new-message", message);

    const settings = this.options.settings();
    const voice = message.voice;
    if (
      voice &&
      !message.isOutgoing &&
      settings.autoPlay &&
      settings.targetChatId === message.chatId
    ) {
      const entry: PendingPlayback = {
        message: { chatId: message.chatId, messageId: message.id },
        localPath: null,
      };
      this.playback.push(entry);
      try {
        entry.localPath = await this.ensureDownloaded(voice.fileId);
      } catch (err) {
        this.playback.splice(this.playback.indexOf(entry), 1);
        this.flushPlayback();
        throw err;
      }
      this.flushPlayback();
    }
    return true;
  }

  /** Number of voice notes waiting to auto-play. */
  pendingPlayback(): number {
    return this.playback.length;
  }

  /**
   * Emit queued auto-plays in arrival order, stopping at the first one still
   * downloading. Nothing plays while the pipeline is busy.
   */
  flushPlayback(): void {
    if (this.options.activity?.isBusy()) {
      if (this.playback.length > 0) {
        console.log(`[Inbox] Holding ${this.playback.length} voice message(s) until the pipeline is idle`);
      }
      return;
    }
    while (this.playback.length > 0) {
      const next = this.playback[0];
      if (!next || next.localPath === null) return;
      this.playback.shift();
      console.log(`[Inbox] Auto-playing voice message ${next.message.messageId}`);
      this.options.emit("voice:auto-play", { message: next.message, localPath: next.localPath });
    }
  }

  /**
   * Local path of a file, downloading it only when no cached copy exists.
   */
  async ensureDownloaded(fileId: string): Promise<string> {
    const cached = this.options.store.findLocalPath(fileId);
    if (cached && (await this.fileExists(cached))) {
      return cached;
    }

    let inflight = this.downloads.get(fileId);
    if (!inflight) {
      inflight = this.download(fileId).finally(() => {
        this.downloads.delete(fileId);
      });
      this.downloads.set(fileId, inflight);
    }
    return inflight;
  }

  private async download(fileId: string): Promise<string> {
    const localPath = await this.options.transport.downloadFile(fileId);
    this.options.store.setLocalPath(fileId, localPath);
    this.options.emit("file:downloaded", { fileId, localPath });
    return localPath;
  }
}
