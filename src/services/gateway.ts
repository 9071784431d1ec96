// ABOUTME: Transport client that talks JSON-RPC 2.0 over WebSocket to the messaging gateway.
// ABOUTME: Correlates responses by id, parses pushed updates and reconnects with backoff.

import WebSocket from "ws";
import { z } from "zod";
import { TransportRejectedError, errorMessage } from "../errors.js";
import type {
  ChatHistoryQuery,
  ChatMessage,
  ChatSummary,
  MessageHandle,
  SendVoiceMessageRequest,
  SessionParameters,
  StateListener,
  TransportClient,
  TransportState,
  TransportUpdate,
  UpdateListener,
  UserProfile,
} from "./transport.js";

// ── Wire schemas ─────────────────────────────────────────────────────

const VoiceNoteSchema = z.object({
  fileId: z.string(),
  durationSeconds: z.number().int().nonnegative(),
  waveform: z.array(z.number().int().min(0).max(31)).nullable().default(null),
  localPath: z.string().nullable().default(null),
});

const ChatMessageSchema = z.object({
  id: z.string(),
  chatId: z.string(),
  senderId: z.string(),
  isOutgoing: z.boolean(),
  date: z.number().int(),
  text: z.string().nullable().default(null),
  voice: VoiceNoteSchema.nullable().default(null),
});

const ChatSummarySchema = z.object({
  id: z.string(),
  title: z.string(),
  username: z.string().nullable().default(null),
  unreadCount: z.number().int().nonnegative().default(0),
  lastMessageAt: z.number().int().nullable().default(null),
});

const UserProfileSchema = z.object({
  id: z.string(),
  firstName: z.string(),
  lastName: z.string().nullable().default(null),
  username: z.string().nullable().default(null),
  phoneNumber: z.string().nullable().default(null),
});

const MessageHandleSchema = z.object({
  chatId: z.string(),
  messageId: z.string(),
});

const DownloadResultSchema = z.object({ localPath: z.string().min(1) });

const AuthorizationStepSchema = z.enum([
  "waitParameters",
  "waitPhoneNumber",
  "waitCode",
  "waitPassword",
  "ready",
  "loggingOut",
  "closing",
  "closed",
]);

const ConnectionStepSchema = z.enum([
  "waitingForNetwork",
  "connectingToProxy",
  "connecting",
  "updating",
  "ready",
]);

const UpdateSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("authorizationState"),
    step: AuthorizationStepSchema,
    passwordHint: z.string().nullable().default(null),
  }),
  z.object({ kind: z.literal("newMessage"), message: ChatMessageSchema }),
  z.object({ kind: z.literal("fileDownloaded"), fileId: z.string(), localPath: z.string() }),
  z.object({ kind: z.literal("connectionState"), step: ConnectionStepSchema }),
]);

const KNOWN_UPDATE_KINDS = new Set(["authorizationState", "newMessage", "fileDownloaded", "connectionState"]);

const EnvelopeSchema = z.union([
  z.object({
    id: z.number(),
    result: z.unknown().optional(),
    error: z.object({ code: z.number(), message: z.string() }).optional(),
  }),
  z.object({ method: z.string(), params: z.unknown().optional() }),
]);

/**
 * Turn a pushed update payload into the closed update union.
 * Unknown or malformed kinds land in the `ignored` bucket.
 */
export function parseUpdate(raw: unknown): TransportUpdate {
  const tagged = z.object({ kind: z.string() }).safeParse(raw);
  if (!tagged.success) {
    return { type: "ignored", kind: "unknown" };
  }

  const parsed = UpdateSchema.safeParse(raw);
  if (!parsed.success) {
    if (KNOWN_UPDATE_KINDS.has(tagged.data.kind)) {
      console.warn(`[Gateway] Malformed ${tagged.data.kind} update:`, parsed.error.issues[0]?.message);
    }
    return { type: "ignored", kind: tagged.data.kind };
  }

  const update = parsed.data;
  switch (update.kind) {
    case "authorizationState":
      return { type: "authorizationState", step: update.step, passwordHint: update.passwordHint };
    case "newMessage":
      return { type: "newMessage", message: update.message };
    case "fileDownloaded":
      return { type: "fileDownloaded", fileId: update.fileId, localPath: update.localPath };
    case "connectionState":
      return { type: "connectionState", step: update.step };
  }
}

// ── Client ───────────────────────────────────────────────────────────

export interface GatewayOptions {
  url: string;
  token: string | null;
  requestTimeoutMs?: number;
  maxReconnectAttempts?: number;
  reconnectBaseMs?: number;
  reconnectMaxMs?: number;
}

interface PendingRequest {
  method: string;
  resolve: (value: unknown) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

interface Waiter {
  resolve: () => void;
  reject: (err: Error) => void;
}

export class GatewayTransportClient implements TransportClient {
  private ws: WebSocket | null = null;
  private current: TransportState = "uninitialized";
  private nextId = 1;
  private reconnectAttempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly waiters: Waiter[] = [];
  private readonly updateListeners = new Set<UpdateListener>();
  private readonly stateListeners = new Set<StateListener>();
  private readonly requestTimeoutMs: number;
  private readonly maxReconnectAttempts: number;
  private readonly reconnectBaseMs: number;
  private readonly reconnectMaxMs: number;

  constructor(private readonly options: GatewayOptions) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? 60_000;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? 5;
    this.reconnectBaseMs = options.reconnectBaseMs ?? 1000;
    this.reconnectMaxMs = options.reconnectMaxMs ?? 30_000;
  }

  get state(): TransportState {
    return this.current;
  }

  /**
   * Open the connection. Resolves once the gateway accepts it, or rejects when
   * every reconnect attempt has failed.
   */
  connect(): Promise<void> {
    if (this.current === "ready") return Promise.resolve();
    if (this.current === "closed") {
      return Promise.reject(new TransportRejectedError("Gateway connection is closed"));
    }

    const ready = new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
    if (this.current === "uninitialized") {
      this.setState("connecting");
      this.open();
    }
    return ready;
  }

  async close(): Promise<void> {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.setState("closed");
    this.failPending(new TransportRejectedError("Gateway connection closed"));
    this.settleWaiters(new TransportRejectedError("Gateway connection closed"));

    const ws = this.ws;
    this.ws = null;
    if (ws && ws.readyState !== WebSocket.CLOSED) {
      await new Promise<void>((resolve) => {
        ws.once("close", () => resolve());
        ws.close();
      });
    }
  }

  onUpdate(listener: UpdateListener): () => void {
    this.updateListeners.add(listener);
    return () => {
      this.updateListeners.delete(listener);
    };
  }

  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  // ── Authorization ──────────────────────────────────────────────────

  async setParameters(params: SessionParameters): Promise<void> {
    await this.request("set_parameters", params, z.unknown());
  }

  async submitPhoneNumber(phoneNumber: string): Promise<void> {
    await this.request("submit_phone_number", { phoneNumber }, z.unknown());
  }

  async submitCode(code: string): Promise<void> {
    await this.request("submit_code", { code }, z.unknown());
  }

  async submitSecondFactor(password: string): Promise<void> {
    await this.request("submit_second_factor", { password }, z.unknown());
  }

  async logOut(): Promise<void> {
    await this.request("log_out", {}, z.unknown());
  }

  // ── Session ────────────────────────────────────────────────────────

  getMe(): Promise<UserProfile> {
    return this.request("get_me", {}, UserProfileSchema);
  }

  async listChats(limit: number): Promise<ChatSummary[]> {
    const { chats } = await this.request("list_chats", { limit }, z.object({ chats: z.array(ChatSummarySchema) }));
    return chats;
  }

  async getChatHistory(query: ChatHistoryQuery): Promise<ChatMessage[]> {
    const { messages } = await this.request(
      "get_chat_history",
      query,
      z.object({ messages: z.array(ChatMessageSchema) }),
    );
    return messages;
  }

  sendVoiceMessage(request: SendVoiceMessageRequest): Promise<MessageHandle> {
    return this.request("send_voice_message", request, MessageHandleSchema);
  }

  async downloadFile(fileId: string): Promise<string> {
    const { localPath } = await this.request("download_file", { fileId }, DownloadResultSchema);
    return localPath;
  }

  // ── Plumbing ───────────────────────────────────────────────────────

  private async request<T extends z.ZodTypeAny>(
    method: string,
    params: unknown,
    schema: T,
  ): Promise<z.infer<T>> {
    const ws = this.ws;
    if (this.current !== "ready" || !ws) {
      throw new TransportRejectedError(`Gateway is not connected (state: ${this.current})`);
    }

    const id = this.nextId++;
    const raw = await new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new TransportRejectedError(`Gateway request ${method} timed out`));
      }, this.requestTimeoutMs);
      this.pending.set(id, { method, resolve, reject, timer });
      ws.send(JSON.stringify({ jsonrpc: "2.0", id, method, params }), (err) => {
        if (err) this.settle(id, new TransportRejectedError(`Gateway send failed: ${err.message}`));
      });
    });

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new TransportRejectedError(
        `Malformed ${method} result: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      );
    }
    return parsed.data;
  }

  private open(): void {
    const headers: Record<string, string> = {};
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    const ws = new WebSocket(this.options.url, { headers });
    this.ws = ws;

    ws.on("open", () => {
      if (this.ws !== ws) return;
      console.log("[Gateway] WebSocket connected");
      this.reconnectAttempts = 0;
      this.setState("ready");
      this.settleWaiters(null);
    });

    ws.on("message", (data) => {
      try {
        this.handleMessage(JSON.parse(data.toString()));
      } catch (err) {
        console.error("[Gateway] Failed to parse WS message:", errorMessage(err));
      }
    });

    ws.on("close", () => {
      if (this.ws !== ws) return;
      this.ws = null;
      this.failPending(new TransportRejectedError("Gateway connection lost"));
      if (this.current !== "closed") {
        this.scheduleReconnect();
      }
    });

    ws.on("error", (err) => {
      console.error("[Gateway] WebSocket error:", err.message);
    });
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;

    if (this.reconnectAttempts >= this.maxReconnectAttempts) {
      console.error(`[Gateway] Giving up after ${this.reconnectAttempts} reconnect attempts`);
      this.setState("closed");
      this.settleWaiters(new TransportRejectedError("Gateway is unreachable"));
      return;
    }

    const delay = Math.min(this.reconnectBaseMs * 2 ** this.reconnectAttempts, this.reconnectMaxMs);
    this.reconnectAttempts++;
    this.setState("connecting");
    console.log(`[Gateway] Reconnecting in ${delay}ms (attempt ${this.reconnectAttempts})`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.current === "connecting") {
        this.open();
      }
    }, delay);
  }

  private handleMessage(raw: unknown): void {
    const envelope = EnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      console.warn("[Gateway] Ignoring unrecognized message");
      return;
    }

    const msg = envelope.data;
    if ("id" in msg) {
      if (msg.error) {
        this.settle(msg.id, new TransportRejectedError(msg.error.message, msg.error.code));
      } else {
        this.settle(msg.id, null, msg.result ?? null);
      }
      return;
    }

    if (msg.method !== "update") {
      console.log("[Gateway] Unknown notification:", msg.method);
      return;
    }

    const update = parseUpdate(msg.params);
    if (update.type === "ignored") {
      console.log("[Gateway] Ignored update:", update.kind);
    }
    for (const listener of this.updateListeners) {
      try {
        listener(update);
      } catch (err) {
        console.error("[Gateway] Update listener error:", err);
      }
    }
  }

  private settle(id: number, error: Error | null, result?: unknown): void {
    const entry = this.pending.get(id);
    if (!entry) return;
    this.pending.delete(id);
    clearTimeout(entry.timer);
    if (error) {
      entry.reject(error);
    } else {
      entry.resolve(result);
    }
  }

  private failPending(error: Error): void {
    for (const id of [...this.pending.keys()]) {
      this.settle(id, error);
    }
  }

  private settleWaiters(error: Error | null): void {
    const waiters = this.waiters.splice(0);
    for (const w of waiters) {
      if (error) w.reject(error);
      else w.resolve();
    }
  }

  private setState(next: TransportState): void {
    if (next === this.current) return;
    this.current = next;
    for (const listener of this.stateListeners) {
      try {
        listener(next);
      } catch (err) {
        console.error("[Gateway] State listener error:", err);
      }
    }
  }
}
