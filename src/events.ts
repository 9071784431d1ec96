// ABOUTME: Runtime event bus for pushing notifications to connected UI clients.
// ABOUTME: Typed channels; sends JSON-RPC notifications over authenticated WebSocket connections.

import type { WebSocket } from "ws";
import type { AuthSnapshot } from "./services/auth.js";
import type { ChatMessage, MessageHandle } from "./services/transport.js";
import type { SendStatus } from "./types.js";

export type HapticStyle = "light" | "medium";

/**
 * Every event the runtime publishes, keyed by channel name.
 */
export interface EventMap {
  "voice://status": SendStatus;
  "recording:started": { takeId: string };
  "recording:auto-stopped": void;
  "recording:failed": { reason: string };
  "recording:too-short": { takeId: string; durationMs: number };
  "feedback:haptic": { style: HapticStyle };
  "auth:state-changed": AuthSnapshot;
  "auth:step-failed": { step: string; reason: string };
  "chat:new-message": ChatMessage;
  "file:downloaded": { fileId: string; localPath: string };
  "voice:auto-play": { message: MessageHandle; localPath: string };
}

export type EventName = keyof EventMap;

type EventCallback<K extends EventName> = (params: EventMap[K]) => void;

type SubscriberTable = { [K in EventName]?: Set<EventCallback<K>> };

/**
 * Publishing side of the bus, for components that only emit.
 */
export type EmitFn = <K extends EventName>(event: K, params: EventMap[K]) => void;

let subscribers: SubscriberTable = {};
const authenticatedClients = new Set<WebSocket>();

/**
 * Register a WebSocket client as authenticated and eligible for events.
 */
export function addClient(ws: WebSocket): void {
  authenticatedClients.add(ws);
  ws.on("close", () => authenticatedClients.delete(ws));
}

/**
 * Subscribe to a local event (server-side only).
 */
export function subscribe<K extends EventName>(event: K, callback: EventCallback<K>): () => void {
  let subs: Set<EventCallback<K>> | undefined = subscribers[event];
  if (!subs) {
    subs = new Set();
    subscribers[event] = subs;
  }
  subs.add(callback);
  return () => {
    subscribers[event]?.delete(callback);
  };
}

/**
 * Emit an event to all authenticated WebSocket clients as a JSON-RPC notification
 * and to any local subscribers.
 */
export function emit<K extends EventName>(event: K, params: EventMap[K]): void {
  // Notify local subscribers
  const localSubs: Set<EventCallback<K>> | undefined = subscribers[event];
  if (localSubs) {
    for (const cb of localSubs) {
      try {
        cb(params);
      } catch (err) {
        console.error(`[Events] Local subscriber error for ${event}:`, err);
      }
    }
  }

  // Broadcast to all authenticated WebSocket clients
  const notification = JSON.stringify({
    jsonrpc: "2.0",
    method: event,
    params: params ?? null,
  });

  for (const client of authenticatedClients) {
    if (client.readyState === client.OPEN) {
      try {
        client.send(notification);
      } catch (err) {
        console.error("[Events] Failed to send to client:", err);
      }
    }
  }
}

/**
 * Clear all subscribers and clients (for testing).
 */
export function clearAll(): void {
  subscribers = {};
  authenticatedClients.clear();
}
