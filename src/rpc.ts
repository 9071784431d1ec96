// ABOUTME: JSON-RPC 2.0 command router for the local runtime.
// ABOUTME: Dispatches incoming WebSocket messages to registered handlers and validates params.

import type { z } from "zod";
import { VoiceError } from "./errors.js";

export type RpcHandler = (params: unknown) => Promise<unknown>;

const handlers = new Map<string, RpcHandler>();

interface JsonRpcRequest {
  jsonrpc: string;
  method: string;
  params?: unknown;
  id?: string | number | null;
}

interface JsonRpcError {
  code: number;
  message: string;
  data?: { code: string };
}

interface JsonRpcResponse {
  jsonrpc: "2.0";
  result?: unknown;
  error?: JsonRpcError;
  id: string | number | null;
}

/**
 * Thrown by handlers when params fail validation; maps to -32602.
 */
export class InvalidParamsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidParamsError";
  }
}

/**
 * Validate handler params against a schema.
 */
export function parseParams<T extends z.ZodTypeAny>(schema: T, params: unknown): z.infer<T> {
  const parsed = schema.safeParse(params ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new InvalidParamsError(`Invalid params: ${where}${issue?.message ?? "malformed"}`);
  }
  return parsed.data;
}

function errorResponse(error: JsonRpcError, id: string | number | null): string {
  const response: JsonRpcResponse = {
    jsonrpc: "2.0",
    error,
    id,
  };
  return JSON.stringify(response);
}

function successResponse(result: unknown, id: string | number | null): string {
  const response: JsonRpcResponse = {
    jsonrpc: "2.0",
    result: result ?? null,
    id,
  };
  return JSON.stringify(response);
}

function toRpcError(err: unknown): JsonRpcError {
  if (err instanceof InvalidParamsError) {
    return { code: -32602, message: err.message };
  }
  if (err instanceof VoiceError) {
    return { code: -32000, message: err.message, data: { code: err.code } };
  }
  const message = err instanceof Error ? err.message : "Internal error";
  return { code: -32000, message };
}

function isRequest(value: unknown): value is JsonRpcRequest {
  return typeof value === "object" && value !== null;
}

/**
 * Register a handler for a JSON-RPC method.
 */
export function registerHandler(method: string, handler: RpcHandler): void {
  handlers.set(method, handler);
}

/**
 * Clear all registered handlers (for testing).
 */
export function clearHandlers(): void {
  handlers.clear();
}

/**
 * Handle an incoming JSON-RPC message.
 * Returns a JSON string response, or null for notifications.
 */
export async function handleMessage(raw: string): Promise<string | null> {
  let request: unknown;

  try {
    request = JSON.parse(raw);
  } catch {
    return errorResponse({ code: -32700, message: "Parse error" }, null);
  }

  if (!isRequest(request)) {
    return errorResponse({ code: -32600, message: "Invalid request" }, null);
  }

  const id = request.id ?? null;
  const isNotification = request.id === undefined;

  if (!request.method || typeof request.method !== "string") {
    return errorResponse({ code: -32600, message: "Invalid request: missing method" }, id);
  }

  const handler = handlers.get(request.method);
  if (!handler) {
    if (isNotification) return null;
    return errorResponse({ code: -32601, message: `Method not found: ${request.method}` }, id);
  }

  try {
    const result = await handler(request.params);
    if (isNotification) return null;
    return successResponse(result, id);
  } catch (err) {
    if (isNotification) {
      console.error(`[RPC] Notification ${request.method} failed:`, err);
      return null;
    }
    return errorResponse(toRpcError(err), id);
  }
}
