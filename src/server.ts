#!/usr/bin/env node
// ABOUTME: Local runtime server for the hands-free voice client.
// ABOUTME: HTTP + WebSocket server on localhost with token-authenticated JSON-RPC.

import { createServer } from "node:http";
import { WebSocketServer, type WebSocket } from "ws";
import { checkAuthMessage, isLocalhost } from "./client-auth.js";
import { loadRuntimeConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { addClient } from "./events.js";
import { registerAllHandlers } from "./handlers/index.js";
import { handleMessage } from "./rpc.js";
import { VERSION, createRuntime } from "./runtime.js";

const AUTH_TIMEOUT_MS = 5000;

async function main(): Promise<void> {
  const config = loadRuntimeConfig();
  const runtime = await createRuntime(config);
  registerAllHandlers(runtime);

  const httpServer = createServer((req, res) => {
    // SECURITY: Only allow localhost connections
    if (!isLocalhost(req.socket.remoteAddress)) {
      res.writeHead(403);
      res.end("Forbidden: only localhost connections allowed");
      return;
    }

    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    if (req.url === "/health") {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(
        JSON.stringify({
          status: "ok",
          version: VERSION,
          token: config.authToken,
          gateway: runtime.transport.state,
          auth: runtime.auth.state,
        }),
      );
      return;
    }

    res.writeHead(404);
    res.end();
  });

  const wss = new WebSocketServer({ server: httpServer });
  const authenticatedSockets = new WeakSet<WebSocket>();

  wss.on("connection", (ws, req) => {
    if (!isLocalhost(req.socket.remoteAddress)) {
      ws.close(4003, "Forbidden");
      return;
    }

    console.log("[Runtime] Client connecting (awaiting auth)...");

    const authTimeout = setTimeout(() => {
      if (!authenticatedSockets.has(ws)) {
        console.warn("[Runtime] Auth timeout, closing connection");
        ws.close(4001, "Authentication timeout");
      }
    }, AUTH_TIMEOUT_MS);

    ws.on("message", (data) => {
      const raw = data.toString();

      // First message must be the auth token
      if (!authenticatedSockets.has(ws)) {
        clearTimeout(authTimeout);
        const attempt = checkAuthMessage(raw, config.authToken);
        if (!attempt.authenticated) {
          console.warn("[Runtime] Invalid auth token, closing connection");
          ws.close(4002, "Invalid auth token");
          return;
        }
        authenticatedSockets.add(ws);
        addClient(ws);
        console.log("[Runtime] Client authenticated");
        if (attempt.requestId !== null) {
          ws.send(JSON.stringify({ jsonrpc: "2.0", result: { authenticated: true }, id: attempt.requestId }));
        }
        return;
      }

      handleMessage(raw)
        .then((response) => {
          if (response !== null) ws.send(response);
        })
        .catch((err: unknown) => {
          console.error("[Runtime] Failed to handle message:", errorMessage(err));
        });
    });

    ws.on("close", () => {
      clearTimeout(authTimeout);
      console.log("[Runtime] Client disconnected");
    });
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Runtime] ${signal} received, shutting down`);
    wss.close();
    httpServer.close();
    runtime
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("[Runtime] Shutdown failed:", errorMessage(err));
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  httpServer.listen(config.port, "127.0.0.1", () => {
    console.log(`[Voicewire Runtime] Listening on http://127.0.0.1:${config.port}`);
  });

  runtime.start().then(
    () => console.log("[Runtime] Connected to messaging gateway"),
    (err: unknown) => console.error("[Runtime] Messaging gateway unavailable:", errorMessage(err)),
  );
}

main().catch((err: unknown) => {
  console.error("[Runtime] Failed to start:", errorMessage(err));
  process.exit(1);
});
