/**
 * Chat server: HTTP health endpoints plus a WebSocket chat surface on the same port.
 * GET /health -> 200 if process is up.
 * GET /ready -> 200 only if getReady() returns true, else 503.
 * WebSocket: one session id per connection; each "turn" message streams snapshots back.
 */

import * as http from "http";
import WebSocket, { WebSocketServer, type RawData } from "ws";
import type { ISessionStore, Turn } from "../memory/types";
import type { TurnUpdate } from "../pipeline/types";
import type { ServerMessage } from "./protocol";
import { parseClientMessage } from "./protocol";
import { generateSessionId } from "./session-id";
import { getTurnCounters } from "../metrics";
import { logger, toError } from "../logging";

export const DEFAULT_PORT = 7860;

/** Port to listen on; the caller passes the configured port, there is no env lookup here. */
export function resolveListenPort(port?: number): number {
  return port ?? DEFAULT_PORT;
}

export interface TurnHandler {
  handleTurn(sessionId: string, inputText: string, historySnapshot?: readonly Turn[]): AsyncIterable<TurnUpdate>;
}

export interface ChatServerOptions {
  controller: TurnHandler;
  store: ISessionStore;
  /** 0 picks a free port. */
  port?: number;
  host?: string;
  /** Return true when the assistant is ready to serve. Defaults to always ready. */
  getReady?: () => boolean;
  newSessionId?: () => string;
}

export interface ChatServer {
  server: http.Server;
  wss: WebSocketServer;
  port: number;
  close(): Promise<void>;
}

function sendJson(res: http.ServerResponse, status: number, data: unknown): void {
  res.setHeader("Content-Type", "application/json");
  res.writeHead(status);
  res.end(JSON.stringify(data));
}

function send(ws: WebSocket, msg: ServerMessage): void {
  if (ws.readyState !== WebSocket.OPEN) return;
  ws.send(JSON.stringify(msg));
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

export function startChatServer(options: ChatServerOptions): Promise<ChatServer> {
  const { controller, store } = options;
  const getReady = options.getReady ?? (() => true);
  const newSessionId = options.newSessionId ?? (() => generateSessionId());

  const server = http.createServer((req, res) => {
    const url = req.url ?? "";
    if (req.method === "GET" && (url === "/health" || url === "/")) {
      sendJson(res, 200, { ok: true });
      return;
    }
    if (req.method === "GET" && url === "/ready") {
      const ready = getReady();
      sendJson(res, ready ? 200 : 503, { ok: ready, ready, sessions: store.size(), turns: getTurnCounters() });
      return;
    }
    res.writeHead(404);
    res.end();
  });

  const wss = new WebSocketServer({ server });

  async function runTurn(ws: WebSocket, sessionId: string, input: string, history?: Turn[]): Promise<void> {
    // Keep consuming after a disconnect so the turn still commits.
    for await (const update of controller.handleTurn(sessionId, input, history)) {
      send(ws, { type: "snapshot", sessionId: update.sessionId, input: update.input, history: update.history });
    }
    send(ws, { type: "turn_end", sessionId });
  }

  wss.on("connection", (ws: WebSocket) => {
    const sessionId = newSessionId();
    logger.info({ event: "CHAT_CLIENT_CONNECTED", sessionId }, "Chat client connected");
    send(ws, { type: "session", sessionId });

    ws.on("message", (data: RawData) => {
      const parsed = parseClientMessage(rawToString(data));
      if (!parsed.ok) {
        logger.debug({ event: "CHAT_BAD_MESSAGE", sessionId, error: parsed.error }, "Rejected client message");
        send(ws, { type: "error", error: parsed.error });
        return;
      }
      const { input, history } = parsed.message;
      runTurn(ws, sessionId, input, history).catch((err: unknown) => {
        const e = toError(err);
        logger.error({ event: "CHAT_TURN_FAILED", sessionId, err: e.message }, "Turn failed");
        send(ws, { type: "error", error: "Turn failed" });
      });
    });

    ws.on("close", () => {
      logger.info({ event: "CHAT_CLIENT_DISCONNECTED", sessionId }, "Chat client disconnected");
    });
    ws.on("error", (err) => {
      logger.warn({ event: "CHAT_WS_ERROR", sessionId, err: err.message }, "Chat WebSocket error");
    });
  });

  const close = (): Promise<void> =>
    new Promise((resolve, reject) => {
      for (const client of wss.clients) client.terminate();
      wss.close();
      server.close((err) => (err ? reject(err) : resolve()));
    });

  const requestedPort = resolveListenPort(options.port);
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(requestedPort, options.host, () => {
      server.off("error", reject);
      const addr = server.address();
      const port = typeof addr === "object" && addr ? addr.port : requestedPort;
      logger.info({ event: "CHAT_SERVER_STARTED", port }, "Chat server listening");
      resolve({ server, wss, port, close });
    });
  });
}
