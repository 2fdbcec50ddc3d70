/**
 * Chat WebSocket protocol. JSON text frames in both directions.
 *
 * Client -> server: { type: "turn", input, history? }
 * Server -> client: session | snapshot (one per update) | turn_end | error
 */

import type { Turn } from "../memory/types";

export interface ClientTurnMessage {
  type: "turn";
  input: string;
  /** Conversation the client currently shows. */
  history?: Turn[];
}

export type ServerMessage =
  | { type: "session"; sessionId: string }
  | { type: "snapshot"; sessionId: string; input: ""; history: Turn[] }
  | { type: "turn_end"; sessionId: string }
  | { type: "error"; error: string };

export type ParseResult = { ok: true; message: ClientTurnMessage } | { ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseTurn(value: unknown): Turn | null {
  if (!isRecord(value)) return null;
  const { role, content } = value;
  if ((role !== "user" && role !== "assistant") || typeof content !== "string") return null;
  return { role, content };
}

export function parseClientMessage(raw: string): ParseResult {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, error: "Invalid JSON" };
  }
  if (!isRecord(data)) return { ok: false, error: "Expected a JSON object" };
  if (data.type !== "turn") return { ok: false, error: `Unknown message type: ${String(data.type)}` };
  if (typeof data.input !== "string") return { ok: false, error: "Missing input" };

  if (data.history === undefined || data.history === null) {
    return { ok: true, message: { type: "turn", input: data.input } };
  }
  if (!Array.isArray(data.history)) return { ok: false, error: "history must be an array" };
  const history: Turn[] = [];
  for (const item of data.history) {
    const turn = parseTurn(item);
    if (!turn) return { ok: false, error: "history entries need role user|assistant and string content" };
    history.push(turn);
  }
  return { ok: true, message: { type: "turn", input: data.input, history } };
}
