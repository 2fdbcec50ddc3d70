/**
 * Session memory types for the chat assistant.
 * Per-session conversation history kept in process memory.
 */

export type TurnRole = "user" | "assistant";

export interface Turn {
  role: TurnRole;
  content: string;
}

/** Ordered turns of one session, appended in user/assistant pairs. */
export type ConversationHistory = readonly Turn[];

export interface ISessionStore {
  /**
   * Return the session's history, creating an empty one on first reference.
   * The same instance is returned on every call, so later appends are visible to all holders.
   */
  getOrCreate(sessionId: string): ConversationHistory;

  /** Extend the session's history. There is no delete. */
  append(sessionId: string, turns: readonly Turn[]): void;

  has(sessionId: string): boolean;

  /** Number of sessions seen by this process. */
  size(): number;

  sessionIds(): string[];
}

/** One entry of the summaries log. Written once, never read back. */
export interface SummaryRecord {
  timestamp: Date;
  sessionId: string;
  summaryText: string;
}
