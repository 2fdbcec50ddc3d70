/**
 * In-memory session store: session id -> conversation history.
 * Histories live for the lifetime of the process and are never evicted.
 */

import type { ConversationHistory, ISessionStore, Turn } from "./types";

export class InMemorySessionStore implements ISessionStore {
  private readonly sessions = new Map<string, Turn[]>();

  getOrCreate(sessionId: string): ConversationHistory {
    return this.entry(sessionId);
  }

  append(sessionId: string, turns: readonly Turn[]): void {
    const history = this.entry(sessionId);
    for (const turn of turns) {
      history.push({ role: turn.role, content: turn.content });
    }
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  size(): number {
    return this.sessions.size;
  }

  sessionIds(): string[] {
    return [...this.sessions.keys()];
  }

  private entry(sessionId: string): Turn[] {
    let history = this.sessions.get(sessionId);
    if (!history) {
      history = [];
      this.sessions.set(sessionId, history);
    }
    return history;
  }
}
