/**
 * Pipeline types: turn states, UI updates and callbacks.
 */

import type { Turn } from "../memory/types";

export type TurnState = "idle" | "validating" | "streaming" | "errored" | "committing" | "summarizing" | "done";

/** One update for the UI: session id, cleared input box, conversation to render. */
export interface TurnUpdate {
  sessionId: string;
  /** Always empty; tells the UI to clear its input field. */
  input: "";
  history: Turn[];
}

export interface TurnCallbacks {
  /** Called on every state transition of a turn. */
  onStateChange?(sessionId: string, from: TurnState, to: TurnState): void;
}
