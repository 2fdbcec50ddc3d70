import type { Message } from "../adapters/llm";
import type { Turn } from "../memory/types";
import { DEFAULT_SYSTEM_PROMPT } from "../config";

export const SUMMARY_INSTRUCTION = "Produce a very short summary prefixed with 'Summary:'. Be concise.";

export interface PromptManagerConfig {
  /** Base system prompt. Defaults to DEFAULT_SYSTEM_PROMPT. */
  systemPrompt?: string;
  /** Instruction sent with each summary request. Defaults to SUMMARY_INSTRUCTION. */
  summaryInstruction?: string;
}

export interface BuildChatArgs {
  /** Committed turns of the session, oldest first. */
  history: readonly Turn[];
  /** The new user input for this turn. */
  input: string;
}

/**
 * PromptManager
 *
 * Centralizes how we build messages for the LLM so the system prompt and the
 * summary instruction can evolve without touching the turn pipeline.
 */
export class PromptManager {
  private readonly systemPrompt: string;
  private readonly summaryInstruction: string;

  constructor(cfg: PromptManagerConfig = {}) {
    this.systemPrompt = cfg.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.summaryInstruction = cfg.summaryInstruction ?? SUMMARY_INSTRUCTION;
  }

  /** System prompt, then prior turns, then the new user input. */
  buildChatMessages(args: BuildChatArgs): Message[] {
    return [
      { role: "system", content: this.systemPrompt },
      ...args.history.map((t) => ({ role: t.role, content: t.content })),
      { role: "user", content: args.input },
    ];
  }

  buildSummaryMessages(windowText: string): Message[] {
    return [
      { role: "system", content: this.summaryInstruction },
      { role: "user", content: windowText },
    ];
  }
}
