/**
 * Stub LLM adapter for testing or when no provider is configured.
 * Returns empty text, or streams a fixed list of fragments when given one.
 */

import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface StubLlmConfig {
  /** Fragments streamed for every streaming request; joined for non-streaming ones. */
  fragments?: string[];
}

export class StubLLM implements ILLM {
  private readonly fragments: string[];

  constructor(cfg: StubLlmConfig = {}) {
    this.fragments = cfg.fragments ?? [];
  }

  async chat(_messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    if (!options?.stream) {
      return { text: this.fragments.join("") };
    }
    const fragments = [...this.fragments];
    const stream = (async function* (): AsyncIterable<string> {
      for (const fragment of fragments) yield fragment;
    })();
    return { text: "", stream };
  }
}
