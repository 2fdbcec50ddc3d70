/**
 * Anthropic Claude LLM adapter.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface AnthropicLlmConfig {
  apiKey: string;
  model: string;
  temperature?: number;
  /** Client-side request timeout (ms). */
  timeoutMs?: number;
}

export class AnthropicLLM implements ILLM {
  private client: Anthropic;

  constructor(private readonly cfg: AnthropicLlmConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey, timeout: cfg.timeoutMs });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const maxTokens = options?.maxTokens ?? 256;
    const system = messages.find((m) => m.role === "system")?.content;
    const msgs: Array<{ role: "user" | "assistant"; content: string }> = [];
    for (const m of messages) {
      if (m.role !== "system") msgs.push({ role: m.role, content: m.content });
    }
    const params = {
      model: this.cfg.model,
      max_tokens: maxTokens,
      temperature: options?.temperature ?? this.cfg.temperature,
      system,
      messages: msgs,
    };
    if (options?.stream) {
      const streamResult = this.client.messages.stream(params);
      const asyncIter = (async function* (): AsyncIterable<string> {
        for await (const event of streamResult) {
          if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
            yield event.delta.text;
          }
        }
      })();
      return { text: "", stream: asyncIter };
    }
    const response = await this.client.messages.create(params);
    const textBlock = response.content.find((b) => b.type === "text");
    const text = textBlock && textBlock.type === "text" ? textBlock.text : "";
    return { text };
  }
}
