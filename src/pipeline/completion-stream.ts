/**
 * Completion stream adapter: one streaming LLM request per turn, exposed as a
 * lazy sequence of text fragments in generation order.
 */

import type { ILLM } from "../adapters/llm";
import type { ConversationHistory } from "../memory/types";
import { PromptManager } from "../prompts/prompt-manager";
import { logger, logLlmCall } from "../logging";

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_TOKENS = 1024;

export function withTimeout<T>(p: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
    p.then((v) => { clearTimeout(timer); resolve(v); }, (e) => { clearTimeout(timer); reject(e); });
  });
}

export interface CompletionContext {
  /** Committed turns before this one. */
  history: ConversationHistory;
  input: string;
}

export interface CompletionStreamConfig {
  maxTokens?: number;
  temperature?: number;
  /** Time allowed for the provider to accept the request and open the stream. */
  requestTimeoutMs?: number;
  promptManager?: PromptManager;
}

export class CompletionStreamAdapter {
  private readonly maxTokens: number;
  private readonly temperature: number | undefined;
  private readonly requestTimeoutMs: number;
  private readonly promptManager: PromptManager;

  constructor(
    private readonly llm: ILLM,
    config: CompletionStreamConfig = {}
  ) {
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature;
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.promptManager = config.promptManager ?? new PromptManager();
  }

  /**
   * Fragments concatenate losslessly into the reply. The sequence may throw after
   * any number of fragments; fragments already yielded stay valid.
   */
  async *stream(ctx: CompletionContext): AsyncGenerator<string, void, undefined> {
    const messages = this.promptManager.buildChatMessages({ history: ctx.history, input: ctx.input });
    const start = Date.now();
    const response = await withTimeout(
      this.llm.chat(messages, { stream: true, maxTokens: this.maxTokens, temperature: this.temperature }),
      this.requestTimeoutMs,
      "LLM"
    );

    let length = 0;
    if (response.stream) {
      for await (const fragment of response.stream) {
        length += fragment.length;
        yield fragment;
      }
    } else if (response.text) {
      // Provider answered without streaming: deliver the whole reply as one fragment.
      logger.debug({ event: "LLM_STREAM_UNAVAILABLE" }, "LLM returned a non-streaming response");
      length = response.text.length;
      yield response.text;
    }
    logLlmCall(logger, messages.length, length, Date.now() - start);
  }
}
