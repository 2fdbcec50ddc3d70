/**
 * LLM adapter types.
 * Implementations can be swapped via config (e.g. OpenAI, Anthropic, stub).
 */

export interface Message {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatOptions {
  /** If true, response may be streamed (tokens as they arrive). */
  stream?: boolean;
  /** Max tokens to generate. */
  maxTokens?: number;
  /** Sampling temperature; adapter default when omitted. */
  temperature?: number;
}

export interface ChatResponse {
  /** Full text of the assistant reply (for non-streaming responses). */
  text: string;
  /** If streaming was requested, yields chunks. Otherwise absent. */
  stream?: AsyncIterable<string>;
}

/**
 * LLM adapter interface: messages in, assistant reply out.
 * Supports streaming so the UI can render the reply as it is generated.
 */
export interface ILLM {
  /**
   * Get assistant reply for the given messages.
   * @param messages - Conversation history (system + user + assistant turns).
   */
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}
