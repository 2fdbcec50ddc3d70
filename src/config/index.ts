/**
 * Env-based configuration for the chat assistant.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type LlmProvider = "openai" | "anthropic" | "stub";

const LLM_PROVIDERS: readonly LlmProvider[] = ["openai", "anthropic", "stub"];

export const DEFAULT_SYSTEM_PROMPT =
  "Act like a useful assistant and answer the user questions using the information the user gives to you during the conversation.";

export interface AppConfig {
  /** LLM provider and options */
  llm: {
    provider: LlmProvider;
    openaiApiKey?: string;
    openaiModel?: string;
    anthropicApiKey?: string;
    anthropicModel?: string;
    /** Sampling temperature (0 = deterministic). */
    temperature: number;
    /** Max tokens per streamed reply. */
    maxTokens: number;
    /** Timeout for opening a completion request. */
    requestTimeoutMs: number;
  };

  /** Chat behaviour */
  chat: {
    systemPrompt: string;
  };

  /** Rolling summary of the conversation window */
  summary: {
    /** Committed turns between two summaries. */
    threshold: number;
    /** Most recent turns included in each summary. */
    window: number;
    maxTokens: number;
    /** Append-only summaries log (UTF-8 text). */
    logPath: string;
    /** Also summarize when the threshold lands on a turn whose stream failed. */
    summarizeOnPartialTurn: boolean;
  };

  /** HTTP + WebSocket surface */
  server: {
    port: number;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getIntEnv(key: string, defaultValue: number, min = 1): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < min ? defaultValue : n;
}

function getFloatEnv(key: string, defaultValue: number): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseFloat(v);
  return Number.isNaN(n) ? defaultValue : n;
}

function getBoolEnv(key: string): boolean {
  const v = (getEnv(key) ?? "").toLowerCase();
  return v === "1" || v === "true" || v === "yes";
}

function parseProvider(value: string | undefined): LlmProvider {
  const normalized = (value ?? "openai").toLowerCase();
  return LLM_PROVIDERS.find((p) => p === normalized) ?? "stub";
}

/**
 * Build config from environment variables.
 * LLM_PROVIDER (or MODEL_PROVIDER) selects the adapter: openai, anthropic, stub.
 */
export function loadConfig(): AppConfig {
  return {
    llm: {
      provider: parseProvider(getEnv("MODEL_PROVIDER") || getEnv("LLM_PROVIDER")),
      openaiApiKey: getEnv("OPENAI_API_KEY") || getEnv("openai_api_key"),
      openaiModel: getEnv("OPENAI_MODEL_NAME") || "gpt-4o-mini",
      anthropicApiKey: getEnv("ANTHROPIC_API_KEY"),
      anthropicModel: getEnv("ANTHROPIC_MODEL_NAME") || "claude-3-5-sonnet-20241022",
      temperature: getFloatEnv("LLM_TEMPERATURE", 0.75),
      maxTokens: getIntEnv("LLM_MAX_TOKENS", 1024),
      requestTimeoutMs: getIntEnv("LLM_TIMEOUT_MS", 30_000, 1000),
    },
    chat: {
      systemPrompt: getEnv("SYSTEM_PROMPT") || DEFAULT_SYSTEM_PROMPT,
    },
    summary: {
      threshold: getIntEnv("SUMMARY_THRESHOLD", 10),
      window: getIntEnv("SUMMARY_WINDOW", 10),
      maxTokens: getIntEnv("SUMMARY_MAX_TOKENS", 250),
      logPath: path.resolve(process.cwd(), getEnv("SUMMARIES_LOG_PATH") || path.join("logs", "summaries.log")),
      summarizeOnPartialTurn: getBoolEnv("SUMMARIZE_ON_PARTIAL_TURN"),
    },
    server: {
      port: getIntEnv("CHAT_PORT", 7860, 0),
    },
  };
}
