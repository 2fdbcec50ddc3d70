/**
 * Entry point: load config, wire store + LLM + controller, serve the chat surface.
 * Uses the stub LLM when no provider key is configured.
 */

import { loadConfig } from "./config";
import { createLLM } from "./adapters/llm";
import { InMemorySessionStore } from "./memory/session-store";
import { SummaryLog } from "./memory/summary-log";
import { Summarizer } from "./memory/summarizer";
import { PromptManager } from "./prompts/prompt-manager";
import { CompletionStreamAdapter } from "./pipeline/completion-stream";
import { SessionTurnController } from "./pipeline/turn-controller";
import { startChatServer } from "./server/chat-server";
import { logger, logError, toError } from "./logging";

async function main(): Promise<void> {
  const config = loadConfig();
  const llm = createLLM(config);
  const promptManager = new PromptManager({ systemPrompt: config.chat.systemPrompt });
  const store = new InMemorySessionStore();

  const completions = new CompletionStreamAdapter(llm, {
    maxTokens: config.llm.maxTokens,
    temperature: config.llm.temperature,
    requestTimeoutMs: config.llm.requestTimeoutMs,
    promptManager,
  });
  const summarizer = new Summarizer(llm, new SummaryLog(config.summary.logPath), {
    threshold: config.summary.threshold,
    window: config.summary.window,
    maxTokens: config.summary.maxTokens,
    promptManager,
  });
  const controller = new SessionTurnController(store, completions, summarizer, {
    summarizeOnPartialTurn: config.summary.summarizeOnPartialTurn,
  });

  const chat = await startChatServer({ controller, store, port: config.server.port });
  logger.info(
    {
      event: "ASSISTANT_READY",
      provider: config.llm.provider,
      port: chat.port,
      summaryThreshold: config.summary.threshold,
      summariesLog: config.summary.logPath,
    },
    "Chat assistant ready"
  );

  process.on("SIGINT", () => {
    chat
      .close()
      .catch((err: unknown) => logger.warn({ event: "SHUTDOWN_FAILED", err: String(err) }, "Chat server close failed"))
      .finally(() => process.exit(0));
  });
}

main().catch((err: unknown) => {
  logError(logger, toError(err));
  process.exit(1);
});
