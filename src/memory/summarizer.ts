/**
 * Summarization trigger: every `threshold` committed turns, summarize the last
 * `window` turns with one non-streaming LLM call and append the result to the
 * summaries log. Failures come back as a result value; nothing is thrown.
 */

import type { ILLM } from "../adapters/llm";
import type { ConversationHistory, SummaryRecord } from "./types";
import type { ISummaryLog } from "./summary-log";
import { PromptManager } from "../prompts/prompt-manager";
import { logger, logLlmCall, logSummaryWritten, toError } from "../logging";

const DEFAULT_THRESHOLD = 10;
const DEFAULT_WINDOW = 10;
const SUMMARY_MAX_TOKENS = 250;

export interface SummarizerOptions {
  /** Committed turns between summaries (default 10). */
  threshold?: number;
  /** How many recent turns to include in the summary prompt (default 10). */
  window?: number;
  /** Max tokens for the summary response (default 250). */
  maxTokens?: number;
  promptManager?: PromptManager;
  /** Clock for record timestamps. */
  now?: () => Date;
}

export type SummaryResult =
  | { status: "skipped"; turnCount: number }
  | { status: "written"; turnCount: number; record: SummaryRecord }
  | { status: "failed"; turnCount: number; error: Error };

export function shouldSummarize(turnCount: number, threshold: number): boolean {
  return turnCount > 0 && turnCount % threshold === 0;
}

/** Last `window` turns as `ROLE: content` lines. */
export function buildTextWindow(history: ConversationHistory, window: number): string {
  if (history.length === 0 || window <= 0) return "";
  return history
    .slice(-window)
    .map((t) => `${t.role.toUpperCase()}: ${t.content}`)
    .join("\n");
}

export class Summarizer {
  readonly threshold: number;
  readonly window: number;
  private readonly maxTokens: number;
  private readonly promptManager: PromptManager;
  private readonly now: () => Date;

  constructor(
    private readonly llm: ILLM,
    private readonly log: ISummaryLog,
    options: SummarizerOptions = {}
  ) {
    this.threshold = Math.max(1, options.threshold ?? DEFAULT_THRESHOLD);
    this.window = Math.max(1, options.window ?? DEFAULT_WINDOW);
    this.maxTokens = options.maxTokens ?? SUMMARY_MAX_TOKENS;
    this.promptManager = options.promptManager ?? new PromptManager();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Summarize when the committed history length is a multiple of the threshold.
   * Safe to call after every committed turn.
   */
  async maybeSummarize(sessionId: string, history: ConversationHistory): Promise<SummaryResult> {
    const turnCount = history.length;
    if (!shouldSummarize(turnCount, this.threshold)) {
      return { status: "skipped", turnCount };
    }

    try {
      const messages = this.promptManager.buildSummaryMessages(buildTextWindow(history, this.window));
      const start = Date.now();
      const response = await this.llm.chat(messages, { stream: false, maxTokens: this.maxTokens });
      logLlmCall(logger, messages.length, response.text.length, Date.now() - start);

      const record: SummaryRecord = {
        timestamp: this.now(),
        sessionId,
        summaryText: response.text,
      };
      await this.log.append(record);
      return { status: "written", turnCount, record };
    } catch (err) {
      return { status: "failed", turnCount, error: toError(err) };
    }
  }

  /** Log the outcome of a summary attempt. The result is not used further. */
  report(sessionId: string, result: SummaryResult): void {
    switch (result.status) {
      case "skipped":
        return;
      case "written":
        logSummaryWritten(logger, sessionId, result.turnCount, this.log.filePath);
        return;
      case "failed":
        logger.warn(
          { event: "SUMMARY_FAILED", sessionId, turnCount: result.turnCount, err: result.error.message },
          "Conversation summary failed"
        );
        return;
    }
  }
}
