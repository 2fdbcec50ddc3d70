/**
 * Session turn controller: runs one user turn end to end.
 *
 *   idle -> validating -> streaming -> committing -> (summarizing) -> done
 *                            \-> errored -> committing (partial reply)
 *
 * The controller holds no state between turns; the session store does.
 */

import type { ConversationHistory, ISessionStore, Turn } from "../memory/types";
import type { SummaryResult } from "../memory/summarizer";
import type { CompletionContext } from "./completion-stream";
import type { TurnCallbacks, TurnState, TurnUpdate } from "./types";
import { aggregateResponse, type AggregationOutcome } from "./aggregator";
import { SessionLock } from "../memory/session-lock";
import { recordTurnMetrics } from "../metrics";
import { logger, logTurn } from "../logging";

/** Passed to the aggregator's return() when the consumer abandons a turn. */
const ABANDONED: AggregationOutcome = {
  status: "failed",
  reply: "",
  fragments: 0,
  error: new Error("Turn abandoned by consumer"),
};

/** Source of reply fragments for a turn. */
export interface FragmentSource {
  stream(ctx: CompletionContext): AsyncIterable<string>;
}

export interface TurnSummarizer {
  maybeSummarize(sessionId: string, history: ConversationHistory): Promise<SummaryResult>;
  report(sessionId: string, result: SummaryResult): void;
}

export interface SessionTurnControllerConfig {
  /** Run the summary check after a turn whose stream failed (default false). */
  summarizeOnPartialTurn?: boolean;
  /** Shared lock; one is created when omitted. */
  lock?: SessionLock;
}

export class SessionTurnController {
  private readonly summarizeOnPartialTurn: boolean;
  private readonly lock: SessionLock;

  constructor(
    private readonly store: ISessionStore,
    private readonly completions: FragmentSource,
    private readonly summarizer: TurnSummarizer,
    config: SessionTurnControllerConfig = {},
    private readonly callbacks: TurnCallbacks = {}
  ) {
    this.summarizeOnPartialTurn = config.summarizeOnPartialTurn ?? false;
    this.lock = config.lock ?? new SessionLock();
  }

  /**
   * Handle one user turn. Yields a snapshot for every reply fragment and, after a
   * clean stream, a final one once the turn is committed and the summary check has run. Provider and summary failures never surface here.
   * @param historySnapshot - What the UI currently shows; echoed back for empty input.
   */
  async *handleTurn(
    sessionId: string,
    inputText: string,
    historySnapshot?: readonly Turn[]
  ): AsyncGenerator<TurnUpdate, void, undefined> {
    let state: TurnState = "idle";
    const moveTo = (next: TurnState): void => {
      logger.debug({ event: "TURN_STATE", sessionId, from: state, to: next }, "Turn state change");
      this.callbacks.onStateChange?.(sessionId, state, next);
      state = next;
    };

    moveTo("validating");
    if (!inputText || inputText.trim().length === 0) {
      const unchanged = historySnapshot ?? (this.store.has(sessionId) ? this.store.getOrCreate(sessionId) : []);
      yield { sessionId, input: "", history: [...unchanged] };
      moveTo("done");
      return;
    }

    if (this.lock.isLocked(sessionId)) {
      logger.debug({ event: "TURN_QUEUED", sessionId }, "Another turn is in flight for this session; waiting");
    }
    const release = await this.lock.acquire(sessionId);
    try {
      const turnStart = Date.now();
      logTurn(logger, "start", sessionId, inputText.length);
      const history = this.store.getOrCreate(sessionId);
      if (historySnapshot && historySnapshot.length !== history.length) {
        logger.debug(
          { event: "HISTORY_DIVERGED", sessionId, uiTurns: historySnapshot.length, storedTurns: history.length },
          "UI history differs from stored history; using stored history"
        );
      }
      const base: Turn[] = [...history];

      moveTo("streaming");
      const snapshots = aggregateResponse(this.completions.stream({ history: base, input: inputText }), base, inputText);
      let step = await snapshots.next();
      try {
        while (!step.done) {
          yield { sessionId, input: "", history: step.value };
          step = await snapshots.next();
        }
      } finally {
        // Consumer left mid-stream: close the aggregator so the provider stream is released.
        if (!step.done) await snapshots.return(ABANDONED);
      }
      if (!step.done) return;
      const outcome = step.value;

      if (outcome.status === "failed") {
        moveTo("errored");
        logger.warn(
          { event: "STREAM_FAILED", sessionId, fragments: outcome.fragments, err: outcome.error.message },
          "Completion stream failed; committing partial reply"
        );
      }

      moveTo("committing");
      this.store.append(sessionId, [
        { role: "user", content: inputText },
        { role: "assistant", content: outcome.reply },
      ]);

      let summaryStatus: SummaryResult["status"] | undefined;
      if (outcome.status === "completed" || this.summarizeOnPartialTurn) {
        moveTo("summarizing");
        const result = await this.summarizer.maybeSummarize(sessionId, history);
        this.summarizer.report(sessionId, result);
        summaryStatus = result.status;
      }

      moveTo("done");
      recordTurnMetrics({
        sessionId,
        outcome: outcome.status,
        turnLatencyMs: Date.now() - turnStart,
        firstFragmentMs: outcome.firstFragmentMs,
        fragments: outcome.fragments,
        replyLength: outcome.reply.length,
        historyLength: history.length,
        summaryStatus,
      });
      logTurn(logger, "end", sessionId);
      if (outcome.status === "completed") {
        yield { sessionId, input: "", history: [...history] };
      }
    } finally {
      release();
    }
  }
}
