/**
 * High-signal per-turn metrics.
 * Counters and latencies are logged; the last value is kept for inspection.
 */

import { logger } from "../logging";

/** Last turn timing and size. */
export interface TurnMetrics {
  sessionId?: string;
  /** Whether the completion stream finished cleanly. */
  outcome?: "completed" | "failed";
  /** Turn start to commit + summary (ms). */
  turnLatencyMs?: number;
  /** Turn start to first non-empty fragment (primary KPI). */
  firstFragmentMs?: number;
  fragments?: number;
  replyLength?: number;
  /** Committed turns in the session after this turn. */
  historyLength?: number;
  /** skipped | written | failed; absent when no summary check ran. */
  summaryStatus?: "skipped" | "written" | "failed";
}

let lastTurnMetrics: TurnMetrics = {};
let turnsCompleted = 0;
let turnsFailed = 0;

export function recordTurnMetrics(metrics: TurnMetrics): void {
  lastTurnMetrics = { ...metrics };
  if (metrics.outcome === "completed") turnsCompleted++;
  if (metrics.outcome === "failed") turnsFailed++;
  logger.info(
    {
      event: "TURN_METRICS",
      session_id: metrics.sessionId,
      outcome: metrics.outcome,
      turn_latency_ms: metrics.turnLatencyMs,
      first_fragment_ms: metrics.firstFragmentMs,
      fragments: metrics.fragments,
      reply_length: metrics.replyLength,
      history_length: metrics.historyLength,
      summary_status: metrics.summaryStatus,
    },
    "Turn latency"
  );
}

export function getLastTurnMetrics(): TurnMetrics {
  return { ...lastTurnMetrics };
}

export function getTurnCounters(): { completed: number; failed: number } {
  return { completed: turnsCompleted, failed: turnsFailed };
}
