/**
 * Structured logging for the chat assistant.
 * Logs turn lifecycle, LLM calls, summaries and errors with timestamps. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL   - debug | info | warn | error | silent (default: info)
 *   LOG_FILE   - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

function envLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  const match = LOG_LEVELS.find((l) => l === raw);
  if (match) return match;
  // Keep test output quiet unless asked for.
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

const defaultConfig: LoggerConfig = {
  level: envLevel(),
  pretty: process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test",
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Log turn start/end. */
export function logTurn(log: pino.Logger, phase: "start" | "end", sessionId: string, inputLength?: number): void {
  log.info(
    { event: phase === "start" ? "TURN_STARTED" : "TURN_ENDED", sessionId, inputLength },
    phase === "start" ? "Turn start" : "Turn end"
  );
}

/** Log LLM request/response (summary only). */
export function logLlmCall(log: pino.Logger, messageCount: number, responseLength: number, durationMs?: number): void {
  log.info({ event: "LLM_CALL", messageCount, responseLength, durationMs }, "LLM completed");
}

/** Log a summary record that reached the summaries log. */
export function logSummaryWritten(log: pino.Logger, sessionId: string, turnCount: number, logPath: string): void {
  log.info({ event: "SUMMARY_WRITTEN", sessionId, turnCount, path: logPath }, "Saved conversation summary");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, stack: err.stack, ...context }, "Error");
}

/** Normalize an unknown thrown value into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
