/**
 * Unit tests for the summarization trigger.
 */

import type { SummaryRecord, Turn } from "../../../src/memory/types";
import type { ISummaryLog } from "../../../src/memory/summary-log";
import { Summarizer, buildTextWindow, shouldSummarize } from "../../../src/memory/summarizer";
import { SUMMARY_INSTRUCTION } from "../../../src/prompts/prompt-manager";
import { ScriptedLLM } from "../../helpers/scripted-llm";

class MemoryLog implements ISummaryLog {
  readonly filePath = "memory://summaries";
  readonly records: SummaryRecord[] = [];
  failWith?: Error;

  async append(record: SummaryRecord): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.records.push(record);
  }
}

function pairs(count: number): Turn[] {
  const turns: Turn[] = [];
  for (let i = 1; i <= count; i++) {
    turns.push({ role: "user", content: `q${i}` });
    turns.push({ role: "assistant", content: `a${i}` });
  }
  return turns;
}

describe("shouldSummarize", () => {
  it("fires only on exact multiples of the threshold", () => {
    expect(shouldSummarize(0, 10)).toBe(false);
    expect(shouldSummarize(8, 10)).toBe(false);
    expect(shouldSummarize(10, 10)).toBe(true);
    expect(shouldSummarize(12, 10)).toBe(false);
    expect(shouldSummarize(20, 10)).toBe(true);
  });
});

describe("buildTextWindow", () => {
  it("renders the last N turns as ROLE: content lines", () => {
    const text = buildTextWindow(pairs(2), 3);
    expect(text).toBe("ASSISTANT: a1\nUSER: q2\nASSISTANT: a2");
  });

  it("returns an empty string for an empty history", () => {
    expect(buildTextWindow([], 10)).toBe("");
  });

  it("uses the whole history when it is shorter than the window", () => {
    expect(buildTextWindow(pairs(1), 10)).toBe("USER: q1\nASSISTANT: a1");
  });
});

describe("Summarizer", () => {
  const fixedNow = new Date(2024, 2, 3, 4, 5, 6);

  it("skips without calling the LLM below the threshold", async () => {
    const llm = new ScriptedLLM();
    const log = new MemoryLog();
    const summarizer = new Summarizer(llm, log);
    const result = await summarizer.maybeSummarize("A", pairs(4));
    expect(result).toEqual({ status: "skipped", turnCount: 8 });
    expect(llm.calls).toHaveLength(0);
    expect(log.records).toHaveLength(0);
  });

  it("summarizes exactly the last window of turns at a crossing and logs the text as returned", async () => {
    const llm = new ScriptedLLM([], "  Summary: ten turns.  ");
    const log = new MemoryLog();
    const summarizer = new Summarizer(llm, log, { now: () => fixedNow });
    const history = pairs(10);

    const result = await summarizer.maybeSummarize("A", history);

    expect(result.status).toBe("written");
    expect(llm.summaryCalls).toHaveLength(1);
    const [call] = llm.summaryCalls;
    expect(call.options).toEqual({ stream: false, maxTokens: 250 });
    expect(call.messages[0]).toEqual({ role: "system", content: SUMMARY_INSTRUCTION });
    expect(call.messages[1].content).toBe(buildTextWindow(history, 10));
    expect(call.messages[1].content.split("\n")).toHaveLength(10);
    expect(call.messages[1].content.startsWith("USER: q6\n")).toBe(true);
    expect(log.records).toEqual([{ timestamp: fixedNow, sessionId: "A", summaryText: "  Summary: ten turns.  " }]);
  });

  it("honours custom threshold and window", async () => {
    const llm = new ScriptedLLM();
    const log = new MemoryLog();
    const summarizer = new Summarizer(llm, log, { threshold: 4, window: 2 });
    const result = await summarizer.maybeSummarize("A", pairs(2));
    expect(result.status).toBe("written");
    expect(llm.summaryCalls[0].messages[1].content).toBe("USER: q2\nASSISTANT: a2");
  });

  it("returns a failed result when the LLM call throws", async () => {
    const llm = new ScriptedLLM([], new Error("provider down"));
    const log = new MemoryLog();
    const summarizer = new Summarizer(llm, log);
    const result = await summarizer.maybeSummarize("A", pairs(5));
    expect(result.status).toBe("failed");
    if (result.status === "failed") expect(result.error.message).toBe("provider down");
    expect(log.records).toHaveLength(0);
  });

  it("returns a failed result when the log write throws", async () => {
    const llm = new ScriptedLLM();
    const log = new MemoryLog();
    log.failWith = new Error("disk full");
    const summarizer = new Summarizer(llm, log);
    const result = await summarizer.maybeSummarize("A", pairs(5));
    expect(result.status).toBe("failed");
    if (result.status === "failed") expect(result.error.message).toBe("disk full");
  });
});
