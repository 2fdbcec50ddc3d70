import { PromptManager, SUMMARY_INSTRUCTION } from "../../../src/prompts/prompt-manager";
import { DEFAULT_SYSTEM_PROMPT } from "../../../src/config";

describe("PromptManager", () => {
  it("builds chat messages: system, history, then input", () => {
    const pm = new PromptManager();
    const msgs = pm.buildChatMessages({
      history: [
        { role: "user", content: "Hi" },
        { role: "assistant", content: "Hello!" },
      ],
      input: "How are you?",
    });
    expect(msgs).toEqual([
      { role: "system", content: DEFAULT_SYSTEM_PROMPT },
      { role: "user", content: "Hi" },
      { role: "assistant", content: "Hello!" },
      { role: "user", content: "How are you?" },
    ]);
  });

  it("accepts a custom system prompt", () => {
    const pm = new PromptManager({ systemPrompt: "Answer in French." });
    const msgs = pm.buildChatMessages({ history: [], input: "Hello" });
    expect(msgs[0]).toEqual({ role: "system", content: "Answer in French." });
  });

  it("builds summary messages with the fixed instruction", () => {
    const pm = new PromptManager();
    expect(pm.buildSummaryMessages("USER: a\nASSISTANT: b")).toEqual([
      { role: "system", content: SUMMARY_INSTRUCTION },
      { role: "user", content: "USER: a\nASSISTANT: b" },
    ]);
  });
});
