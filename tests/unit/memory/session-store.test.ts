/**
 * Unit tests for the in-memory session store.
 */

import { InMemorySessionStore } from "../../../src/memory/session-store";

describe("InMemorySessionStore", () => {
  it("creates an empty history on first reference", () => {
    const store = new InMemorySessionStore();
    expect(store.has("a")).toBe(false);
    const history = store.getOrCreate("a");
    expect(history).toEqual([]);
    expect(store.has("a")).toBe(true);
    expect(store.size()).toBe(1);
  });

  it("returns the same instance for repeated lookups", () => {
    const store = new InMemorySessionStore();
    const first = store.getOrCreate("new-session");
    const second = store.getOrCreate("new-session");
    expect(second).toBe(first);
    expect(store.size()).toBe(1);
  });

  it("makes appends visible through previously returned references", () => {
    const store = new InMemorySessionStore();
    const held = store.getOrCreate("s");
    store.append("s", [
      { role: "user", content: "Hi" },
      { role: "assistant", content: "Hello" },
    ]);
    expect(held).toEqual([
      { role: "user", content: "Hi" },
      { role: "assistant", content: "Hello" },
    ]);
  });

  it("keeps sessions separate", () => {
    const store = new InMemorySessionStore();
    store.append("a", [{ role: "user", content: "from a" }]);
    store.append("b", [{ role: "user", content: "from b" }]);
    expect(store.getOrCreate("a").map((t) => t.content)).toEqual(["from a"]);
    expect(store.getOrCreate("b").map((t) => t.content)).toEqual(["from b"]);
    expect(store.sessionIds().sort()).toEqual(["a", "b"]);
  });

  it("copies appended turns so callers cannot edit stored history", () => {
    const store = new InMemorySessionStore();
    const turn = { role: "user" as const, content: "original" };
    store.append("s", [turn]);
    turn.content = "changed";
    expect(store.getOrCreate("s")[0].content).toBe("original");
  });
});
