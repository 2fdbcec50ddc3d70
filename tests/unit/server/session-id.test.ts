import { generateSessionId } from "../../../src/server/session-id";

describe("generateSessionId", () => {
  it("joins two five-digit numbers around the timestamp", () => {
    const id = generateSessionId(() => 1_700_000_000_123);
    expect(id).toMatch(/^\d{5}_1700000000123_\d{5}$/);
  });

  it("produces different ids across calls", () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateSessionId()));
    expect(ids.size).toBeGreaterThan(1);
  });
});
