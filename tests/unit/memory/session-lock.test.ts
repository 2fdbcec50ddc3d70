/**
 * Unit tests for the per-session turn lock.
 */

import { SessionLock } from "../../../src/memory/session-lock";

describe("SessionLock", () => {
  it("serializes holders of the same session", async () => {
    const lock = new SessionLock();
    const order: string[] = [];

    const releaseFirst = await lock.acquire("s");
    const second = lock.acquire("s").then((release) => {
      order.push("second");
      release();
    });
    await new Promise((r) => setTimeout(r, 10));
    order.push("first-done");
    releaseFirst();
    await second;

    expect(order).toEqual(["first-done", "second"]);
    expect(lock.isLocked("s")).toBe(false);
  });

  it("does not block other sessions", async () => {
    const lock = new SessionLock();
    const releaseA = await lock.acquire("a");
    const releaseB = await lock.acquire("b");
    expect(lock.isLocked("a")).toBe(true);
    expect(lock.isLocked("b")).toBe(true);
    releaseA();
    releaseB();
    expect(lock.isLocked("a")).toBe(false);
    expect(lock.isLocked("b")).toBe(false);
  });

  it("ignores a second release call", async () => {
    const lock = new SessionLock();
    const release = await lock.acquire("s");
    release();
    release();
    const again = await lock.acquire("s");
    expect(lock.isLocked("s")).toBe(true);
    again();
  });
});
