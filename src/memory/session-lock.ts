/**
 * Per-session turn lock: at most one in-flight turn per session id.
 * Turns for different sessions run concurrently.
 */

export type ReleaseFn = () => void;

export class SessionLock {
  private readonly tails = new Map<string, Promise<void>>();

  /** Resolves once every earlier holder for this session has released. */
  async acquire(sessionId: string): Promise<ReleaseFn> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    let release: ReleaseFn = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(sessionId, tail);
    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      release();
      if (this.tails.get(sessionId) === tail) this.tails.delete(sessionId);
    };
  }

  isLocked(sessionId: string): boolean {
    return this.tails.has(sessionId);
  }
}
