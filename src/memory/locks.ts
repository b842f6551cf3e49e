// ── Per-session locks ────────────────────────────────────

/**
 * Serializes work per session. Tasks for the same session run one after
 * another in arrival order; other sessions are not blocked. One instance
 * is shared by every component that touches a session's counter.
 */
export class SessionLocks {
  private readonly tails = new Map<string, Promise<unknown>>();

  async run<T>(sessionId: string, task: () => Promise<T> | T): Promise<T> {
    const waitFor = this.tails.get(sessionId) ?? Promise.resolve();
    const result = waitFor.then(() => task());
    // Never rejects; the next task for the session waits on it
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(sessionId, tail);
    try {
      return await result;
    } finally {
      if (this.tails.get(sessionId) === tail) this.tails.delete(sessionId);
    }
  }

  /** Sessions with queued or running work. */
  get size(): number {
    return this.tails.size;
  }
}
