import type {
  ContextMessage,
  HistoryMessage,
  OriginHandle,
  Role,
  SessionContext,
} from "./types.js";
import { isRole } from "./types.js";
import type { CounterStore } from "./counter-store.js";
import { formatHistoryTimestamp } from "./format.js";
import { componentLogger } from "../logger.js";

// ── Session State Store ──────────────────────────────────

const log = componentLogger("session-state");

export type Clock = () => number;

/** Unix seconds, fractional. */
export const systemClock: Clock = () => Date.now() / 1000;

/**
 * Owns per-session history (in memory), the origin handle each session
 * was first seen with, and — through {@link CounterStore} — the durable
 * turn counts and last-summary timestamps.
 *
 * History is never truncated here; summaries only move the counter.
 */
export class SessionStateStore {
  private readonly sessions = new Map<string, SessionContext>();

  constructor(
    readonly counters: CounterStore,
    private readonly now: Clock = systemClock,
  ) {}

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /** Snapshot of tracked session ids. */
  sessionIds(): string[] {
    return [...this.sessions.keys()];
  }

  /**
   * Track a session if it is not tracked yet. Seeds history from
   * `initialHistory` and restores the last summary time from storage,
   * writing `now` through when none is stored.
   *
   * @returns true when the session was created by this call
   */
  ensureSession(
    sessionId: string,
    initialHistory: ContextMessage[] = [],
    origin: OriginHandle | null = null,
  ): boolean {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      if (existing.origin === null && origin !== null) existing.origin = origin;
      return false;
    }

    let lastSummaryTime = this.counters.getLastSummaryTime(sessionId);
    if (lastSummaryTime === null) {
      lastSummaryTime = this.now();
      this.counters.updateLastSummaryTime(sessionId, lastSummaryTime);
    }

    this.sessions.set(sessionId, {
      history: toHistory(initialHistory),
      lastSummaryTime,
      origin,
    });
    log.info(
      { sessionId, seeded: initialHistory.length, lastSummaryTime },
      "🧵 Session tracked",
    );
    return true;
  }

  /** Append one turn. Creates the session when it is not tracked yet. */
  addMessage(
    sessionId: string,
    role: Role,
    content: string,
    origin: OriginHandle | null = null,
  ): void {
    if (this.ensureSession(sessionId, [], origin) && origin === null) {
      log.warn(
        { sessionId },
        "⚠️ Session created without an origin — persona lookup for background summaries will fail",
      );
    }
    const session = this.sessions.get(sessionId);
    session?.history.push({
      role,
      content,
      timestamp: formatHistoryTimestamp(new Date(this.now() * 1000)),
    });
  }

  incrementCount(sessionId: string): boolean {
    return this.counters.incrementCounter(sessionId);
  }

  resetCount(sessionId: string): boolean {
    return this.counters.resetCounter(sessionId);
  }

  getCount(sessionId: string): number {
    return this.counters.getCounter(sessionId);
  }

  adjustCountIfNecessary(sessionId: string, historyLength: number): boolean {
    return this.counters.adjustCounterIfNecessary(sessionId, historyLength);
  }

  /** Set last summary time to now, in memory and in storage. */
  updateSummaryTime(sessionId: string): boolean {
    const now = this.now();
    const session = this.sessions.get(sessionId);
    if (session) {
      session.lastSummaryTime = now;
    } else {
      log.warn({ sessionId }, "⚠️ Summary time updated for an untracked session");
    }
    return this.counters.updateLastSummaryTime(sessionId, now);
  }

  /**
   * Zero the counter and stamp the summary time as one step, so a span
   * that has just been handed to the summarizer cannot trigger again.
   */
  markSummarized(sessionId: string): boolean {
    const reset = this.resetCount(sessionId);
    const stamped = this.updateSummaryTime(sessionId);
    return reset && stamped;
  }

  getHistory(sessionId: string): HistoryMessage[] {
    return this.sessions.get(sessionId)?.history ?? [];
  }

  getSummaryTime(sessionId: string): number | null {
    return this.sessions.get(sessionId)?.lastSummaryTime ?? null;
  }

  getFullContext(sessionId: string): SessionContext | null {
    return this.sessions.get(sessionId) ?? null;
  }

  /** Forget a session's in-memory state. Durable rows stay. */
  drop(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }
}

function toHistory(messages: ContextMessage[]): HistoryMessage[] {
  const stamp = formatHistoryTimestamp();
  const history: HistoryMessage[] = [];
  for (const msg of messages) {
    const role = msg.role;
    if (!isRole(role)) continue;
    history.push({
      role,
      content:
        typeof msg.content === "string"
          ? msg.content
          : (JSON.stringify(msg.content) ?? ""),
      timestamp: stamp,
    });
  }
  return history;
}
