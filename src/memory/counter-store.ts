import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { componentLogger } from "../logger.js";

// ── Counter Store — durable per-session counters (SQLite) ─

const log = componentLogger("counter-store");

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS message_counts (
  session_id TEXT PRIMARY KEY,
  count INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS session_summary_times (
  session_id TEXT PRIMARY KEY,
  last_summary_timestamp REAL NOT NULL
);
`;

/**
 * Un-summarized turn counts and last-summary timestamps, one row per
 * session in two tables. Every statement is a single atomic upsert or a
 * transaction, so concurrent increments never lose updates.
 *
 * Storage errors are logged and reported through return values; none of
 * the methods throw after construction.
 */
export class CounterStore {
  private readonly db: Database.Database;

  constructor(readonly dbFile: string) {
    if (dbFile !== ":memory:") {
      mkdirSync(dirname(dbFile), { recursive: true });
    }
    this.db = new Database(dbFile);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);
    log.info({ dbFile }, "🗄️ Counter store ready");
  }

  getLastSummaryTime(sessionId: string): number | null {
    try {
      const row = this.db
        .prepare<[string], { ts: number }>(
          "SELECT last_summary_timestamp AS ts FROM session_summary_times WHERE session_id = ?",
        )
        .get(sessionId);
      return row ? Number(row.ts) : null;
    } catch (err) {
      log.error({ err, sessionId }, "❌ Failed to read last summary time");
      return null;
    }
  }

  updateLastSummaryTime(sessionId: string, summaryTime: number): boolean {
    try {
      this.db
        .prepare(
          "INSERT OR REPLACE INTO session_summary_times (session_id, last_summary_timestamp) VALUES (?, ?)",
        )
        .run(sessionId, summaryTime);
      return true;
    } catch (err) {
      log.error({ err, sessionId }, "❌ Failed to persist last summary time");
      return false;
    }
  }

  getCounter(sessionId: string): number {
    try {
      const row = this.db
        .prepare<[string], { count: number }>(
          "SELECT count FROM message_counts WHERE session_id = ?",
        )
        .get(sessionId);
      return row ? Number(row.count) : 0;
    } catch (err) {
      log.error({ err, sessionId }, "❌ Failed to read message count");
      return 0;
    }
  }

  incrementCounter(sessionId: string): boolean {
    try {
      this.db
        .prepare(
          `INSERT INTO message_counts (session_id, count) VALUES (?, 1)
           ON CONFLICT(session_id) DO UPDATE SET count = count + 1`,
        )
        .run(sessionId);
      return true;
    } catch (err) {
      log.error({ err, sessionId }, "❌ Failed to increment message count");
      return false;
    }
  }

  resetCounter(sessionId: string): boolean {
    try {
      this.db
        .prepare(
          "INSERT OR REPLACE INTO message_counts (session_id, count) VALUES (?, 0)",
        )
        .run(sessionId);
      return true;
    } catch (err) {
      log.error({ err, sessionId }, "❌ Failed to reset message count");
      return false;
    }
  }

  /**
   * Force the count down to `historyLength` when the history is shorter
   * than the stored count. Never raises the count. Returns false only
   * when storage fails.
   */
  adjustCounterIfNecessary(sessionId: string, historyLength: number): boolean {
    try {
      const adjust = this.db.transaction((id: string, length: number) => {
        const row = this.db
          .prepare<[string], { count: number }>(
            "SELECT count FROM message_counts WHERE session_id = ?",
          )
          .get(id);
        const stored = row ? Number(row.count) : 0;
        if (length >= stored) return null;
        this.db
          .prepare("UPDATE message_counts SET count = ? WHERE session_id = ?")
          .run(length, id);
        return stored;
      });

      const previous = adjust(sessionId, historyLength);
      if (previous !== null) {
        log.warn(
          { sessionId, from: previous, to: historyLength },
          "⚠️ History shorter than stored count — count adjusted",
        );
      }
      return true;
    } catch (err) {
      log.error({ err, sessionId }, "❌ Failed to reconcile message count");
      return false;
    }
  }

  /** Session ids with a stored count row. */
  listSessions(): string[] {
    try {
      const rows = this.db
        .prepare<[], { session_id: string }>(
          "SELECT session_id FROM message_counts ORDER BY session_id",
        )
        .all();
      return rows.map((r) => r.session_id);
    } catch (err) {
      log.error({ err }, "❌ Failed to list sessions");
      return [];
    }
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}
