import type { SessionResolver } from "../host/types.js";
import type { EntityFields, FilterExpression, VectorStore } from "../vector/types.js";
import { DEFAULT_OUTPUT_FIELDS, PRIMARY_FIELD_NAME } from "../vector/collection.js";
import { eq, renderFilter } from "../vector/filter.js";
import type { OriginHandle } from "./types.js";
import { componentLogger } from "../logger.js";

// ── Memory administration ────────────────────────────────

const log = componentLogger("admin");

export const MAX_FETCH_RECORDS = 1000;
export const DEFAULT_LIST_LIMIT = 5;
export const MAX_LIST_LIMIT = 50;
export const PREVIEW_LENGTH = 200;

export type AdminResult<T extends object = object> =
  | ({ ok: true } & T)
  | { ok: false; reason: string };

export interface RecordSummary {
  memoryId: number | null;
  sessionId: string | null;
  personalityId: string | null;
  createTime: number | null;
  /** Content cut to {@link PREVIEW_LENGTH} chars, "..." appended when cut */
  preview: string;
}

export class MemoryAdmin {
  constructor(
    private readonly store: VectorStore,
    private readonly resolver: SessionResolver,
    private readonly collectionName: string,
  ) {}

  async listCollections(): Promise<AdminResult<{ collections: string[] }>> {
    if (!this.store.isConnected()) return notConnected();
    const collections = await this.store.listCollections();
    if (collections === null) {
      return { ok: false, reason: "Failed to list collections" };
    }
    return { ok: true, collections };
  }

  async dropCollection(
    name: string,
    confirm = false,
  ): Promise<AdminResult<{ dropped: string }>> {
    if (!this.store.isConnected()) return notConnected();
    if (!confirm) {
      return { ok: false, reason: `Dropping "${name}" deletes all its memories; pass confirm` };
    }
    if (!(await this.store.hasCollection(name))) {
      return { ok: false, reason: `Collection "${name}" does not exist` };
    }
    if (!(await this.store.dropCollection(name))) {
      return { ok: false, reason: `Failed to drop collection "${name}"` };
    }
    log.warn({ collection: name }, "🗑️ Collection dropped");
    return { ok: true, dropped: name };
  }

  /** Newest records first, optionally for one session. */
  async listRecords(
    sessionId: string | null = null,
    limit = DEFAULT_LIST_LIMIT,
  ): Promise<AdminResult<{ records: RecordSummary[]; total: number }>> {
    if (!this.store.isConnected()) return notConnected();
    const take = Math.min(Math.max(Math.floor(limit), 1), MAX_LIST_LIMIT);

    const filter: FilterExpression = [{ field: PRIMARY_FIELD_NAME, op: ">", value: 0 }];
    if (sessionId) filter.push(eq("session_id", sessionId));

    const rows = await this.store.query(
      this.collectionName,
      filter,
      DEFAULT_OUTPUT_FIELDS,
      MAX_FETCH_RECORDS,
    );
    if (rows === null) {
      return { ok: false, reason: `Failed to query records (${renderFilter(filter)})` };
    }

    const records = rows
      .map(toSummary)
      .sort((a, b) => (b.createTime ?? 0) - (a.createTime ?? 0))
      .slice(0, take);
    return { ok: true, records, total: rows.length };
  }

  /** Delete every memory of a session, then flush. */
  async deleteSessionMemory(
    sessionId: string,
    confirm = false,
  ): Promise<AdminResult<{ sessionId: string; deletedCount: number | null }>> {
    if (!this.store.isConnected()) return notConnected();
    if (!sessionId) return { ok: false, reason: "Session id is required" };
    if (!confirm) {
      return {
        ok: false,
        reason: `Deleting memories of session "${sessionId}" cannot be undone; pass confirm`,
      };
    }

    const result = await this.store.delete(this.collectionName, [eq("session_id", sessionId)]);
    if (result === null) {
      return { ok: false, reason: `Failed to delete memories of session "${sessionId}"` };
    }
    await this.store.flush([this.collectionName]);
    log.warn({ sessionId, deleted: result.deletedCount }, "🗑️ Session memories deleted");
    return { ok: true, sessionId, deletedCount: result.deletedCount };
  }

  /** {@link deleteSessionMemory} for the session `origin` belongs to. */
  async resetSessionMemory(
    origin: OriginHandle,
    confirm = false,
  ): Promise<AdminResult<{ sessionId: string; deletedCount: number | null }>> {
    let sessionId: string;
    try {
      sessionId = await this.resolver.getCurrentSessionId(origin);
    } catch (err) {
      log.error({ err }, "❌ Could not resolve the current session");
      return { ok: false, reason: "Could not resolve the current session" };
    }
    return this.deleteSessionMemory(sessionId, confirm);
  }
}

function notConnected(): { ok: false; reason: string } {
  return { ok: false, reason: "Vector store is not connected" };
}

function toSummary(row: EntityFields): RecordSummary {
  const content = typeof row.content === "string" ? row.content : "";
  return {
    memoryId: typeof row.memory_id === "number" ? row.memory_id : null,
    sessionId: typeof row.session_id === "string" ? row.session_id : null,
    personalityId: typeof row.personality_id === "string" ? row.personality_id : null,
    createTime: typeof row.create_time === "number" ? row.create_time : null,
    preview:
      content.length > PREVIEW_LENGTH ? `${content.slice(0, PREVIEW_LENGTH)}...` : content,
  };
}
