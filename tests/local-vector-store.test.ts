import { describe, it, expect, beforeEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { LocalVectorStore } from "../src/vector/local.js";
import {
  DEFAULT_OUTPUT_FIELDS,
  MAX_CONTENT_LENGTH,
  buildMemorySchema,
  setupCollection,
} from "../src/vector/collection.js";
import { eq, renderFilter } from "../src/vector/filter.js";
import type { VectorRow } from "../src/vector/types.js";
import { ConfigError } from "../src/config.js";

const COLLECTION = "memories";
const SEARCH_PARAMS = { metric_type: "L2" as const, params: {} };

function row(session: string, content: string, vector: number[], createTime = 100): VectorRow {
  return {
    personality_id: "p1",
    session_id: session,
    content,
    vector,
    create_time: createTime,
  };
}

async function connectedStore(path: string | null = null): Promise<LocalVectorStore> {
  const store = new LocalVectorStore(path);
  await store.connect();
  await setupCollection(store, COLLECTION, buildMemorySchema(2), {
    metric_type: "L2",
    index_type: "AUTOINDEX",
    params: {},
  });
  return store;
}

describe("renderFilter", () => {
  it("joins clauses with and, quoting strings", () => {
    expect(
      renderFilter([{ field: "memory_id", op: ">", value: 0 }, eq("session_id", 's"1')]),
    ).toBe('memory_id > 0 and session_id == "s\\"1"');
  });
});

describe("buildMemorySchema", () => {
  it("rejects a non-positive dimension", () => {
    expect(() => buildMemorySchema(0)).toThrow(ConfigError);
  });
});

describe("LocalVectorStore", () => {
  let store: LocalVectorStore;

  beforeEach(async () => {
    store = await connectedStore();
  });

  it("creates the collection once", async () => {
    expect(store.isConnected()).toBe(true);
    expect(await store.listCollections()).toEqual([COLLECTION]);
    expect(await store.describeCollection(COLLECTION)).toEqual({ vectorDim: 2 });
  });

  it("assigns increasing ids from 1", async () => {
    const result = await store.insert(COLLECTION, [
      row("s1", "a", [0, 0]),
      row("s1", "b", [1, 1]),
    ]);
    expect(result).toEqual({ insertedCount: 2, ids: [1, 2] });
  });

  it("rejects vectors of the wrong dimension", async () => {
    expect(await store.insert(COLLECTION, [row("s1", "a", [0, 0, 0])])).toBeNull();
  });

  it("truncates content to the schema limit", async () => {
    await store.insert(COLLECTION, [row("s1", "x".repeat(MAX_CONTENT_LENGTH + 10), [0, 0])]);
    const [first] = (await store.query(COLLECTION, [], ["content"], 10)) ?? [];
    expect(String(first?.content)).toHaveLength(MAX_CONTENT_LENGTH);
  });

  it("searches by L2 distance inside the filter", async () => {
    await store.insert(COLLECTION, [
      row("s1", "near", [0, 0]),
      row("s1", "far", [1, 1]),
      row("s2", "other session", [0.1, 0]),
    ]);
    const hits = await store.search(COLLECTION, {
      vectors: [[0, 0]],
      vectorField: "vector",
      searchParams: SEARCH_PARAMS,
      limit: 5,
      filter: [eq("session_id", "s1")],
      outputFields: DEFAULT_OUTPUT_FIELDS,
    });
    expect(hits).toEqual([
      [
        {
          id: 1,
          score: 0,
          entity: {
            content: "near",
            create_time: 100,
            session_id: "s1",
            personality_id: "p1",
            memory_id: 1,
          },
        },
        {
          id: 2,
          score: 2,
          entity: {
            content: "far",
            create_time: 100,
            session_id: "s1",
            personality_id: "p1",
            memory_id: 2,
          },
        },
      ],
    ]);
  });

  it("ranks by inner product, highest first", async () => {
    await store.insert(COLLECTION, [row("s1", "small", [1, 0]), row("s1", "big", [3, 0])]);
    const hits = await store.search(COLLECTION, {
      vectors: [[1, 0]],
      vectorField: "vector",
      searchParams: { metric_type: "IP", params: {} },
      limit: 1,
      filter: [],
      outputFields: ["content"],
    });
    expect(hits).toEqual([[{ id: 2, score: 3, entity: { content: "big" } }]]);
  });

  it("queries and deletes by filter", async () => {
    await store.insert(COLLECTION, [
      row("s1", "a", [0, 0]),
      row("s2", "b", [0, 0]),
      row("s1", "c", [0, 0]),
    ]);
    expect(await store.query(COLLECTION, [eq("session_id", "s1")], ["content"], 10)).toEqual([
      { content: "a" },
      { content: "c" },
    ]);
    expect(await store.delete(COLLECTION, [eq("session_id", "s1")])).toEqual({ deletedCount: 2 });
    expect(await store.query(COLLECTION, [], ["content"], 10)).toEqual([{ content: "b" }]);
  });

  it("signals failure with null for a missing collection", async () => {
    expect(await store.query("missing", [], [], 10)).toBeNull();
    expect(await store.delete("missing", [])).toBeNull();
    expect(await store.insert("missing", [row("s1", "a", [0, 0])])).toBeNull();
    expect(
      await store.search("missing", {
        vectors: [[0, 0]],
        vectorField: "vector",
        searchParams: SEARCH_PARAMS,
        limit: 1,
        filter: [],
        outputFields: [],
      }),
    ).toBeNull();
  });

  it("drops collections", async () => {
    expect(await store.dropCollection(COLLECTION)).toBe(true);
    expect(await store.dropCollection(COLLECTION)).toBe(false);
    expect(await store.hasCollection(COLLECTION)).toBe(false);
  });
});

describe("LocalVectorStore persistence", () => {
  it("reloads rows and ids after flush", async () => {
    const dir = mkdtempSync(join(tmpdir(), "vectors-"));
    const file = join(dir, "store.json");
    try {
      const first = await connectedStore(file);
      await first.insert(COLLECTION, [row("s1", "kept", [0, 0])]);
      await first.flush([COLLECTION]);
      await first.disconnect();

      const second = await connectedStore(file);
      expect(await second.query(COLLECTION, [], ["content", "memory_id"], 10)).toEqual([
        { content: "kept", memory_id: 1 },
      ]);
      const next = await second.insert(COLLECTION, [row("s1", "new", [1, 0])]);
      expect(next?.ids).toEqual([2]);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("keeps inserts and deletes on disk without a flush", async () => {
    const dir = mkdtempSync(join(tmpdir(), "vectors-"));
    const file = join(dir, "store.json");
    try {
      const first = await connectedStore(file);
      await first.insert(COLLECTION, [row("s1", "a", [0, 0]), row("s2", "b", [1, 0])]);
      await first.delete(COLLECTION, [eq("session_id", "s2")]);

      // no flush, no disconnect: as after a crash
      const second = await connectedStore(file);
      expect(await second.query(COLLECTION, [], ["content", "memory_id"], 10)).toEqual([
        { content: "a", memory_id: 1 },
      ]);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("rejects data operations after disconnect", async () => {
    const dir = mkdtempSync(join(tmpdir(), "vectors-"));
    const file = join(dir, "store.json");
    try {
      const store = await connectedStore(file);
      await store.disconnect();

      expect(await store.insert(COLLECTION, [row("s1", "late", [0, 0])])).toBeNull();
      expect(await store.query(COLLECTION, [], [], 10)).toBeNull();
      expect(await store.delete(COLLECTION, [])).toBeNull();
      expect(
        await store.search(COLLECTION, {
          vectors: [[0, 0]],
          vectorField: "vector",
          searchParams: SEARCH_PARAMS,
          limit: 1,
          filter: [],
          outputFields: [],
        }),
      ).toBeNull();

      const reopened = await connectedStore(file);
      expect(await reopened.query(COLLECTION, [], [], 10)).toEqual([]);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("refuses to connect to a corrupt file", async () => {
    const dir = mkdtempSync(join(tmpdir(), "vectors-"));
    const file = join(dir, "store.json");
    try {
      writeFileSync(file, "{ nope", "utf-8");
      const store = new LocalVectorStore(file);
      expect(await store.connect()).toBe(false);
      expect(store.isConnected()).toBe(false);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
