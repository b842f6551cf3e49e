import { readFileSync, writeFileSync, mkdirSync, existsSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import type { IndexParams, Metric } from "../config.js";
import type {
  CollectionSchema,
  DeleteResult,
  EntityFields,
  FieldValue,
  FilterExpression,
  InsertResult,
  SearchHit,
  SearchRequest,
  VectorRow,
  VectorStore,
} from "./types.js";
import { matchesFilter } from "./filter.js";
import { componentLogger } from "../logger.js";

// ── Local Vector Store — in-process flat index ───────────
// Brute-force search over every row; persisted as one JSON file.

const log = componentLogger("vector-store");

const collectionFileSchema = z.object({
  schema: z.object({
    description: z.string(),
    vectorDim: z.number().int().positive(),
    fields: z.array(
      z.object({
        name: z.string(),
        type: z.enum(["int64", "varchar", "float_vector"]),
        isPrimary: z.boolean().optional(),
        autoId: z.boolean().optional(),
        maxLength: z.number().optional(),
        dim: z.number().optional(),
        description: z.string().optional(),
      }),
    ),
  }),
  metric: z.enum(["L2", "IP", "COSINE"]).default("L2"),
  nextId: z.number().int().positive(),
  rows: z.array(z.record(z.union([z.string(), z.number(), z.array(z.number())]))),
});
const storeFileSchema = z.record(collectionFileSchema);

interface LocalCollection {
  schema: CollectionSchema;
  metric: Metric;
  nextId: number;
  rows: VectorRow[];
}

export class LocalVectorStore implements VectorStore {
  readonly backend = "local";
  private collections = new Map<string, LocalCollection>();
  private connected = false;

  /** @param filePath JSON file to persist to; null keeps everything in memory */
  constructor(private readonly filePath: string | null) {}

  async connect(): Promise<boolean> {
    if (this.filePath && existsSync(this.filePath)) {
      try {
        const parsed = storeFileSchema.parse(
          JSON.parse(readFileSync(this.filePath, "utf-8")),
        );
        this.collections = new Map(Object.entries(parsed));
        log.info(
          { file: this.filePath, collections: this.collections.size },
          "📂 Local vector store loaded",
        );
      } catch (err) {
        log.error({ err, file: this.filePath }, "❌ Failed to load local vector store");
        return false;
      }
    }
    this.connected = true;
    return true;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    this.persist();
    this.connected = false;
  }

  async hasCollection(name: string): Promise<boolean> {
    return this.collections.has(name);
  }

  async createCollection(name: string, schema: CollectionSchema): Promise<boolean> {
    if (this.collections.has(name)) return true;
    if (!Number.isInteger(schema.vectorDim) || schema.vectorDim <= 0) {
      log.error({ collection: name, dim: schema.vectorDim }, "❌ Invalid vector dimension");
      return false;
    }
    this.collections.set(name, { schema, metric: "L2", nextId: 1, rows: [] });
    this.persist();
    return true;
  }

  async describeCollection(name: string): Promise<{ vectorDim: number } | null> {
    const col = this.collections.get(name);
    return col ? { vectorDim: col.schema.vectorDim } : null;
  }

  async createIndex(
    name: string,
    _field: string,
    params: IndexParams,
  ): Promise<boolean> {
    const col = this.collections.get(name);
    if (!col) return false;
    col.metric = params.metric_type;
    return true;
  }

  async loadCollection(name: string): Promise<boolean> {
    return this.collections.has(name);
  }

  async dropCollection(name: string): Promise<boolean> {
    const existed = this.collections.delete(name);
    if (existed) this.persist();
    return existed;
  }

  async listCollections(): Promise<string[] | null> {
    return [...this.collections.keys()];
  }

  async insert(name: string, rows: VectorRow[]): Promise<InsertResult | null> {
    if (!this.connected) {
      log.error({ collection: name }, "❌ Insert while disconnected");
      return null;
    }
    const col = this.collections.get(name);
    if (!col) {
      log.error({ collection: name }, "❌ Insert into missing collection");
      return null;
    }
    const vectorField = vectorFieldOf(col.schema);
    const primary = primaryFieldOf(col.schema);

    for (const row of rows) {
      const vector = row[vectorField];
      if (!Array.isArray(vector) || vector.length !== col.schema.vectorDim) {
        log.error(
          { collection: name, expected: col.schema.vectorDim },
          "❌ Vector dimension mismatch on insert",
        );
        return null;
      }
    }

    const ids: number[] = [];
    for (const row of rows) {
      const id = col.nextId++;
      col.rows.push({ ...truncateVarchars(col.schema, row), [primary]: id });
      ids.push(id);
    }
    this.persist();
    return { insertedCount: ids.length, ids };
  }

  async query(
    name: string,
    filter: FilterExpression,
    outputFields: string[],
    limit: number,
  ): Promise<EntityFields[] | null> {
    const col = this.usable(name);
    if (!col) return null;
    return col.rows
      .map(scalarFields)
      .filter((row) => matchesFilter(row, filter))
      .slice(0, limit)
      .map((row) => pick(row, outputFields));
  }

  async search(name: string, request: SearchRequest): Promise<SearchHit[][] | null> {
    const col = this.usable(name);
    if (!col) return null;
    const metric = request.searchParams.metric_type ?? col.metric;
    const primary = primaryFieldOf(col.schema);

    const candidates = col.rows.filter((row) =>
      matchesFilter(scalarFields(row), request.filter),
    );

    return request.vectors.map((query) => {
      if (query.length !== col.schema.vectorDim) return [];
      const scored = candidates.flatMap((row) => {
        const vector = row[request.vectorField];
        if (!Array.isArray(vector)) return [];
        return [{ row, score: score(metric, query, vector) }];
      });
      // L2 is a distance (lower is closer); IP/COSINE are similarities
      scored.sort((a, b) => (metric === "L2" ? a.score - b.score : b.score - a.score));
      return scored.slice(0, request.limit).map(({ row, score }) => {
        const fields = scalarFields(row);
        const id = fields[primary];
        return {
          id: id ?? null,
          score,
          entity: pick(fields, request.outputFields),
        };
      });
    });
  }

  async delete(name: string, filter: FilterExpression): Promise<DeleteResult | null> {
    const col = this.usable(name);
    if (!col) return null;
    const before = col.rows.length;
    col.rows = col.rows.filter((row) => !matchesFilter(scalarFields(row), filter));
    const deletedCount = before - col.rows.length;
    if (deletedCount > 0) this.persist();
    return { deletedCount };
  }

  async flush(names: string[]): Promise<void> {
    log.debug({ collections: names }, "💾 Flushing local vector store");
    this.persist();
  }

  /** Collection for data operations; null while disconnected. */
  private usable(name: string): LocalCollection | null {
    if (!this.connected) return null;
    return this.collections.get(name) ?? null;
  }

  // Written after every mutation
  private persist(): void {
    if (!this.filePath) return;
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    writeFileSync(
      this.filePath,
      JSON.stringify(Object.fromEntries(this.collections)),
      "utf-8",
    );
  }
}

// ── Helpers ──────────────────────────────────────────────

function vectorFieldOf(schema: CollectionSchema): string {
  return schema.fields.find((f) => f.type === "float_vector")?.name ?? "vector";
}

function primaryFieldOf(schema: CollectionSchema): string {
  return schema.fields.find((f) => f.isPrimary)?.name ?? "id";
}

function truncateVarchars(schema: CollectionSchema, row: VectorRow): VectorRow {
  const out: VectorRow = { ...row };
  for (const field of schema.fields) {
    const value = out[field.name];
    if (field.type === "varchar" && field.maxLength && typeof value === "string") {
      out[field.name] = value.slice(0, field.maxLength);
    }
  }
  return out;
}

function scalarFields(row: VectorRow): EntityFields {
  const out: EntityFields = {};
  for (const [key, value] of Object.entries(row)) {
    if (!Array.isArray(value)) out[key] = value;
  }
  return out;
}

function pick(row: EntityFields, fields: string[]): EntityFields {
  if (fields.length === 0) return { ...row };
  const out: EntityFields = {};
  for (const f of fields) {
    const value: FieldValue | undefined = row[f];
    if (value !== undefined) out[f] = value;
  }
  return out;
}

function score(metric: Metric, a: number[], b: number[]): number {
  let dot = 0;
  let sq = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i];
    const y = b[i] ?? 0;
    dot += x * y;
    sq += (x - y) * (x - y);
    na += x * x;
    nb += y * y;
  }
  if (metric === "IP") return dot;
  if (metric === "COSINE") return na && nb ? dot / Math.sqrt(na * nb) : 0;
  return sq;
}
