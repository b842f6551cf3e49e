import { Pinecone } from "@pinecone-database/pinecone";
import type { MemoryConfig, Metric } from "../config.js";
import type {
  CollectionSchema,
  DeleteResult,
  EntityFields,
  FilterExpression,
  FilterOp,
  InsertResult,
  SearchHit,
  SearchRequest,
  VectorRow,
  VectorStore,
} from "./types.js";
import { renderFilter } from "./filter.js";
import { componentLogger } from "../logger.js";

// ── Pinecone Vector Store ────────────────────────────────
// One serverless index per collection. Scalar fields live in metadata;
// the numeric primary key is kept both as the record id and as metadata
// so it can be filtered on.

const log = componentLogger("vector-store");

type PineconeIndex = ReturnType<Pinecone["index"]>;
type PineconeMetric = "euclidean" | "dotproduct" | "cosine";
type MetadataValue = string | number | boolean | string[];
type PineconeFilter = Record<string, unknown>;

const METRICS: Record<Metric, PineconeMetric> = {
  L2: "euclidean",
  IP: "dotproduct",
  COSINE: "cosine",
};

const OPERATORS: Record<FilterOp, string> = {
  "==": "$eq",
  "!=": "$ne",
  ">": "$gt",
  ">=": "$gte",
  "<": "$lt",
  "<=": "$lte",
};

/** Pinecone caps `topK` per query. */
const MAX_TOP_K = 10_000;

export class PineconeVectorStore implements VectorStore {
  readonly backend = "pinecone";
  private readonly pc: Pinecone;
  private readonly indexes = new Map<string, PineconeIndex>();
  private readonly dims = new Map<string, number>();
  private connected = false;
  private lastId = 0;

  constructor(
    private readonly options: Pick<MemoryConfig, "pinecone" | "indexParams">,
    client?: Pinecone,
  ) {
    this.pc = client ?? new Pinecone({ apiKey: options.pinecone.apiKey });
  }

  async connect(): Promise<boolean> {
    try {
      await this.pc.listIndexes();
      this.connected = true;
      log.info("✅ Connected to Pinecone");
      return true;
    } catch (err) {
      log.error({ err }, "❌ Failed to connect to Pinecone");
      this.connected = false;
      return false;
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  async disconnect(): Promise<void> {
    this.indexes.clear();
    this.connected = false;
  }

  async hasCollection(name: string): Promise<boolean> {
    const names = await this.listCollections();
    return names?.includes(name) ?? false;
  }

  async createCollection(name: string, schema: CollectionSchema): Promise<boolean> {
    try {
      await this.pc.createIndex({
        name,
        dimension: schema.vectorDim,
        metric: METRICS[this.options.indexParams.metric_type],
        spec: {
          serverless: {
            cloud: this.options.pinecone.cloud,
            region: this.options.pinecone.region,
          },
        },
        waitUntilReady: true,
        suppressConflicts: true,
      });
      this.dims.set(name, schema.vectorDim);
      log.info({ collection: name, dim: schema.vectorDim }, "📦 Pinecone index created");
      return true;
    } catch (err) {
      log.error({ err, collection: name }, "❌ Failed to create Pinecone index");
      return false;
    }
  }

  async describeCollection(name: string): Promise<{ vectorDim: number } | null> {
    const dim = await this.dimensionOf(name);
    return dim === null ? null : { vectorDim: dim };
  }

  // Pinecone builds the index with the collection; the metric is fixed then.
  async createIndex(name: string): Promise<boolean> {
    return this.hasCollection(name);
  }

  async loadCollection(name: string): Promise<boolean> {
    return this.hasCollection(name);
  }

  async dropCollection(name: string): Promise<boolean> {
    try {
      await this.pc.deleteIndex(name);
      this.indexes.delete(name);
      this.dims.delete(name);
      return true;
    } catch (err) {
      log.error({ err, collection: name }, "❌ Failed to delete Pinecone index");
      return false;
    }
  }

  async listCollections(): Promise<string[] | null> {
    try {
      const list = await this.pc.listIndexes();
      return (list.indexes ?? []).map((i) => i.name);
    } catch (err) {
      log.error({ err }, "❌ Failed to list Pinecone indexes");
      return null;
    }
  }

  async insert(name: string, rows: VectorRow[]): Promise<InsertResult | null> {
    const ids: number[] = [];
    const records = rows.map((row) => {
      const id = this.nextId();
      ids.push(id);
      const metadata: Record<string, MetadataValue> = { memory_id: id };
      let values: number[] = [];
      for (const [key, value] of Object.entries(row)) {
        if (Array.isArray(value)) values = value;
        else if (key !== "memory_id") metadata[key] = value;
      }
      return { id: String(id), values, metadata };
    });

    try {
      await this.index(name).upsert(records);
      return { insertedCount: records.length, ids };
    } catch (err) {
      log.error({ err, collection: name }, "❌ Pinecone upsert failed");
      return null;
    }
  }

  async query(
    name: string,
    filter: FilterExpression,
    outputFields: string[],
    limit: number,
  ): Promise<EntityFields[] | null> {
    // No scan API: a zero-vector query with a metadata filter lists records
    const dim = await this.dimensionOf(name);
    if (dim === null) return null;
    try {
      const result = await this.index(name).query({
        vector: new Array<number>(dim).fill(0),
        topK: Math.min(Math.max(limit, 1), MAX_TOP_K),
        filter: toPineconeFilter(filter),
        includeMetadata: true,
      });
      return (result.matches ?? []).map((m) =>
        toEntity(m.metadata ?? {}, outputFields),
      );
    } catch (err) {
      log.error(
        { err, collection: name, filter: renderFilter(filter) },
        "❌ Pinecone query failed",
      );
      return null;
    }
  }

  async search(name: string, request: SearchRequest): Promise<SearchHit[][] | null> {
    try {
      const index = this.index(name);
      const results = await Promise.all(
        request.vectors.map((vector) =>
          index.query({
            vector,
            topK: Math.min(Math.max(request.limit, 1), MAX_TOP_K),
            filter: toPineconeFilter(request.filter),
            includeMetadata: true,
          }),
        ),
      );
      return results.map((result) =>
        (result.matches ?? []).map((m) => ({
          id: toId(m.id),
          score: m.score ?? 0,
          entity: m.metadata ? toEntity(m.metadata, request.outputFields) : null,
        })),
      );
    } catch (err) {
      log.error({ err, collection: name }, "❌ Pinecone search failed");
      return null;
    }
  }

  async delete(name: string, filter: FilterExpression): Promise<DeleteResult | null> {
    try {
      await this.index(name).deleteMany(toPineconeFilter(filter) ?? {});
      // Pinecone does not report how many records matched
      return { deletedCount: null };
    } catch (err) {
      log.error(
        { err, collection: name, filter: renderFilter(filter) },
        "❌ Pinecone delete failed",
      );
      return null;
    }
  }

  // Writes are durable on acknowledgement.
  async flush(): Promise<void> {}

  private index(name: string): PineconeIndex {
    let index = this.indexes.get(name);
    if (!index) {
      index = this.pc.index(name);
      this.indexes.set(name, index);
    }
    return index;
  }

  private async dimensionOf(name: string): Promise<number | null> {
    const cached = this.dims.get(name);
    if (cached !== undefined) return cached;
    try {
      const description = await this.pc.describeIndex(name);
      const dim = description.dimension ?? null;
      if (dim !== null) this.dims.set(name, dim);
      return dim;
    } catch (err) {
      log.error({ err, collection: name }, "❌ Failed to describe Pinecone index");
      return null;
    }
  }

  /** Millisecond timestamp scaled up, monotonic within the process. */
  private nextId(): number {
    const candidate = Date.now() * 1000;
    this.lastId = candidate > this.lastId ? candidate : this.lastId + 1;
    return this.lastId;
  }
}

// ── Helpers ──────────────────────────────────────────────

function toPineconeFilter(filter: FilterExpression): PineconeFilter | undefined {
  if (filter.length === 0) return undefined;
  const clauses = filter.map(({ field, op, value }) => ({
    [field]: { [OPERATORS[op]]: value },
  }));
  return clauses.length === 1 ? clauses[0] : { $and: clauses };
}

function toEntity(
  metadata: Record<string, MetadataValue>,
  outputFields: string[],
): EntityFields {
  const out: EntityFields = {};
  const keys = outputFields.length > 0 ? outputFields : Object.keys(metadata);
  for (const key of keys) {
    const value = metadata[key];
    if (typeof value === "string" || typeof value === "number") out[key] = value;
  }
  return out;
}

function toId(id: string): number | string {
  const n = Number(id);
  return Number.isSafeInteger(n) ? n : id;
}
