import type { IndexParams, SearchParams } from "../config.js";

// ── Vector Store — backend-agnostic contract ─────────────

export type FieldType = "int64" | "varchar" | "float_vector";

export interface FieldDescriptor {
  name: string;
  type: FieldType;
  isPrimary?: boolean;
  autoId?: boolean;
  maxLength?: number;
  dim?: number;
  description?: string;
}

export interface CollectionSchema {
  description: string;
  vectorDim: number;
  fields: FieldDescriptor[];
}

export type FieldValue = string | number;

/** A stored row: scalar fields plus the vector field. */
export type VectorRow = Record<string, FieldValue | number[]>;

/** One scalar row as returned by query/search (no vector). */
export type EntityFields = Record<string, FieldValue>;

export type FilterOp = "==" | "!=" | ">" | ">=" | "<" | "<=";

export interface FilterClause {
  field: string;
  op: FilterOp;
  value: FieldValue;
}

/** Conjunction of clauses. An empty list matches everything. */
export type FilterExpression = FilterClause[];

export interface InsertResult {
  insertedCount: number;
  ids: number[];
}

export interface DeleteResult {
  /** Some backends cannot report an exact count. */
  deletedCount: number | null;
}

export interface SearchHit {
  id: number | string | null;
  /** Distance or similarity, backend-dependent. */
  score: number;
  entity: unknown;
}

export interface SearchRequest {
  vectors: number[][];
  vectorField: string;
  searchParams: SearchParams;
  limit: number;
  filter: FilterExpression;
  outputFields: string[];
}

/**
 * What the memory engine needs from a vector database. A `null` return
 * means the operation failed; an empty array means "nothing found".
 */
export interface VectorStore {
  readonly backend: string;

  connect(): Promise<boolean>;
  isConnected(): boolean;
  disconnect(): Promise<void>;

  hasCollection(name: string): Promise<boolean>;
  createCollection(name: string, schema: CollectionSchema): Promise<boolean>;
  /** Dimension of an existing collection, null when unknown. */
  describeCollection(name: string): Promise<{ vectorDim: number } | null>;
  createIndex(
    name: string,
    field: string,
    params: IndexParams,
    timeoutSeconds?: number,
  ): Promise<boolean>;
  loadCollection(name: string): Promise<boolean>;
  dropCollection(name: string): Promise<boolean>;
  listCollections(): Promise<string[] | null>;

  insert(name: string, rows: VectorRow[]): Promise<InsertResult | null>;
  query(
    name: string,
    filter: FilterExpression,
    outputFields: string[],
    limit: number,
  ): Promise<EntityFields[] | null>;
  /** One hit list per query vector. */
  search(name: string, request: SearchRequest): Promise<SearchHit[][] | null>;
  delete(name: string, filter: FilterExpression): Promise<DeleteResult | null>;
  flush(names: string[]): Promise<void>;
}
