import type { IndexParams } from "../config.js";
import { ConfigError } from "../config.js";
import type { CollectionSchema, VectorStore } from "./types.js";
import { componentLogger } from "../logger.js";

// ── Memory collection: schema + setup ────────────────────

const log = componentLogger("vector-store");

export const PRIMARY_FIELD_NAME = "memory_id";
export const VECTOR_FIELD_NAME = "vector";

export const MAX_PERSONALITY_ID_LENGTH = 256;
export const MAX_SESSION_ID_LENGTH = 72;
export const MAX_CONTENT_LENGTH = 4096;

/** Scalar fields returned by memory queries and searches. */
export const DEFAULT_OUTPUT_FIELDS = [
  "content",
  "create_time",
  "session_id",
  "personality_id",
  PRIMARY_FIELD_NAME,
];

export function buildMemorySchema(dim: number): CollectionSchema {
  if (!Number.isInteger(dim) || dim <= 0) {
    throw new ConfigError(`Embedding dimension must be a positive integer, got ${dim}`);
  }
  return {
    description: "Long-term conversational memory",
    vectorDim: dim,
    fields: [
      {
        name: PRIMARY_FIELD_NAME,
        type: "int64",
        isPrimary: true,
        autoId: true,
        description: "Unique memory id",
      },
      {
        name: "personality_id",
        type: "varchar",
        maxLength: MAX_PERSONALITY_ID_LENGTH,
        description: "Persona the memory belongs to",
      },
      {
        name: "session_id",
        type: "varchar",
        maxLength: MAX_SESSION_ID_LENGTH,
        description: "Session the memory was summarized from",
      },
      {
        name: "content",
        type: "varchar",
        maxLength: MAX_CONTENT_LENGTH,
        description: "Summary text",
      },
      {
        name: VECTOR_FIELD_NAME,
        type: "float_vector",
        dim,
        description: "Embedding of the summary",
      },
      {
        name: "create_time",
        type: "int64",
        description: "Creation time, unix seconds",
      },
    ],
  };
}

/**
 * Compare an existing collection with the expected schema. Only the
 * vector dimension can be checked across backends.
 */
export async function checkSchemaConsistency(
  store: VectorStore,
  name: string,
  expected: CollectionSchema,
): Promise<boolean> {
  const actual = await store.describeCollection(name);
  if (!actual) {
    log.warn({ collection: name }, "⚠️ Could not describe collection for schema check");
    return false;
  }
  if (actual.vectorDim !== expected.vectorDim) {
    log.warn(
      { collection: name, expected: expected.vectorDim, actual: actual.vectorDim },
      "⚠️ Collection vector dimension differs from the configured embedding dimension",
    );
    return false;
  }
  log.info({ collection: name }, "✅ Collection schema matches");
  return true;
}

/**
 * Make sure the collection exists, is indexed and loaded. Creation
 * failure is fatal; index/load failures are logged.
 */
export async function setupCollection(
  store: VectorStore,
  name: string,
  schema: CollectionSchema,
  indexParams: IndexParams,
): Promise<void> {
  if (await store.hasCollection(name)) {
    log.info({ collection: name }, "📦 Collection exists — checking schema");
    await checkSchemaConsistency(store, name, schema);
  } else {
    log.info({ collection: name }, "📦 Collection not found — creating");
    if (!(await store.createCollection(name, schema))) {
      throw new ConfigError(`Failed to create collection "${name}"`);
    }
  }

  if (!(await store.createIndex(name, VECTOR_FIELD_NAME, indexParams))) {
    log.error({ collection: name }, "❌ Vector index creation failed — search will be slow");
  }
  if (!(await store.loadCollection(name))) {
    log.error({ collection: name }, "❌ Failed to load collection");
  }
}
