import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

// ── Errors ───────────────────────────────────────────────

/** Invalid or missing configuration. Raised at startup, never at runtime. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// ── Types ────────────────────────────────────────────────

export const INJECTION_METHODS = [
  "user_prompt",
  "system_prompt",
  "insert_system_prompt",
] as const;
export type InjectionMethod = (typeof INJECTION_METHODS)[number];

export const VECTOR_BACKENDS = ["local", "pinecone"] as const;
export type VectorBackend = (typeof VECTOR_BACKENDS)[number];

export const EMBEDDING_SERVICES = ["openai"] as const;
export type EmbeddingService = (typeof EMBEDDING_SERVICES)[number];

const metricSchema = z.enum(["L2", "IP", "COSINE"]);
export type Metric = z.infer<typeof metricSchema>;

const indexParamsSchema = z.object({
  metric_type: metricSchema.default("L2"),
  index_type: z.string().default("AUTOINDEX"),
  params: z.record(z.unknown()).default({}),
});
export type IndexParams = z.infer<typeof indexParamsSchema>;

const searchParamsSchema = z.object({
  metric_type: metricSchema.optional(),
  params: z.record(z.unknown()).default({ nprobe: 10 }),
});
export interface SearchParams {
  metric_type: Metric;
  params: Record<string, unknown>;
}

/**
 * Model parameters forwarded verbatim to the summary LLM call. Known
 * keys are type-checked; anything else passes through untouched.
 */
const summaryLlmParamsSchema = z
  .object({
    model: z.string(),
    temperature: z.number(),
    max_tokens: z.number().int().positive(),
    top_p: z.number(),
    frequency_penalty: z.number(),
    presence_penalty: z.number(),
    seed: z.number().int(),
    stop: z.union([z.string(), z.array(z.string())]),
  })
  .partial()
  .passthrough();
export type SummaryLlmParams = z.infer<typeof summaryLlmParamsSchema>;

export const DEFAULT_SUMMARY_PROMPT =
  "Summarize the following multi-turn conversation into one concise, objective long-term memory entry that keeps the key facts:";

export interface MemoryConfig {
  vectorBackend: VectorBackend;
  localVectorDbPath: string;
  pinecone: { apiKey: string; cloud: "aws" | "gcp" | "azure"; region: string };
  collectionName: string;

  embedding: {
    service: EmbeddingService;
    dim: number;
    model: string;
    apiKey: string;
    baseUrl?: string;
  };
  indexParams: IndexParams;
  searchParams: SearchParams;

  topK: number;
  /** Seconds */
  searchTimeout: number;
  usePersonalityFiltering: boolean;
  injectionMethod: string;
  memoryPrefix: string;
  memorySuffix: string;
  memoryEntryFormat: string;
  contextsMemoryLen: number;

  numPairs: number;
  /** Seconds */
  summaryCheckInterval: number;
  /** Seconds; Infinity disables time-based summaries */
  summaryTimeThreshold: number;
  summaryPrompt: string;
  summaryLlmParams: SummaryLlmParams;
  llm: { model: string; apiKey: string; baseUrl: string };

  flushAfterInsert: boolean;
  defaultPersonaOnNone: string;
  counterDbPath: string;
}

type Env = Record<string, string | undefined>;

// ── Helpers ──────────────────────────────────────────────

function str(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value === undefined || value === "" ? fallback : value;
}

function int(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${key} must be an integer, got "${raw}"`);
  }
  return value;
}

function num(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function bool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

function oneOf<T extends string>(
  env: Env,
  key: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const raw = str(env, key, fallback).toLowerCase();
  const match = allowed.find((a) => a === raw);
  if (!match) {
    throw new ConfigError(
      `${key} "${raw}" is not supported (expected one of: ${allowed.join(", ")})`,
    );
  }
  return match;
}

function json<T>(
  env: Env,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: unknown,
): T {
  const raw = env[key];
  let value: unknown = fallback;
  if (raw !== undefined && raw !== "") {
    try {
      value = JSON.parse(raw);
    } catch {
      throw new ConfigError(`${key} is not valid JSON`);
    }
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`${key} is invalid: ${parsed.error.message}`);
  }
  return parsed.data;
}

function required(env: Env, key: string, why: string): string {
  const value = env[key];
  if (!value) {
    throw new ConfigError(`Missing required environment variable ${key} (${why})`);
  }
  return value;
}

// ── Config ───────────────────────────────────────────────

export function loadConfig(env: Env = process.env): MemoryConfig {
  const vectorBackend = oneOf(env, "VECTOR_DB_BACKEND", VECTOR_BACKENDS, "local");

  const dim = int(env, "EMBEDDING_DIM", 1024);
  if (dim <= 0) {
    throw new ConfigError(`EMBEDDING_DIM must be a positive integer, got ${dim}`);
  }

  const indexParams = json(env, "MEMORY_INDEX_PARAMS", indexParamsSchema, {});
  const rawSearch = json(env, "MEMORY_SEARCH_PARAMS", searchParamsSchema, {});
  const searchParams: SearchParams = {
    metric_type: rawSearch.metric_type ?? indexParams.metric_type,
    params: rawSearch.params,
  };

  const numPairs = int(env, "SUMMARY_NUM_PAIRS", 10);
  if (numPairs <= 0) {
    throw new ConfigError(`SUMMARY_NUM_PAIRS must be positive, got ${numPairs}`);
  }
  const contextsMemoryLen = int(env, "MEMORY_CONTEXTS_KEEP", 0);
  const topK = int(env, "MEMORY_TOP_K", 5);
  if (topK <= 0) {
    throw new ConfigError(`MEMORY_TOP_K must be positive, got ${topK}`);
  }

  // Cross-checks against the host's context window
  const maxContextLength = int(env, "HOST_MAX_CONTEXT_LENGTH", -1);
  if (maxContextLength === 0) {
    throw new ConfigError(
      "HOST_MAX_CONTEXT_LENGTH is 0; use a positive integer or -1 for unlimited",
    );
  }
  if (maxContextLength > 0 && numPairs > 2 * maxContextLength) {
    throw new ConfigError(
      `SUMMARY_NUM_PAIRS (${numPairs}) exceeds twice HOST_MAX_CONTEXT_LENGTH (${maxContextLength})`,
    );
  }
  if (maxContextLength > 0 && contextsMemoryLen > maxContextLength) {
    throw new ConfigError(
      `MEMORY_CONTEXTS_KEEP (${contextsMemoryLen}) exceeds HOST_MAX_CONTEXT_LENGTH (${maxContextLength})`,
    );
  }

  const timeThreshold = num(env, "SUMMARY_TIME_THRESHOLD", 1800);
  const checkInterval = num(env, "SUMMARY_CHECK_INTERVAL", 300);
  if (checkInterval <= 0) {
    throw new ConfigError(
      `SUMMARY_CHECK_INTERVAL must be positive, got ${checkInterval}`,
    );
  }

  const cloud = oneOf(env, "PINECONE_CLOUD", ["aws", "gcp", "azure"], "aws");

  return Object.freeze({
    vectorBackend,
    localVectorDbPath: str(env, "LOCAL_VECTOR_DB_PATH", "data/memory-vectors.json"),
    pinecone: {
      apiKey:
        vectorBackend === "pinecone"
          ? required(env, "PINECONE_API_KEY", "pinecone backend")
          : str(env, "PINECONE_API_KEY", ""),
      cloud,
      region: str(env, "PINECONE_REGION", "us-east-1"),
    },
    collectionName: str(env, "MEMORY_COLLECTION_NAME", "long-term-memory"),

    embedding: {
      service: oneOf(env, "EMBEDDING_SERVICE", EMBEDDING_SERVICES, "openai"),
      dim,
      model: str(env, "EMBEDDING_MODEL", "text-embedding-3-small"),
      apiKey: required(env, "EMBEDDING_API_KEY", "embedding service"),
      baseUrl: env.EMBEDDING_BASE_URL || undefined,
    },
    indexParams,
    searchParams,

    topK,
    searchTimeout: num(env, "MEMORY_SEARCH_TIMEOUT", 10),
    usePersonalityFiltering: bool(env, "MEMORY_PERSONALITY_FILTERING", false),
    // Unknown methods fall back to user_prompt at injection time
    injectionMethod: str(env, "MEMORY_INJECTION_METHOD", "user_prompt"),
    memoryPrefix: str(env, "MEMORY_PREFIX", "<Memory> Long-term memory fragments:"),
    memorySuffix: str(env, "MEMORY_SUFFIX", "</Memory>"),
    memoryEntryFormat: str(env, "MEMORY_ENTRY_FORMAT", "- [{time}] {content}"),
    contextsMemoryLen,

    numPairs,
    summaryCheckInterval: checkInterval,
    summaryTimeThreshold: timeThreshold <= 0 ? Infinity : timeThreshold,
    summaryPrompt: str(env, "SUMMARY_PROMPT", DEFAULT_SUMMARY_PROMPT),
    summaryLlmParams: json(env, "SUMMARY_LLM_PARAMS", summaryLlmParamsSchema, {}),
    llm: {
      model: str(env, "LLM_MODEL", "openai/gpt-4o-mini"),
      apiKey: required(env, "LLM_API_KEY", "summary LLM"),
      baseUrl: str(env, "LLM_BASE_URL", "https://openrouter.ai/api/v1"),
    },

    flushAfterInsert: bool(env, "MEMORY_FLUSH_AFTER_INSERT", false),
    defaultPersonaOnNone: str(env, "DEFAULT_PERSONA_ON_NONE", "default_persona"),
    counterDbPath: str(env, "MEMORY_COUNTER_DB", "data/message-counters.db"),
  });
}
