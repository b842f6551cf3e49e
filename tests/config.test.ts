import { describe, it, expect } from "vitest";
import { ConfigError, DEFAULT_SUMMARY_PROMPT, loadConfig } from "../src/config.js";

const base = { EMBEDDING_API_KEY: "test-secret", LLM_API_KEY: "test-secret" };

describe("loadConfig", () => {
  // ── Defaults ───────────────────────────────────────────

  it("applies defaults", () => {
    const config = loadConfig(base);
    expect(config.vectorBackend).toBe("local");
    expect(config.collectionName).toBe("long-term-memory");
    expect(config.embedding).toEqual({
      service: "openai",
      dim: 1024,
      model: "text-embedding-3-small",
      apiKey: "test-secret",
      baseUrl: undefined,
    });
    expect(config.indexParams).toEqual({ metric_type: "L2", index_type: "AUTOINDEX", params: {} });
    expect(config.searchParams).toEqual({ metric_type: "L2", params: { nprobe: 10 } });
    expect(config.topK).toBe(5);
    expect(config.searchTimeout).toBe(10);
    expect(config.usePersonalityFiltering).toBe(false);
    expect(config.injectionMethod).toBe("user_prompt");
    expect(config.memoryPrefix).toBe("<Memory> Long-term memory fragments:");
    expect(config.memorySuffix).toBe("</Memory>");
    expect(config.memoryEntryFormat).toBe("- [{time}] {content}");
    expect(config.contextsMemoryLen).toBe(0);
    expect(config.numPairs).toBe(10);
    expect(config.summaryCheckInterval).toBe(300);
    expect(config.summaryTimeThreshold).toBe(1800);
    expect(config.summaryPrompt).toBe(DEFAULT_SUMMARY_PROMPT);
    expect(config.summaryLlmParams).toEqual({});
    expect(config.flushAfterInsert).toBe(false);
    expect(config.defaultPersonaOnNone).toBe("default_persona");
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadConfig(base))).toBe(true);
  });

  // ── Parsing ────────────────────────────────────────────

  it("disables time-based summaries for a non-positive threshold", () => {
    expect(loadConfig({ ...base, SUMMARY_TIME_THRESHOLD: "0" }).summaryTimeThreshold).toBe(
      Infinity,
    );
    expect(loadConfig({ ...base, SUMMARY_TIME_THRESHOLD: "-1" }).summaryTimeThreshold).toBe(
      Infinity,
    );
  });

  it("reads booleans", () => {
    const config = loadConfig({
      ...base,
      MEMORY_PERSONALITY_FILTERING: "true",
      MEMORY_FLUSH_AFTER_INSERT: "1",
    });
    expect(config.usePersonalityFiltering).toBe(true);
    expect(config.flushAfterInsert).toBe(true);
  });

  it("uses the index metric for search when none is given", () => {
    const config = loadConfig({ ...base, MEMORY_INDEX_PARAMS: '{"metric_type":"IP"}' });
    expect(config.searchParams.metric_type).toBe("IP");
  });

  it("parses summary LLM params", () => {
    const config = loadConfig({ ...base, SUMMARY_LLM_PARAMS: '{"temperature":0.2,"max_tokens":256}' });
    expect(config.summaryLlmParams).toEqual({ temperature: 0.2, max_tokens: 256 });
  });

  it("keeps model parameters it does not know", () => {
    const config = loadConfig({
      ...base,
      SUMMARY_LLM_PARAMS: '{"response_format":{"type":"json_object"},"reasoning":{"effort":"low"}}',
    });
    expect(config.summaryLlmParams).toEqual({
      response_format: { type: "json_object" },
      reasoning: { effort: "low" },
    });
  });

  // ── Fatal errors ───────────────────────────────────────

  it.each([
    ["missing embedding key", { LLM_API_KEY: "test-secret" }],
    ["missing LLM key", { EMBEDDING_API_KEY: "test-secret" }],
    ["zero dimension", { ...base, EMBEDDING_DIM: "0" }],
    ["non-numeric dimension", { ...base, EMBEDDING_DIM: "abc" }],
    ["unknown backend", { ...base, VECTOR_DB_BACKEND: "milvus" }],
    ["pinecone without key", { ...base, VECTOR_DB_BACKEND: "pinecone" }],
    ["malformed JSON params", { ...base, MEMORY_INDEX_PARAMS: "{not json" }],
    ["mistyped LLM param", { ...base, SUMMARY_LLM_PARAMS: '{"temperature":"hot"}' }],
    ["unknown metric", { ...base, MEMORY_SEARCH_PARAMS: '{"metric_type":"HAMMING"}' }],
    ["zero host context length", { ...base, HOST_MAX_CONTEXT_LENGTH: "0" }],
    ["num pairs beyond host context", { ...base, HOST_MAX_CONTEXT_LENGTH: "4" }],
    [
      "kept blocks beyond host context",
      { ...base, HOST_MAX_CONTEXT_LENGTH: "20", MEMORY_CONTEXTS_KEEP: "21" },
    ],
    ["non-positive num pairs", { ...base, SUMMARY_NUM_PAIRS: "0" }],
    ["zero top k", { ...base, MEMORY_TOP_K: "0" }],
    ["negative top k", { ...base, MEMORY_TOP_K: "-3" }],
  ])("throws ConfigError on %s", (_name, env) => {
    expect(() => loadConfig(env)).toThrow(ConfigError);
  });

  it("accepts pinecone with a key", () => {
    const config = loadConfig({
      ...base,
      VECTOR_DB_BACKEND: "pinecone",
      PINECONE_API_KEY: "test-secret",
    });
    expect(config.pinecone).toEqual({ apiKey: "test-secret", cloud: "aws", region: "us-east-1" });
  });
});
