// ── long-memory — public surface ─────────────────────────

export { MemoryEngine } from "./engine.js";
export type { MemoryEngineDeps } from "./engine.js";

export { loadConfig, ConfigError, DEFAULT_SUMMARY_PROMPT } from "./config.js";
export type {
  MemoryConfig,
  InjectionMethod,
  IndexParams,
  SearchParams,
  SummaryLlmParams,
} from "./config.js";
export { log, componentLogger } from "./logger.js";

export type { SessionResolver } from "./host/types.js";
export type * from "./memory/types.js";

export { CounterStore } from "./memory/counter-store.js";
export { SessionStateStore, systemClock } from "./memory/session-state.js";
export type { Clock } from "./memory/session-state.js";
export { SummarizationPipeline } from "./memory/summarizer.js";
export type { SummaryOutcome, SummaryStage } from "./memory/summarizer.js";
export { checkAndTriggerSummary } from "./memory/trigger.js";
export { RetrievalPipeline, normalizeHits } from "./memory/retrieval.js";
export type { RetrievalOutcome, RetrievalStatus } from "./memory/retrieval.js";
export { SummaryScheduler } from "./scheduler/summary-scheduler.js";
export { MemoryAdmin } from "./memory/admin.js";
export type { AdminResult, RecordSummary } from "./memory/admin.js";
export { SessionLocks } from "./memory/locks.js";
export { resolvePersonaId, NO_PERSONA } from "./memory/persona.js";
export {
  MemoryMarker,
  removeUserPromptMemories,
  removeSystemPromptMemories,
  removeInsertedSystemMessages,
} from "./memory/markers.js";
export {
  cleanContexts,
  injectMemories,
  formatMemoriesBlock,
  resolveInjectionMethod,
} from "./memory/injection.js";
export {
  formatContextToString,
  formatMemoryEntry,
  formatMemoryTime,
  parseFormattedContext,
} from "./memory/format.js";

export type * from "./vector/types.js";
export { LocalVectorStore } from "./vector/local.js";
export { PineconeVectorStore } from "./vector/pinecone.js";
export { createVectorStore } from "./vector/factory.js";
export { buildMemorySchema, setupCollection } from "./vector/collection.js";
export { renderFilter, matchesFilter } from "./vector/filter.js";

export { OpenAIEmbedder, createEmbedder } from "./embedding/embedder.js";
export type { EmbeddingProvider } from "./embedding/embedder.js";
export { OpenAIChatProvider } from "./llm/provider.js";
export type { LlmProvider, ChatResult } from "./llm/provider.js";
export { withRetry } from "./llm/retry.js";
