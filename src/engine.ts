import type { MemoryConfig } from "./config.js";
import { ConfigError } from "./config.js";
import type { SessionResolver } from "./host/types.js";
import type { EmbeddingProvider } from "./embedding/embedder.js";
import { createEmbedder } from "./embedding/embedder.js";
import type { LlmProvider } from "./llm/provider.js";
import { OpenAIChatProvider } from "./llm/provider.js";
import type { VectorStore } from "./vector/types.js";
import { createVectorStore } from "./vector/factory.js";
import { buildMemorySchema, setupCollection } from "./vector/collection.js";
import { CounterStore } from "./memory/counter-store.js";
import type { Clock } from "./memory/session-state.js";
import { SessionStateStore, systemClock } from "./memory/session-state.js";
import { SummarizationPipeline } from "./memory/summarizer.js";
import type { RetrievalOutcome } from "./memory/retrieval.js";
import { RetrievalPipeline } from "./memory/retrieval.js";
import { checkAndTriggerSummary } from "./memory/trigger.js";
import { SessionLocks } from "./memory/locks.js";
import { resolvePersonaId } from "./memory/persona.js";
import { MemoryAdmin } from "./memory/admin.js";
import type { OriginHandle, ProviderRequest, ProviderResponse } from "./memory/types.js";
import { ROLE_ASSISTANT } from "./memory/types.js";
import { SummaryScheduler, DEFAULT_STOP_GRACE_MS } from "./scheduler/summary-scheduler.js";
import { componentLogger } from "./logger.js";

// ── Memory Engine — host-facing facade ───────────────────

const log = componentLogger("engine");

export interface MemoryEngineDeps {
  config: MemoryConfig;
  resolver: SessionResolver;
  /** Defaults follow `config`; pass fakes in tests. */
  store?: VectorStore;
  embedder?: EmbeddingProvider | null;
  llm?: LlmProvider | null;
  counters?: CounterStore;
  now?: Clock;
}

/**
 * Wires the stores and pipelines together and exposes the two host
 * hooks: before the LLM call ({@link onLlmRequest}) and after it
 * ({@link onLlmResponse}).
 */
export class MemoryEngine {
  readonly config: MemoryConfig;
  readonly store: VectorStore;
  readonly counters: CounterStore;
  readonly state: SessionStateStore;
  readonly locks = new SessionLocks();
  readonly summarizer: SummarizationPipeline;
  readonly retrieval: RetrievalPipeline;
  readonly scheduler: SummaryScheduler;
  readonly admin: MemoryAdmin;
  private readonly resolver: SessionResolver;
  private initialized = false;

  constructor(deps: MemoryEngineDeps) {
    const { config, resolver } = deps;
    const now = deps.now ?? systemClock;
    this.config = config;
    this.resolver = resolver;

    const embedder =
      deps.embedder === undefined ? createEmbedder(config.embedding) : deps.embedder;
    const llm = deps.llm === undefined ? new OpenAIChatProvider(config.llm) : deps.llm;

    this.store = deps.store ?? createVectorStore(config);
    this.counters = deps.counters ?? new CounterStore(config.counterDbPath);
    this.state = new SessionStateStore(this.counters, now);

    this.summarizer = new SummarizationPipeline(
      { store: this.store, embedder, llm, now },
      config,
    );
    this.retrieval = new RetrievalPipeline(
      { state: this.state, store: this.store, embedder, resolver },
      config,
    );
    this.scheduler = new SummaryScheduler(
      { state: this.state, summarizer: this.summarizer, resolver, locks: this.locks, now },
      config,
    );
    this.admin = new MemoryAdmin(this.store, resolver, config.collectionName);
  }

  /**
   * Connect the vector store and make sure the memory collection is
   * ready. Throws {@link ConfigError} when the collection cannot exist.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    if (!(await this.store.connect())) {
      throw new ConfigError(`Could not connect to the ${this.store.backend} vector store`);
    }
    await setupCollection(
      this.store,
      this.config.collectionName,
      buildMemorySchema(this.config.embedding.dim),
      this.config.indexParams,
    );
    this.initialized = true;
    log.info(
      {
        backend: this.store.backend,
        collection: this.config.collectionName,
        dim: this.config.embedding.dim,
      },
      "🧠 Memory engine ready",
    );
  }

  /** Start the time-based sweep, unless disabled. */
  start(): void {
    if (!this.scheduler.enabled) {
      log.info("⏰ Time-based summaries disabled");
      return;
    }
    this.scheduler.start();
  }

  /** Inject relevant memories into an outbound request. */
  onLlmRequest(origin: OriginHandle, request: ProviderRequest): Promise<RetrievalOutcome> {
    return this.retrieval.handle(origin, request);
  }

  /**
   * Record the assistant's reply and summarize when the count threshold
   * is reached.
   * @returns true when a summary was launched
   */
  async onLlmResponse(origin: OriginHandle, response: ProviderResponse): Promise<boolean> {
    if (response.role !== ROLE_ASSISTANT) return false;
    try {
      const sessionId = await this.resolver.getCurrentSessionId(origin);
      this.state.addMessage(sessionId, ROLE_ASSISTANT, response.completionText, origin);
      this.state.incrementCount(sessionId);

      const personaId = await resolvePersonaId(this.resolver, origin, this.config);
      return await this.locks.run(sessionId, () =>
        checkAndTriggerSummary(
          { state: this.state, summarizer: this.summarizer, numPairs: this.config.numPairs },
          sessionId,
          personaId,
        ),
      );
    } catch (err) {
      log.error({ err }, "❌ Failed to record the assistant turn");
      return false;
    }
  }

  /**
   * Stop the scheduler (bounded grace period), then release the vector
   * store and counter database. In-flight summaries are left to finish.
   */
  async terminate(graceMs = DEFAULT_STOP_GRACE_MS): Promise<void> {
    await this.scheduler.stop(graceMs);
    try {
      await this.store.disconnect();
    } catch (err) {
      log.warn({ err }, "⚠️ Vector store disconnect failed");
    }
    this.counters.close();
    this.initialized = false;
    log.info("👋 Memory engine terminated");
  }
}
