import type { SummaryLlmParams } from "../config.js";
import type { EmbeddingProvider } from "../embedding/embedder.js";
import type { LlmProvider } from "../llm/provider.js";
import type { VectorStore, VectorRow } from "../vector/types.js";
import {
  MAX_CONTENT_LENGTH,
  MAX_PERSONALITY_ID_LENGTH,
  MAX_SESSION_ID_LENGTH,
} from "../vector/collection.js";
import type { Clock } from "./session-state.js";
import { systemClock } from "./session-state.js";
import { componentLogger } from "../logger.js";

// ── Summarization Pipeline ───────────────────────────────
// dialogue span → LLM summary → embedding → vector record

const log = componentLogger("summarizer");

export type SummaryStage = "preconditions" | "llm" | "extract" | "embed" | "store";

export type SummaryOutcome =
  | { ok: true; memoryId: number | null; content: string }
  | { ok: false; stage: SummaryStage };

export interface SummarizerOptions {
  collectionName: string;
  summaryPrompt: string;
  summaryLlmParams: SummaryLlmParams;
  flushAfterInsert: boolean;
  /** Stored as personality_id when no persona was resolved. */
  defaultPersonaOnNone: string;
}

export interface SummarizerDeps {
  store: VectorStore;
  embedder: EmbeddingProvider | null;
  llm: LlmProvider | null;
  now?: Clock;
}

export class SummarizationPipeline {
  private readonly inflight = new Set<Promise<SummaryOutcome>>();
  private readonly now: Clock;

  constructor(
    private readonly deps: SummarizerDeps,
    private readonly options: SummarizerOptions,
  ) {
    this.now = deps.now ?? systemClock;
  }

  /**
   * Start a summary in the background. The caller does not wait; the
   * task is not cancelled on shutdown.
   */
  launch(personaId: string | null, sessionId: string, text: string): void {
    const task = this.run(personaId, sessionId, text).finally(() => {
      this.inflight.delete(task);
    });
    this.inflight.add(task);
  }

  /** Number of launched summaries still running. */
  pending(): number {
    return this.inflight.size;
  }

  /** Resolves once every launched summary has settled. */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  /** Run all stages. Never throws; failures abort at the failing stage. */
  async run(
    personaId: string | null,
    sessionId: string,
    text: string,
  ): Promise<SummaryOutcome> {
    const { store, embedder, llm } = this.deps;

    // Checked before the LLM call so a broken setup costs nothing
    if (!store.isConnected() || !embedder || !llm || !text.trim()) {
      log.warn(
        {
          sessionId,
          connected: store.isConnected(),
          embedder: Boolean(embedder),
          llm: Boolean(llm),
          emptyText: !text.trim(),
        },
        "⚠️ Summary skipped — preconditions not met",
      );
      return { ok: false, stage: "preconditions" };
    }

    let completion: string;
    try {
      const result = await llm.chat(
        text,
        this.options.summaryPrompt,
        this.options.summaryLlmParams,
      );
      completion = result.completionText;
    } catch (err) {
      log.error({ err, sessionId }, "❌ Summary LLM call failed");
      return { ok: false, stage: "llm" };
    }

    const summary = completion.trim();
    if (!summary) {
      log.warn({ sessionId }, "⚠️ LLM returned an empty summary");
      return { ok: false, stage: "extract" };
    }

    let vector: number[] | undefined;
    try {
      [vector] = await embedder.getEmbeddings([summary]);
    } catch (err) {
      log.error({ err, sessionId }, "❌ Embedding the summary failed");
      return { ok: false, stage: "embed" };
    }
    if (!vector || vector.length === 0) {
      log.error({ sessionId }, "❌ Embedding provider returned no vector for the summary");
      return { ok: false, stage: "embed" };
    }

    const row: VectorRow = {
      personality_id: (personaId ?? this.options.defaultPersonaOnNone).slice(
        0,
        MAX_PERSONALITY_ID_LENGTH,
      ),
      session_id: sessionId.slice(0, MAX_SESSION_ID_LENGTH),
      content: summary.slice(0, MAX_CONTENT_LENGTH),
      vector,
      create_time: Math.floor(this.now()),
    };

    try {
      const inserted = await store.insert(this.options.collectionName, [row]);
      if (!inserted || inserted.insertedCount === 0) {
        log.error({ sessionId }, "❌ Vector store rejected the summary");
        return { ok: false, stage: "store" };
      }
      if (this.options.flushAfterInsert) {
        await store.flush([this.options.collectionName]);
      }
      const memoryId = inserted.ids[0] ?? null;
      log.info(
        { sessionId, personaId: row.personality_id, memoryId },
        "🧠 Memory stored",
      );
      return { ok: true, memoryId, content: summary };
    } catch (err) {
      log.error({ err, sessionId }, "❌ Storing the summary failed");
      return { ok: false, stage: "store" };
    }
  }
}
