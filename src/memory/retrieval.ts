import type { SearchParams } from "../config.js";
import type { EmbeddingProvider } from "../embedding/embedder.js";
import type { SessionResolver } from "../host/types.js";
import type { FilterExpression, SearchHit, VectorStore } from "../vector/types.js";
import {
  DEFAULT_OUTPUT_FIELDS,
  PRIMARY_FIELD_NAME,
  VECTOR_FIELD_NAME,
} from "../vector/collection.js";
import { eq, renderFilter } from "../vector/filter.js";
import type { MemoryHit, OriginHandle, ProviderRequest } from "./types.js";
import { ROLE_USER } from "./types.js";
import type { SessionStateStore } from "./session-state.js";
import { MemoryMarker } from "./markers.js";
import {
  cleanContexts,
  formatMemoriesBlock,
  injectMemories,
  resolveInjectionMethod,
} from "./injection.js";
import { resolvePersonaId } from "./persona.js";
import { SearchTimeoutError, withTimeout } from "../utils/timeout.js";
import { componentLogger } from "../logger.js";

// ── Retrieval Pipeline ───────────────────────────────────
// embed the user turn → search this session's memories → inject

const log = componentLogger("retrieval");

export interface RetrievalOptions {
  collectionName: string;
  topK: number;
  /** Seconds */
  searchTimeout: number;
  searchParams: SearchParams;
  usePersonalityFiltering: boolean;
  defaultPersonaOnNone: string;
  injectionMethod: string;
  memoryPrefix: string;
  memorySuffix: string;
  memoryEntryFormat: string;
  /** Injected blocks kept from earlier turns. */
  contextsMemoryLen: number;
}

export interface RetrievalDeps {
  state: SessionStateStore;
  store: VectorStore;
  embedder: EmbeddingProvider | null;
  resolver: SessionResolver;
}

export type RetrievalStatus = "skipped" | "aborted" | "empty" | "injected";

export interface RetrievalOutcome {
  status: RetrievalStatus;
  memories: MemoryHit[];
}

const outcome = (status: RetrievalStatus, memories: MemoryHit[] = []): RetrievalOutcome => ({
  status,
  memories,
});

export class RetrievalPipeline {
  readonly marker: MemoryMarker;

  constructor(
    private readonly deps: RetrievalDeps,
    private readonly options: RetrievalOptions,
  ) {
    this.marker = MemoryMarker.fromTemplates(options.memoryPrefix, options.memorySuffix);
  }

  /**
   * Rewrite `request` in place with memories relevant to its prompt.
   * Never throws; every failure ends the retrieval, not the turn.
   */
  async handle(origin: OriginHandle, request: ProviderRequest): Promise<RetrievalOutcome> {
    try {
      return await this.retrieve(origin, request);
    } catch (err) {
      log.error({ err }, "❌ Memory retrieval failed");
      return outcome("aborted");
    }
  }

  private async retrieve(
    origin: OriginHandle,
    request: ProviderRequest,
  ): Promise<RetrievalOutcome> {
    const { state, store, embedder, resolver } = this.deps;
    const opts = this.options;

    if (!store.isConnected() || !embedder) {
      log.debug(
        { connected: store.isConnected(), embedder: Boolean(embedder) },
        "Memory retrieval skipped — dependencies not ready",
      );
      return outcome("skipped");
    }

    const sessionId = await resolver.getCurrentSessionId(origin);
    const personaId = await resolvePersonaId(resolver, origin, opts);

    state.ensureSession(sessionId, request.contexts, origin);

    const method = resolveInjectionMethod(opts.injectionMethod);
    cleanContexts(request, method, this.marker, opts.contextsMemoryLen);

    state.addMessage(sessionId, ROLE_USER, request.prompt, origin);
    state.incrementCount(sessionId);

    let queryVector: number[] | undefined;
    try {
      [queryVector] = await embedder.getEmbeddings([request.prompt]);
    } catch (err) {
      log.error({ err, sessionId }, "❌ Query embedding failed");
      return outcome("aborted");
    }
    if (!queryVector || queryVector.length === 0) {
      log.error({ sessionId }, "❌ Query embedding is empty — retrieval aborted");
      return outcome("aborted");
    }

    const filter: FilterExpression = [
      { field: PRIMARY_FIELD_NAME, op: ">", value: 0 },
      eq("session_id", sessionId),
    ];
    if (opts.usePersonalityFiltering && personaId) {
      filter.push(eq("personality_id", personaId));
    }

    let results: SearchHit[][] | null;
    try {
      results = await withTimeout(
        store.search(opts.collectionName, {
          vectors: [queryVector],
          vectorField: VECTOR_FIELD_NAME,
          searchParams: opts.searchParams,
          limit: opts.topK,
          filter,
          outputFields: DEFAULT_OUTPUT_FIELDS,
        }),
        opts.searchTimeout * 1000,
      );
    } catch (err) {
      if (err instanceof SearchTimeoutError) {
        log.error(
          { sessionId, timeoutSeconds: opts.searchTimeout },
          "❌ Memory search timed out",
        );
      } else {
        log.error({ err, sessionId }, "❌ Memory search failed");
      }
      return outcome("aborted");
    }
    if (!results) {
      log.error({ sessionId, filter: renderFilter(filter) }, "❌ Memory search failed");
      return outcome("aborted");
    }

    const memories = normalizeHits(results[0] ?? []);
    if (memories.length === 0) {
      log.debug({ sessionId }, "No relevant memories");
      return outcome("empty");
    }

    const block = formatMemoriesBlock(memories, this.marker, {
      prefix: opts.memoryPrefix,
      suffix: opts.memorySuffix,
      entryFormat: opts.memoryEntryFormat,
    });
    injectMemories(request, block, method);
    log.info({ sessionId, count: memories.length, method }, "🧠 Memories injected");
    return outcome("injected", memories);
  }
}

// ── Hit normalization ────────────────────────────────────

/** Hits without text content are dropped. */
export function normalizeHits(hits: SearchHit[]): MemoryHit[] {
  const memories: MemoryHit[] = [];
  for (const hit of hits) {
    const memory = normalizeHit(hit);
    if (memory) {
      memories.push(memory);
    } else {
      log.warn({ id: hit.id }, "⚠️ Skipping malformed search hit");
    }
  }
  return memories;
}

function normalizeHit(hit: SearchHit): MemoryHit | null {
  const entity = hit.entity;
  if (typeof entity !== "object" || entity === null) return null;
  const fields = new Map(Object.entries(entity));

  const content = fields.get("content");
  if (typeof content !== "string") return null;

  const memoryId = asNumber(fields.get(PRIMARY_FIELD_NAME)) ?? asNumber(hit.id);
  return {
    memory_id: memoryId,
    content,
    create_time: asNumber(fields.get("create_time")),
    session_id: asString(fields.get("session_id")),
    personality_id: asString(fields.get("personality_id")),
    score: hit.score,
  };
}

function asNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function asString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}
