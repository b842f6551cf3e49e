import OpenAI from "openai";
import type { MemoryConfig } from "../config.js";
import { ConfigError } from "../config.js";
import { withRetry } from "../llm/retry.js";
import { componentLogger } from "../logger.js";

// ── Embedder — OpenAI-compatible embeddings endpoint ─────

const log = componentLogger("embedder");

export interface EmbeddingProvider {
  /** One vector per input text, same order. */
  getEmbeddings(texts: string[]): Promise<number[][]>;
  getDim(): number;
  getModelName(): string;
  /** Optional: not every provider can probe its endpoint. */
  testConnection?(): Promise<boolean>;
}

export class OpenAIEmbedder implements EmbeddingProvider {
  private readonly client: OpenAI;

  constructor(
    private readonly options: MemoryConfig["embedding"],
    client?: OpenAI,
  ) {
    this.client =
      client ??
      new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
  }

  async getEmbeddings(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const response = await withRetry(
      () =>
        this.client.embeddings.create({
          model: this.options.model,
          input: texts,
          dimensions: this.options.dim,
        }),
      { label: "embeddings" },
    );
    // The API may return entries out of order; `index` is authoritative
    const sorted = [...response.data].sort((a, b) => a.index - b.index);
    return sorted.map((d) => d.embedding);
  }

  getDim(): number {
    return this.options.dim;
  }

  getModelName(): string {
    return this.options.model;
  }

  async testConnection(): Promise<boolean> {
    try {
      const [vector] = await this.getEmbeddings(["ping"]);
      if (!vector || vector.length !== this.options.dim) {
        log.warn(
          { expected: this.options.dim, actual: vector?.length ?? 0 },
          "⚠️ Embedding dimension does not match EMBEDDING_DIM",
        );
        return false;
      }
      return true;
    } catch (err) {
      log.error({ err, model: this.options.model }, "❌ Embedding endpoint unreachable");
      return false;
    }
  }
}

export function createEmbedder(options: MemoryConfig["embedding"]): EmbeddingProvider {
  if (options.service === "openai") return new OpenAIEmbedder(options);
  throw new ConfigError(`Unsupported embedding service: ${String(options.service)}`);
}
