import type { EmbeddingProvider } from "../../src/embedding/embedder.js";
import type { LlmProvider, ChatResult } from "../../src/llm/provider.js";
import type { SessionResolver } from "../../src/host/types.js";
import type { SummaryLlmParams } from "../../src/config.js";
import { loadConfig } from "../../src/config.js";
import type { MemoryConfig } from "../../src/config.js";

// ── Test doubles ─────────────────────────────────────────

export class FakeEmbedder implements EmbeddingProvider {
  readonly calls: string[][] = [];

  constructor(
    private readonly embed: (text: string) => number[] = () => [1, 0, 0, 0],
    private readonly dim = 4,
  ) {}

  async getEmbeddings(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    return texts.map((t) => this.embed(t));
  }

  getDim(): number {
    return this.dim;
  }

  getModelName(): string {
    return "fake-embedding";
  }
}

export class FakeLlm implements LlmProvider {
  readonly calls: Array<{ prompt: string; systemContext: string; params?: SummaryLlmParams }> =
    [];

  constructor(private readonly reply: (prompt: string) => Promise<string> | string) {}

  async chat(
    prompt: string,
    systemContext: string,
    params?: SummaryLlmParams,
  ): Promise<ChatResult> {
    this.calls.push({ prompt, systemContext, params });
    return { completionText: await this.reply(prompt), role: "assistant" };
  }
}

export interface TestOrigin {
  sessionId: string;
  personaId?: string | null;
}

function isTestOrigin(origin: unknown): origin is TestOrigin {
  return (
    typeof origin === "object" &&
    origin !== null &&
    "sessionId" in origin &&
    typeof origin.sessionId === "string"
  );
}

export class FakeResolver implements SessionResolver {
  constructor(public defaultPersona: string | null = null) {}

  async getCurrentSessionId(origin: unknown): Promise<string> {
    if (!isTestOrigin(origin)) throw new Error("unknown origin");
    return origin.sessionId;
  }

  async getPersonaId(origin: unknown): Promise<string | null> {
    return isTestOrigin(origin) ? (origin.personaId ?? null) : null;
  }

  async getDefaultPersona(): Promise<string | null> {
    return this.defaultPersona;
  }
}

/** Settable clock in unix seconds. */
export function manualClock(start: number): { now: () => number; set: (t: number) => void } {
  let t = start;
  return {
    now: () => t,
    set: (next: number) => {
      t = next;
    },
  };
}

export function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
} {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function testConfig(env: Record<string, string> = {}): MemoryConfig {
  return loadConfig({
    EMBEDDING_API_KEY: "test-secret",
    LLM_API_KEY: "test-secret",
    EMBEDDING_DIM: "4",
    MEMORY_COUNTER_DB: ":memory:",
    ...env,
  });
}
