import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { CounterStore } from "../src/memory/counter-store.js";
import { SessionStateStore } from "../src/memory/session-state.js";
import { SummarizationPipeline } from "../src/memory/summarizer.js";
import { SummaryScheduler } from "../src/scheduler/summary-scheduler.js";
import type { SummarySchedulerOptions } from "../src/scheduler/summary-scheduler.js";
import { LocalVectorStore } from "../src/vector/local.js";
import { SessionLocks } from "../src/memory/locks.js";
import { DEFAULT_SUMMARY_PROMPT } from "../src/config.js";
import { FakeEmbedder, FakeLlm, FakeResolver, deferred, manualClock } from "./helpers/fakes.js";

const START = 10_000;

const baseOptions: SummarySchedulerOptions = {
  summaryCheckInterval: 300,
  summaryTimeThreshold: 1800,
  usePersonalityFiltering: false,
  defaultPersonaOnNone: "default_persona",
};

describe("SummaryScheduler", () => {
  let clock: ReturnType<typeof manualClock>;
  let state: SessionStateStore;
  let summarizer: SummarizationPipeline;
  let resolver: FakeResolver;
  let locks: SessionLocks;
  let scheduler: SummaryScheduler | null;

  beforeEach(() => {
    clock = manualClock(START);
    state = new SessionStateStore(new CounterStore(":memory:"), clock.now);
    summarizer = new SummarizationPipeline(
      {
        store: new LocalVectorStore(null),
        embedder: new FakeEmbedder(),
        llm: new FakeLlm(() => "summary"),
      },
      {
        collectionName: "memories",
        summaryPrompt: DEFAULT_SUMMARY_PROMPT,
        summaryLlmParams: {},
        flushAfterInsert: false,
        defaultPersonaOnNone: "default_persona",
      },
    );
    resolver = new FakeResolver();
    locks = new SessionLocks();
    scheduler = null;
  });

  afterEach(async () => {
    await scheduler?.stop();
  });

  function create(options: Partial<SummarySchedulerOptions> = {}): SummaryScheduler {
    scheduler = new SummaryScheduler(
      { state, summarizer, resolver, locks, now: clock.now },
      { ...baseOptions, ...options },
    );
    return scheduler;
  }

  function converse(sessionId: string, turns: Array<[string, string]>): void {
    for (const [role, content] of turns) {
      state.addMessage(sessionId, role === "user" ? "user" : "assistant", content, {
        sessionId,
        personaId: "p1",
      });
      state.incrementCount(sessionId);
    }
  }

  // ── Sweep ──────────────────────────────────────────────

  it("summarizes a session idle past the threshold", async () => {
    const launch = vi.spyOn(summarizer, "launch").mockImplementation(() => {});
    converse("s1", [
      ["user", "I adopted a cat"],
      ["assistant", "Congratulations!"],
    ]);
    clock.set(START + 1801);

    expect(await create().sweepOnce()).toBe(1);
    expect(launch).toHaveBeenCalledWith(
      "p1",
      "s1",
      "user: I adopted a cat\nassistant: Congratulations!",
    );
    expect(state.getCount("s1")).toBe(0);
    expect(state.getSummaryTime("s1")).toBe(START + 1801);
  });

  it("only includes turns since the last summary", async () => {
    const launch = vi.spyOn(summarizer, "launch").mockImplementation(() => {});
    converse("s1", [
      ["user", "old"],
      ["assistant", "old reply"],
    ]);
    state.markSummarized("s1");
    converse("s1", [["user", "new question"]]);
    clock.set(START + 2000);

    await create().sweepOnce();
    expect(launch).toHaveBeenCalledWith("p1", "s1", "user: new question");
  });

  it("waits until the threshold is strictly exceeded", async () => {
    const launch = vi.spyOn(summarizer, "launch").mockImplementation(() => {});
    converse("s1", [["user", "hi"]]);
    clock.set(START + 1800);
    expect(await create().sweepOnce()).toBe(0);
    expect(launch).not.toHaveBeenCalled();
    expect(state.getCount("s1")).toBe(1);
  });

  it("skips sessions without pending turns", async () => {
    const launch = vi.spyOn(summarizer, "launch").mockImplementation(() => {});
    state.ensureSession("quiet");
    clock.set(START + 5000);
    expect(await create().sweepOnce()).toBe(0);
    expect(launch).not.toHaveBeenCalled();
  });

  it("does nothing when time-based summaries are disabled", async () => {
    const launch = vi.spyOn(summarizer, "launch").mockImplementation(() => {});
    converse("s1", [["user", "hi"]]);
    clock.set(START + 1_000_000);
    const disabled = create({ summaryTimeThreshold: Infinity });
    expect(disabled.enabled).toBe(false);
    expect(await disabled.sweepOnce()).toBe(0);
    expect(launch).not.toHaveBeenCalled();
  });

  it("summarizes without a persona when the session has no origin", async () => {
    const launch = vi.spyOn(summarizer, "launch").mockImplementation(() => {});
    resolver.defaultPersona = "global-persona";
    const getDefaultPersona = vi.spyOn(resolver, "getDefaultPersona");
    state.addMessage("orphan", "user", "hello");
    state.incrementCount("orphan");
    clock.set(START + 1801);
    await create().sweepOnce();
    expect(launch).toHaveBeenCalledWith(null, "orphan", "user: hello");
    expect(getDefaultPersona).not.toHaveBeenCalled();
  });

  it("waits for the count trigger holding the session lock", async () => {
    const launch = vi.spyOn(summarizer, "launch").mockImplementation(() => {});
    converse("s1", [["user", "hi"]]);
    clock.set(START + 1801);

    const gate = deferred<void>();
    const held = locks.run("s1", async () => {
      await gate.promise;
      state.markSummarized("s1");
    });
    const sweep = create().sweepOnce();
    await new Promise((r) => setTimeout(r, 0));
    expect(launch).not.toHaveBeenCalled();

    gate.resolve();
    await held;
    expect(await sweep).toBe(0);
    expect(launch).not.toHaveBeenCalled();
  });

  it("keeps sweeping after one session fails", async () => {
    const launch = vi.spyOn(summarizer, "launch").mockImplementation(() => {});
    converse("bad", [["user", "x"]]);
    converse("good", [["user", "y"]]);
    clock.set(START + 1801);

    const getFullContext = state.getFullContext.bind(state);
    vi.spyOn(state, "getFullContext").mockImplementation((id) => {
      if (id === "bad") throw new Error("corrupt session");
      return getFullContext(id);
    });

    expect(await create().sweepOnce()).toBe(1);
    expect(launch).toHaveBeenCalledWith("p1", "good", "user: y");
  });

  // ── Loop ───────────────────────────────────────────────

  it("sweeps on its interval and stops within the grace period", async () => {
    const launch = vi.spyOn(summarizer, "launch").mockImplementation(() => {});
    converse("s1", [["user", "hi"]]);
    clock.set(START + 1801);

    const running = create({ summaryCheckInterval: 0.01 });
    running.start();
    expect(running.isRunning()).toBe(true);

    await vi.waitFor(() => expect(launch).toHaveBeenCalledTimes(1));
    expect(await running.stop(1000)).toBe(true);
    expect(running.isRunning()).toBe(false);
  });

  it("stops promptly while sleeping", async () => {
    const idle = create({ summaryCheckInterval: 3600 });
    idle.start();
    expect(await idle.stop(1000)).toBe(true);
  });
});
