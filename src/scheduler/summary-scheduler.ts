import type { SessionResolver } from "../host/types.js";
import type { SessionStateStore, Clock } from "../memory/session-state.js";
import { systemClock } from "../memory/session-state.js";
import type { SummarizationPipeline } from "../memory/summarizer.js";
import type { PersonaOptions } from "../memory/persona.js";
import { resolvePersonaId } from "../memory/persona.js";
import type { SessionLocks } from "../memory/locks.js";
import { formatContextToString } from "../memory/format.js";
import { componentLogger } from "../logger.js";

// ── Summary Scheduler — time-based sweep ─────────────────
// Summarizes sessions that went quiet before reaching the count threshold.

const log = componentLogger("scheduler");

export const DEFAULT_STOP_GRACE_MS = 5000;

export interface SummarySchedulerOptions extends PersonaOptions {
  /** Seconds between sweeps */
  summaryCheckInterval: number;
  /** Seconds of quiet before a summary is forced; Infinity disables */
  summaryTimeThreshold: number;
}

export interface SummarySchedulerDeps {
  state: SessionStateStore;
  summarizer: SummarizationPipeline;
  resolver: SessionResolver;
  /** Shared with the count-based trigger */
  locks: SessionLocks;
  now?: Clock;
}

export class SummaryScheduler {
  private controller: AbortController | null = null;
  private loopTask: Promise<void> | null = null;
  private readonly now: Clock;

  constructor(
    private readonly deps: SummarySchedulerDeps,
    private readonly options: SummarySchedulerOptions,
  ) {
    this.now = deps.now ?? systemClock;
  }

  get enabled(): boolean {
    return Number.isFinite(this.options.summaryTimeThreshold);
  }

  isRunning(): boolean {
    return this.loopTask !== null;
  }

  start(): void {
    if (this.loopTask) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loopTask = this.loop(controller.signal);
    log.info(
      {
        intervalSeconds: this.options.summaryCheckInterval,
        thresholdSeconds: this.options.summaryTimeThreshold,
      },
      "⏰ Summary scheduler started",
    );
  }

  /**
   * Signal the loop and wait up to `graceMs` for it to exit.
   * @returns false when the loop did not exit in time
   */
  async stop(graceMs = DEFAULT_STOP_GRACE_MS): Promise<boolean> {
    const task = this.loopTask;
    if (!task || !this.controller) return true;
    this.controller.abort();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });
    const exited = await Promise.race([task.then(() => true as const), timedOut]);
    clearTimeout(timer);

    this.loopTask = null;
    this.controller = null;
    if (exited) {
      log.info("⏰ Summary scheduler stopped");
    } else {
      log.warn({ graceMs }, "⚠️ Summary scheduler did not stop within the grace period");
    }
    return exited;
  }

  /**
   * One pass over every tracked session.
   * @returns number of summaries launched
   */
  async sweepOnce(): Promise<number> {
    if (!this.enabled) return 0;
    let launched = 0;
    for (const sessionId of this.deps.state.sessionIds()) {
      try {
        if (await this.checkSession(sessionId)) launched++;
      } catch (err) {
        log.error({ err, sessionId }, "❌ Time-based summary check failed");
      }
    }
    return launched;
  }

  private checkSession(sessionId: string): Promise<boolean> {
    const { state, summarizer, resolver, locks } = this.deps;
    return locks.run(sessionId, async () => {
      if (!this.isDue(sessionId)) return false;

      const context = state.getFullContext(sessionId);
      if (!context) return false;
      let personaId: string | null = null;
      if (context.origin === null) {
        log.warn({ sessionId }, "⚠️ No origin for session — summarizing without persona");
      } else {
        personaId = await resolvePersonaId(resolver, context.origin, this.options);
      }

      // Count may have grown while the persona was resolved
      const count = state.getCount(sessionId);
      const text = formatContextToString(context.history, count);
      log.info(
        { sessionId, count, idleSeconds: Math.round(this.now() - context.lastSummaryTime) },
        "📝 Session idle past threshold — summarizing",
      );
      summarizer.launch(personaId, sessionId, text);

      if (!state.markSummarized(sessionId)) {
        log.error({ sessionId }, "❌ Failed to reset counter after launching summary");
      }
      return true;
    });
  }

  private isDue(sessionId: string): boolean {
    const { state } = this.deps;
    const count = state.getCount(sessionId);
    const last = state.getSummaryTime(sessionId);
    if (count <= 0 || last === null) return false;
    return this.now() - last > this.options.summaryTimeThreshold;
  }

  private async loop(signal: AbortSignal): Promise<void> {
    const intervalMs = this.options.summaryCheckInterval * 1000;
    while (!signal.aborted) {
      try {
        await sleep(intervalMs, signal);
        if (signal.aborted) break;
        const launched = await this.sweepOnce();
        if (launched > 0) log.info({ launched }, "⏰ Sweep launched summaries");
      } catch (err) {
        const backoffSeconds =
          this.options.summaryCheckInterval > 10
            ? this.options.summaryCheckInterval / 2
            : 5;
        log.error({ err, backoffSeconds }, "❌ Summary scheduler sweep failed");
        await sleep(backoffSeconds * 1000, signal);
      }
    }
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}
