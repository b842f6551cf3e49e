import type { SessionStateStore } from "./session-state.js";
import type { SummarizationPipeline } from "./summarizer.js";
import { formatContextToString } from "./format.js";
import { componentLogger } from "../logger.js";

// ── Trigger Evaluator — count-based ──────────────────────

const log = componentLogger("trigger");

export interface TriggerDeps {
  state: SessionStateStore;
  summarizer: SummarizationPipeline;
  /** Un-summarized turns that trigger a summary. */
  numPairs: number;
}

/**
 * Run after every assistant turn, under the session's lock. When the
 * counter reaches `numPairs`, the last `numPairs` turns are handed to the
 * summarizer and the counter is reset before the summary finishes.
 *
 * @returns true when a summary was launched
 */
export function checkAndTriggerSummary(
  deps: TriggerDeps,
  sessionId: string,
  personaId: string | null,
): boolean {
  const { state, summarizer, numPairs } = deps;
  const history = state.getHistory(sessionId);

  if (!state.adjustCountIfNecessary(sessionId, history.length)) {
    log.warn({ sessionId }, "⚠️ Counter reconciliation failed — skipping trigger check");
    return false;
  }

  const count = state.getCount(sessionId);
  if (count < numPairs) return false;

  const text = formatContextToString(history, numPairs);
  log.info({ sessionId, count, numPairs }, "📝 Count threshold reached — summarizing");
  summarizer.launch(personaId, sessionId, text);

  // Reset now, not on completion: a failed summary loses its span
  if (!state.markSummarized(sessionId)) {
    log.error({ sessionId }, "❌ Failed to reset counter after launching summary");
  }
  return true;
}
