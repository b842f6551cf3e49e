import type { ContextMessage } from "./types.js";
import { ROLE_SYSTEM, ROLE_USER } from "./types.js";

// ── Memory Markers — inject / find / strip memory blocks ─

/**
 * Wire format of an injected memory block: an opening marker line, one
 * line per memory, a closing marker. Stripping is by paired markers, so
 * the prefix/suffix must start and end with the tags the marker knows.
 */
export class MemoryMarker {
  readonly open: string;
  readonly close: string;
  private readonly pattern: RegExp;
  private readonly linePattern: RegExp;

  constructor(open = "<Memory>", close = "</Memory>") {
    if (!open || !close) {
      throw new Error("Memory marker tags must be non-empty");
    }
    this.open = open;
    this.close = close;
    this.pattern = new RegExp(
      `${escapeRegExp(open)}[\\s\\S]*?${escapeRegExp(close)}`,
      "g",
    );
    this.linePattern = new RegExp(`\\n?(${this.pattern.source})`, "g");
  }

  /**
   * Derive a marker from configured prefix/suffix strings.
   * `<Memory> Long-term memory fragments:` → open tag `<Memory>`.
   */
  static fromTemplates(prefix: string, suffix: string): MemoryMarker {
    const openTag = /^\s*(<[^>\s/]+>)/.exec(prefix)?.[1];
    const closeTag = /(<\/[^>\s]+>)\s*$/.exec(suffix)?.[1];
    return new MemoryMarker(
      openTag ?? prefix.trim(),
      closeTag ?? suffix.trim(),
    );
  }

  /** Wrap already formatted lines into one block. */
  encode(lines: string[], prefix = this.open, suffix = this.close): string {
    return `${prefix}\n${lines.map((l) => `${l}\n`).join("")}${suffix}`;
  }

  /** All complete blocks in `text`, in scan order. */
  findAll(text: string): string[] {
    return text.match(this.pattern) ?? [];
  }

  /** Entry lines of one block, markers and prefix line dropped. */
  decode(block: string): string[] {
    const lines = block.split("\n");
    if (lines.length < 2) return [];
    return lines.slice(1, -1).filter((l) => l.trim() !== "");
  }

  /**
   * Remove blocks from `text`. Blocks listed in `keep` survive.
   */
  strip(text: string, keep: ReadonlySet<string> = new Set()): string {
    return text.replace(this.pattern, (block) => (keep.has(block) ? block : ""));
  }

  /** {@link strip}, also taking the newline that precedes each removed block. */
  stripLines(text: string, keep: ReadonlySet<string> = new Set()): string {
    return text.replace(this.linePattern, (match: string, block: string) =>
      keep.has(block) ? match : "",
    );
  }
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// ── Removal for each injection method ────────────────────

/**
 * Strip injected blocks from user-role messages. With `keepLast` > 0 the
 * most recent `keepLast` blocks (scan order across all user messages)
 * are kept. Non-string content passes through unchanged.
 */
export function removeUserPromptMemories(
  contexts: ContextMessage[],
  marker: MemoryMarker,
  keepLast = 0,
): ContextMessage[] {
  let keep: Set<string> = new Set();
  if (keepLast > 0) {
    const all: string[] = [];
    for (const msg of contexts) {
      if (msg.role === ROLE_USER && typeof msg.content === "string") {
        all.push(...marker.findAll(msg.content));
      }
    }
    keep = new Set(all.slice(-keepLast));
  }

  return contexts.map((msg) => {
    if (msg.role !== ROLE_USER || typeof msg.content !== "string") return msg;
    const cleaned = marker.strip(msg.content, keep);
    return cleaned === msg.content ? msg : { ...msg, content: cleaned };
  });
}

/**
 * Same as {@link removeUserPromptMemories}, for a single system prompt
 * string. The newline joining a block to the prompt goes with it.
 */
export function removeSystemPromptMemories(
  text: string,
  marker: MemoryMarker,
  keepLast = 0,
): string {
  if (keepLast <= 0) return marker.stripLines(text);
  const keep = new Set(marker.findAll(text).slice(-keepLast));
  return marker.stripLines(text, keep);
}

/**
 * Drop the oldest system-role messages so at most `keepLast` remain.
 * Everything else keeps its relative order.
 */
export function removeInsertedSystemMessages(
  contexts: ContextMessage[],
  keepLast = 0,
): ContextMessage[] {
  const keep = Math.max(0, keepLast);
  const systemIdx: number[] = [];
  contexts.forEach((msg, i) => {
    if (msg.role === ROLE_SYSTEM) systemIdx.push(i);
  });
  if (systemIdx.length <= keep) return [...contexts];

  const drop = new Set(systemIdx.slice(0, systemIdx.length - keep));
  return contexts.filter((_, i) => !drop.has(i));
}
