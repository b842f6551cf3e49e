import type { MemoryHit } from "./types.js";
import { ROLE_ASSISTANT, ROLE_USER } from "./types.js";

// ── Formatting helpers ───────────────────────────────────

/**
 * Flatten the last `length` user/assistant turns into `role: content`
 * lines, oldest first. Other roles are skipped and not counted.
 */
export function formatContextToString(
  history: ReadonlyArray<{ role: string; content: unknown }>,
  length = 10,
): string {
  if (length <= 0) return "";

  const picked: string[] = [];
  for (let i = history.length - 1; i >= 0 && picked.length < length; i--) {
    const { role, content } = history[i];
    if (content === undefined || content === null) continue;
    if (role !== ROLE_USER && role !== ROLE_ASSISTANT) continue;
    picked.push(`${role}: ${String(content)}`);
  }
  return picked.reverse().join("\n");
}

/** `YYYY-MM-DD HH:mm:ss` in local time. */
export function formatHistoryTimestamp(date: Date = new Date()): string {
  return `${formatDate(date)}:${pad(date.getSeconds())}`;
}

/** `YYYY-MM-DD HH:mm` in local time, from unix seconds. */
export function formatMemoryTime(createTime: number | null): string {
  if (createTime === null || !Number.isFinite(createTime)) {
    return "unknown time";
  }
  return formatDate(new Date(createTime * 1000));
}

/** Render one memory with an entry template using `{time}` and `{content}`. */
export function formatMemoryEntry(hit: MemoryHit, template: string): string {
  const time = formatMemoryTime(hit.create_time);
  return template
    .split("{time}")
    .map((part) => part.split("{content}").join(hit.content))
    .join(time);
}

function formatDate(d: Date): string {
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}`
  );
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Re-split a formatted span back into its turns. */
export function parseFormattedContext(
  text: string,
): Array<{ role: typeof ROLE_USER | typeof ROLE_ASSISTANT; content: string }> {
  if (!text) return [];
  const turns: Array<{
    role: typeof ROLE_USER | typeof ROLE_ASSISTANT;
    content: string;
  }> = [];
  for (const line of text.split("\n")) {
    const match = /^(user|assistant): ([\s\S]*)$/.exec(line);
    if (match) {
      turns.push({
        role: match[1] === ROLE_USER ? ROLE_USER : ROLE_ASSISTANT,
        content: match[2],
      });
    } else if (turns.length > 0) {
      // continuation of a multi-line turn
      turns[turns.length - 1].content += `\n${line}`;
    }
  }
  return turns;
}
