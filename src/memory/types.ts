// ── Memory Module — Shared Types ─────────────────────────

export type Role = "user" | "assistant" | "system";

export const ROLE_USER = "user";
export const ROLE_ASSISTANT = "assistant";
export const ROLE_SYSTEM = "system";

export function isRole(role: string): role is Role {
  return role === ROLE_USER || role === ROLE_ASSISTANT || role === ROLE_SYSTEM;
}

/** One turn as the host hands it over in a request's context list. */
export interface ContextMessage {
  role: string;
  /** Usually text; multimodal hosts may pass structured parts. */
  content: unknown;
}

/** One turn as kept in a session's in-memory history. */
export interface HistoryMessage {
  role: Role;
  content: string;
  /** Local wall-clock time, `YYYY-MM-DD HH:mm:ss` */
  timestamp: string;
}

/**
 * Opaque reference to the request that first touched a session.
 * Used to resolve the persona for background summaries.
 */
export type OriginHandle = unknown;

export interface SessionContext {
  history: HistoryMessage[];
  /** Unix seconds of the last summary (or of session creation). */
  lastSummaryTime: number;
  origin: OriginHandle | null;
}

/** A persisted, embedded summary of past dialogue. */
export interface MemoryRecord {
  memory_id?: number;
  personality_id: string;
  session_id: string;
  content: string;
  vector: number[];
  /** Unix seconds */
  create_time: number;
}

/** A retrieved memory, vector omitted. */
export interface MemoryHit {
  memory_id: number | null;
  content: string;
  create_time: number | null;
  session_id: string | null;
  personality_id: string | null;
  score?: number;
}

/** Outbound LLM request the retrieval pipeline may rewrite in place. */
export interface ProviderRequest {
  prompt: string;
  systemPrompt: string;
  contexts: ContextMessage[];
}

/** Completion handed back by the host after the LLM call. */
export interface ProviderResponse {
  role: string;
  completionText: string;
}
