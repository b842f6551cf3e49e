import type { OriginHandle } from "../memory/types.js";

// ── Host integration ─────────────────────────────────────

/**
 * What the engine needs to know about the host's conversations. The
 * origin handle is whatever the host passes with each request; the
 * engine never looks inside it.
 */
export interface SessionResolver {
  getCurrentSessionId(origin: OriginHandle): Promise<string>;
  /** Persona bound to the origin's conversation, null when none. */
  getPersonaId(origin: OriginHandle): Promise<string | null>;
  getDefaultPersona(): Promise<string | null>;
}
