import type { SessionResolver } from "../host/types.js";
import type { OriginHandle } from "./types.js";
import { componentLogger } from "../logger.js";

const log = componentLogger("persona");

/** Host marker for "persona explicitly unset" on a conversation. */
export const NO_PERSONA = "[%None]";

export interface PersonaOptions {
  usePersonalityFiltering: boolean;
  defaultPersonaOnNone: string;
}

/**
 * Conversation persona → global default → placeholder (only when
 * filtering by persona) → null. Resolver errors count as "no persona".
 */
export async function resolvePersonaId(
  resolver: SessionResolver,
  origin: OriginHandle | null,
  options: PersonaOptions,
): Promise<string | null> {
  let persona: string | null = null;
  try {
    if (origin !== null && origin !== undefined) {
      persona = await resolver.getPersonaId(origin);
    }
    if (!persona || persona === NO_PERSONA) {
      persona = await resolver.getDefaultPersona();
    }
  } catch (err) {
    log.warn({ err }, "⚠️ Persona lookup failed");
    persona = null;
  }

  if (persona && persona !== NO_PERSONA) return persona;
  return options.usePersonalityFiltering ? options.defaultPersonaOnNone : null;
}
