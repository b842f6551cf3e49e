import type { InjectionMethod } from "../config.js";
import { INJECTION_METHODS } from "../config.js";
import type { MemoryHit, ProviderRequest } from "./types.js";
import { ROLE_SYSTEM } from "./types.js";
import type { MemoryMarker } from "./markers.js";
import {
  removeInsertedSystemMessages,
  removeSystemPromptMemories,
  removeUserPromptMemories,
} from "./markers.js";
import { formatMemoryEntry } from "./format.js";
import { componentLogger } from "../logger.js";

// ── Injection — splice memories into an outbound request ─

const log = componentLogger("retrieval");

export interface BlockTemplate {
  prefix: string;
  suffix: string;
  entryFormat: string;
}

/** Unknown methods fall back to `user_prompt`. */
export function resolveInjectionMethod(method: string): InjectionMethod {
  const known = INJECTION_METHODS.find((m) => m === method);
  if (known) return known;
  log.warn({ method }, "⚠️ Unknown injection method — using user_prompt");
  return "user_prompt";
}

export function formatMemoriesBlock(
  hits: MemoryHit[],
  marker: MemoryMarker,
  template: BlockTemplate,
): string {
  return marker.encode(
    hits.map((hit) => formatMemoryEntry(hit, template.entryFormat)),
    template.prefix,
    template.suffix,
  );
}

/** Remove earlier injections for `method`, keeping the newest `keep`. */
export function cleanContexts(
  request: ProviderRequest,
  method: InjectionMethod,
  marker: MemoryMarker,
  keep: number,
): void {
  switch (method) {
    case "user_prompt":
      request.contexts = removeUserPromptMemories(request.contexts, marker, keep);
      break;
    case "system_prompt":
      request.systemPrompt = removeSystemPromptMemories(
        request.systemPrompt,
        marker,
        keep,
      );
      break;
    case "insert_system_prompt":
      request.contexts = removeInsertedSystemMessages(request.contexts, keep);
      break;
  }
}

export function injectMemories(
  request: ProviderRequest,
  block: string,
  method: InjectionMethod,
): void {
  switch (method) {
    case "user_prompt":
      request.prompt = `${block}\n${request.prompt}`;
      break;
    case "system_prompt":
      request.systemPrompt = `${request.systemPrompt}\n${block}`;
      break;
    case "insert_system_prompt":
      request.contexts.push({ role: ROLE_SYSTEM, content: block });
      break;
  }
}
