import type { MemoryConfig } from "../config.js";
import { ConfigError } from "../config.js";
import type { VectorStore } from "./types.js";
import { LocalVectorStore } from "./local.js";
import { PineconeVectorStore } from "./pinecone.js";

/** Pick the vector backend named in config. */
export function createVectorStore(
  config: Pick<MemoryConfig, "vectorBackend" | "localVectorDbPath" | "pinecone" | "indexParams">,
): VectorStore {
  switch (config.vectorBackend) {
    case "local":
      return new LocalVectorStore(config.localVectorDbPath);
    case "pinecone":
      return new PineconeVectorStore(config);
    default:
      throw new ConfigError(`Unsupported vector backend: ${String(config.vectorBackend)}`);
  }
}
