import { InvalidConfigError } from "../errors.js";
import { DEFAULT_HASHING_DIMENSIONS, HashingEmbedder, OllamaEmbedder } from "./embedders.js";
import { InMemoryVectorStore } from "./memoryStore.js";
import type { Embedder, VectorStore } from "./types.js";

export interface VectorStoreFactoryOptions {
  readonly provider: string;
  readonly collectionName: string;
  /** JSON mirror for the `memory` provider. */
  readonly filePath?: string | null;
}

/** Builds the store named by `vectorStoreProvider`. Only `memory` ships in-tree. */
export function createVectorStore(options: VectorStoreFactoryOptions): VectorStore {
  switch (options.provider) {
    case "memory":
      return new InMemoryVectorStore({
        collection: options.collectionName,
        filePath: options.filePath ?? undefined,
      });
    default:
      throw new InvalidConfigError(
        "semantic search",
        `vector store provider "${options.provider}" is not supported; inject a VectorStore instead`,
      );
  }
}

export interface EmbedderFactoryOptions {
  /** `hashing` or `ollama/<model>`. */
  readonly model: string;
  readonly dimensions?: number;
  readonly ollamaBaseUrl?: string;
  readonly fetch?: typeof fetch;
}

const OLLAMA_PREFIX = "ollama/";

export function createEmbedder(options: EmbedderFactoryOptions): Embedder {
  if (options.model === "hashing") {
    return new HashingEmbedder(options.dimensions ?? DEFAULT_HASHING_DIMENSIONS);
  }
  if (options.model.startsWith(OLLAMA_PREFIX) && options.model.length > OLLAMA_PREFIX.length) {
    if (options.dimensions === undefined) {
      throw new InvalidConfigError("semantic search", "ollama embedders need explicit dimensions");
    }
    return new OllamaEmbedder({
      model: options.model.slice(OLLAMA_PREFIX.length),
      dimensions: options.dimensions,
      baseUrl: options.ollamaBaseUrl,
      fetch: options.fetch,
    });
  }
  throw new InvalidConfigError("semantic search", `embedding model "${options.model}" is not supported`);
}
