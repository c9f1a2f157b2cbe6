import { z } from "zod";

import { EmbeddingError } from "../errors.js";
import { requestJson } from "../engines/http.js";
import type { Embedder } from "./types.js";

export const DEFAULT_HASHING_DIMENSIONS = 256;

/** Lower-cased letter/digit runs of two characters or more. */
export function tokenise(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 1);
}

/** 32-bit FNV-1a. */
function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Deterministic bag-of-words embedding using the hashing trick: each token
 * lands in one bucket with a hash-derived sign, and the vector is L2
 * normalised. No model download, stable across runs, good enough to rank
 * texts that share vocabulary.
 */
export class HashingEmbedder implements Embedder {
  readonly dimensions: number;
  readonly model: string;

  constructor(dimensions: number = DEFAULT_HASHING_DIMENSIONS) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new EmbeddingError(`dimensions must be a positive integer, received ${dimensions}`);
    }
    this.dimensions = dimensions;
    this.model = `hashing-${dimensions}`;
  }

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenise(text)) {
      const hash = fnv1a(token);
      const bucket = hash % this.dimensions;
      vector[bucket] += (hash & 0x80000000) === 0 ? 1 : -1;
    }
    let norm = 0;
    for (const value of vector) {
      norm += value * value;
    }
    norm = Math.sqrt(norm);
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }
}

export interface OllamaEmbedderOptions {
  readonly baseUrl?: string;
  readonly model: string;
  /** Expected vector size; responses of another size are rejected. */
  readonly dimensions: number;
  readonly fetch?: typeof fetch;
  readonly timeoutMs?: number;
}

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())).min(1),
});

/** Embeddings served by an Ollama instance (`POST /api/embed`). */
export class OllamaEmbedder implements Embedder {
  readonly model: string;
  readonly dimensions: number;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(options: OllamaEmbedderOptions) {
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.baseUrl = options.baseUrl ?? "http://localhost:11434";
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async embed(text: string): Promise<number[]> {
    let payload: z.output<typeof embedResponseSchema>;
    try {
      payload = await requestJson(this.fetchImpl, {
        engine: "ollama",
        url: new URL("/api/embed", this.baseUrl),
        init: {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ model: this.model, input: text }),
        },
        schema: embedResponseSchema,
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      throw new EmbeddingError(`model "${this.model}" could not embed the text`, { cause: error });
    }

    const [vector] = payload.embeddings;
    if (vector.length !== this.dimensions) {
      throw new EmbeddingError(
        `model "${this.model}" returned ${vector.length} dimensions, expected ${this.dimensions}`,
      );
    }
    return vector;
  }
}
