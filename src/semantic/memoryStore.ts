import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { z } from "zod";

import { StoreUnavailableError, StoreWriteError } from "../errors.js";
import type { DocumentChunk, MetadataFilters, VectorStore, VectorStoreStats } from "./types.js";

export interface InMemoryVectorStoreOptions {
  readonly collection?: string;
  /** JSON file mirroring the collection. Loaded on connect, rewritten on every write. */
  readonly filePath?: string;
  /** Oldest chunks are evicted beyond this size. */
  readonly maxChunks?: number;
}

const serializedChunkSchema = z.object({
  id: z.string(),
  content: z.string(),
  source_url: z.string(),
  source_title: z.string(),
  metadata: z.record(z.unknown()).default({}),
  embedding: z.array(z.number()),
});

const serializedCollectionSchema = z.object({
  collection: z.string(),
  chunks: z.array(serializedChunkSchema),
});

type SerializedChunk = z.output<typeof serializedChunkSchema>;

interface StoredChunk {
  readonly chunk: DocumentChunk;
  readonly norm: number;
}

/**
 * Brute-force cosine index kept in a Map, optionally mirrored to a JSON file.
 * Suitable for tests and small local corpora; insertion order breaks score
 * ties so rankings are deterministic.
 */
export class InMemoryVectorStore implements VectorStore {
  readonly provider = "memory";
  private readonly collection: string;
  private readonly filePath: string | null;
  private readonly maxChunks: number;
  private readonly records = new Map<string, StoredChunk>();
  private connected = false;

  constructor(options: InMemoryVectorStoreOptions = {}) {
    this.collection = options.collection ?? "default";
    this.filePath = options.filePath ?? null;
    this.maxChunks = Math.max(1, options.maxChunks ?? 10_000);
  }

  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }
    if (this.filePath) {
      await this.loadFromDisk(this.filePath);
    }
    this.connected = true;
  }

  async close(): Promise<void> {
    this.connected = false;
  }

  async upsert(chunk: DocumentChunk): Promise<void> {
    this.assertConnected("upsert");
    const dimensions = this.dimensions();
    if (chunk.embedding.length === 0) {
      throw new StoreWriteError(`chunk ${chunk.id} has no embedding`);
    }
    if (dimensions !== null && chunk.embedding.length !== dimensions && !this.isOnlyRecord(chunk.id)) {
      throw new StoreWriteError(
        `chunk ${chunk.id} has ${chunk.embedding.length} dimensions, collection expects ${dimensions}`,
      );
    }

    const previous = this.records.get(chunk.id);
    const evicted: StoredChunk[] = [];
    this.records.delete(chunk.id);
    this.records.set(chunk.id, { chunk: freezeChunk(chunk), norm: computeNorm(chunk.embedding) });
    for (const [id, stored] of this.records) {
      if (this.records.size <= this.maxChunks) {
        break;
      }
      this.records.delete(id);
      evicted.push(stored);
    }

    try {
      await this.persist();
    } catch (error) {
      // Roll back so the in-memory view matches what is on disk.
      this.records.delete(chunk.id);
      for (const stored of evicted) {
        this.records.set(stored.chunk.id, stored);
      }
      if (previous) {
        this.records.set(chunk.id, previous);
      }
      throw new StoreWriteError(`unable to persist chunk ${chunk.id}`, { cause: error });
    }
  }

  async delete(id: string): Promise<boolean> {
    this.assertConnected("delete");
    const previous = this.records.get(id);
    if (!previous) {
      return false;
    }
    this.records.delete(id);
    try {
      await this.persist();
    } catch (error) {
      this.records.set(id, previous);
      throw new StoreWriteError(`unable to persist deletion of chunk ${id}`, { cause: error });
    }
    return true;
  }

  async queryByEmbedding(
    vector: readonly number[],
    k: number,
    filters?: MetadataFilters,
  ): Promise<Array<{ chunk: DocumentChunk; score: number }>> {
    this.assertConnected("query");
    if (k <= 0) {
      return [];
    }
    const queryNorm = computeNorm(vector);
    const hits: Array<{ chunk: DocumentChunk; score: number }> = [];
    for (const { chunk, norm } of this.records.values()) {
      if (chunk.embedding.length !== vector.length || !matchesFilters(chunk, filters)) {
        continue;
      }
      hits.push({ chunk, score: cosineSimilarity(vector, queryNorm, chunk.embedding, norm) });
    }
    // Array.prototype.sort is stable, so equal scores keep insertion order.
    hits.sort((a, b) => b.score - a.score);
    return hits.slice(0, k);
  }

  async hasSource(url: string): Promise<boolean> {
    this.assertConnected("query");
    for (const { chunk } of this.records.values()) {
      if (chunk.sourceUrl === url) {
        return true;
      }
    }
    return false;
  }

  async stats(): Promise<VectorStoreStats> {
    this.assertConnected("read stats");
    const sources = new Set<string>();
    for (const { chunk } of this.records.values()) {
      sources.add(chunk.sourceUrl);
    }
    return {
      provider: this.provider,
      collection: this.collection,
      totalChunks: this.records.size,
      dimensions: this.dimensions(),
      uniqueSources: sources.size,
      persisted: this.filePath !== null,
    };
  }

  private dimensions(): number | null {
    const first = this.records.values().next().value;
    return first ? first.chunk.embedding.length : null;
  }

  private isOnlyRecord(id: string): boolean {
    return this.records.size === 1 && this.records.has(id);
  }

  private assertConnected(operation: string): void {
    if (!this.connected) {
      throw new StoreUnavailableError(`cannot ${operation}: collection "${this.collection}" is not connected`);
    }
  }

  private async loadFromDisk(filePath: string): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return;
      }
      throw new StoreUnavailableError(`unable to read ${filePath}`, { cause: error });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      throw new StoreUnavailableError(`${filePath} is not valid JSON`, { cause: error });
    }
    const parsed = serializedCollectionSchema.safeParse(payload);
    if (!parsed.success) {
      throw new StoreUnavailableError(`${filePath} does not hold a vector collection`, { cause: parsed.error });
    }

    this.records.clear();
    for (const entry of parsed.data.chunks) {
      const chunk = deserializeChunk(entry);
      this.records.set(chunk.id, { chunk, norm: computeNorm(chunk.embedding) });
    }
  }

  private async persist(): Promise<void> {
    if (!this.filePath) {
      return;
    }
    const serialized = {
      collection: this.collection,
      chunks: Array.from(this.records.values(), ({ chunk }) => serializeChunk(chunk)),
    };
    const tmpPath = `${this.filePath}.tmp`;
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(tmpPath, JSON.stringify(serialized), "utf8");
    await rename(tmpPath, this.filePath);
  }
}

function freezeChunk(chunk: DocumentChunk): DocumentChunk {
  return Object.freeze({
    ...chunk,
    metadata: Object.freeze({ ...chunk.metadata }),
    embedding: Object.freeze([...chunk.embedding]),
  });
}

function serializeChunk(chunk: DocumentChunk): SerializedChunk {
  return {
    id: chunk.id,
    content: chunk.content,
    source_url: chunk.sourceUrl,
    source_title: chunk.sourceTitle,
    metadata: { ...chunk.metadata },
    embedding: [...chunk.embedding],
  };
}

function deserializeChunk(entry: SerializedChunk): DocumentChunk {
  return freezeChunk({
    id: entry.id,
    content: entry.content,
    sourceUrl: entry.source_url,
    sourceTitle: entry.source_title,
    metadata: entry.metadata,
    embedding: entry.embedding,
  });
}

function matchesFilters(chunk: DocumentChunk, filters: MetadataFilters | undefined): boolean {
  if (!filters) {
    return true;
  }
  for (const [key, expected] of Object.entries(filters)) {
    if (chunk.metadata[key] !== expected) {
      return false;
    }
  }
  return true;
}

export function computeNorm(vector: readonly number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

/** Cosine similarity clamped to [0, 1]; zero vectors score 0. */
export function cosineSimilarity(
  query: readonly number[],
  queryNorm: number,
  doc: readonly number[],
  docNorm: number,
): number {
  if (queryNorm === 0 || docNorm === 0) {
    return 0;
  }
  let dot = 0;
  for (let i = 0; i < query.length; i += 1) {
    dot += query[i] * (doc[i] ?? 0);
  }
  const score = dot / (queryNorm * docNorm);
  if (!Number.isFinite(score)) {
    return 0;
  }
  return Math.max(0, Math.min(1, score));
}
