/**
 * Contracts of the semantic layer: the stored chunk shape and the two
 * capabilities the coordinator consumes (vector store and embedding model).
 */
import type { NormalizedResult } from "../types.js";

/** Scalar metadata values accepted by the store filters. */
export type MetadataValue = string | number | boolean | null;

export type ChunkMetadata = Readonly<Record<string, unknown>>;

/** Equality filters applied to chunk metadata. Every key must match. */
export type MetadataFilters = Readonly<Record<string, MetadataValue>>;

/**
 * Unit of stored text. Chunks are never mutated once created: an update is a
 * delete followed by an insert.
 */
export interface DocumentChunk {
  readonly id: string;
  readonly content: string;
  readonly sourceUrl: string;
  readonly sourceTitle: string;
  readonly metadata: ChunkMetadata;
  /** Empty for web pseudo-chunks that were never embedded. */
  readonly embedding: readonly number[];
}

export type ChunkOrigin = "local" | "web";

export interface ScoredChunk {
  readonly chunk: DocumentChunk;
  readonly score: number;
  readonly origin: ChunkOrigin;
}

/** Answer of {@link SemanticSearchCoordinator.search}. */
export interface SemanticSearchResult {
  readonly query: string;
  /** Always `localResults + webResults`, and the length of `chunks`. */
  readonly totalResults: number;
  readonly localResults: number;
  readonly webResults: number;
  readonly chunks: readonly ScoredChunk[];
  readonly searchTimeMs: number;
}

export interface VectorStoreStats {
  readonly provider: string;
  readonly collection: string;
  readonly totalChunks: number;
  readonly dimensions: number | null;
  readonly [extra: string]: unknown;
}

/** Capability implemented by vector store backends. */
export interface VectorStore {
  readonly provider: string;
  connect(): Promise<void>;
  close(): Promise<void>;
  /** Inserts the chunk, replacing any chunk with the same id. All or nothing. */
  upsert(chunk: DocumentChunk): Promise<void>;
  /** Nearest chunks first, at most `k`. */
  queryByEmbedding(
    vector: readonly number[],
    k: number,
    filters?: MetadataFilters,
  ): Promise<Array<{ chunk: DocumentChunk; score: number }>>;
  hasSource(url: string): Promise<boolean>;
  stats(): Promise<VectorStoreStats>;
}

/** Capability implemented by embedding models. */
export interface Embedder {
  readonly model: string;
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}

export interface WebSearchRequest {
  readonly limit: number;
}

/** Where the coordinator gets live results from: one adapter or the orchestrator. */
export interface WebSearchSource {
  readonly name: string;
  search(query: string, request: WebSearchRequest): Promise<NormalizedResult>;
}
