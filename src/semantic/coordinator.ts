import { createHash, randomUUID } from "node:crypto";
import { performance } from "node:perf_hooks";

import pLimit from "p-limit";
import { z } from "zod";

import {
  EmbeddingError,
  EngineCallError,
  InvalidConfigError,
  InvalidQueryError,
  NotConnectedError,
  PolysearchError,
  StoreUnavailableError,
  StoreWriteError,
  describeError,
} from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { SearchMetricsRecorder } from "../metrics.js";
import type { NormalizedResult, PageContentFetcher, PageFetchOptions } from "../types.js";
import { QueryResultCache, buildCacheKey } from "./cache.js";
import type {
  DocumentChunk,
  Embedder,
  MetadataFilters,
  ScoredChunk,
  SemanticSearchResult,
  VectorStore,
  VectorStoreStats,
  WebSearchSource,
} from "./types.js";

const HOUR_MS = 60 * 60 * 1_000;

export const semanticConfigSchema = z
  .object({
    vectorStoreProvider: z.string().trim().min(1).default("memory"),
    collectionName: z.string().trim().min(1).default("polysearch"),
    embeddingModel: z.string().trim().min(1).default("hashing"),
    /** Default `limit` of {@link SemanticSearchCoordinator.search}. */
    localSearchLimit: z.number().int().min(1).max(200).default(10),
    webSearchLimit: z.number().int().min(1).max(50).default(5),
    /** Fewer local chunks than this triggers the web fallback. */
    fallbackThreshold: z.number().int().min(0).default(3),
    enableCaching: z.boolean().default(true),
    cacheTtlHours: z.number().positive().default(24),
    autoStoreWebResults: z.boolean().default(true),
    /** Score given to web hits whose engine exposes none. */
    webResultScore: z.number().min(0).max(1).default(0.5),
    autoStoreConcurrency: z.number().int().min(1).max(16).default(4),
  })
  .strict();

export type SemanticSearchConfig = z.output<typeof semanticConfigSchema>;
export type SemanticSearchConfigInput = z.input<typeof semanticConfigSchema>;

export interface SemanticSearchCoordinatorOptions {
  readonly store: VectorStore;
  readonly embedder: Embedder;
  /** Live source used for the fallback. Without one the fallback is skipped. */
  readonly webSource?: WebSearchSource;
  /** Fills web hits that arrive without text before they are stored. */
  readonly contentFetcher?: PageContentFetcher;
  readonly contentFetchOptions?: PageFetchOptions;
  readonly config?: SemanticSearchConfigInput;
  readonly logger?: StructuredLogger;
  readonly metrics?: SearchMetricsRecorder;
  /** Wall clock driving cache expiry. */
  readonly now?: () => number;
}

export interface SemanticSearchOptions {
  readonly limit?: number;
  readonly forceWebSearch?: boolean;
  readonly filters?: MetadataFilters;
}

/**
 * Answers a query from the local vector store and falls back to live web
 * search when the store holds too few matches. Owns its result cache and the
 * store connection; nothing here is shared between instances.
 */
export class SemanticSearchCoordinator {
  private readonly store: VectorStore;
  private readonly embedder: Embedder;
  private readonly webSource: WebSearchSource | null;
  private readonly contentFetcher: PageContentFetcher | null;
  private readonly contentFetchOptions: PageFetchOptions;
  private readonly config: SemanticSearchConfig;
  private readonly cache: QueryResultCache<SemanticSearchResult>;
  private readonly logger?: StructuredLogger;
  private readonly metrics?: SearchMetricsRecorder;
  private connected = false;

  constructor(options: SemanticSearchCoordinatorOptions) {
    const parsed = semanticConfigSchema.safeParse(options.config ?? {});
    if (!parsed.success) {
      throw new InvalidConfigError("semantic search", parsed.error.message, parsed.error.issues, {
        cause: parsed.error,
      });
    }
    this.config = parsed.data;
    this.store = options.store;
    this.embedder = options.embedder;
    this.webSource = options.webSource ?? null;
    this.contentFetcher = options.contentFetcher ?? null;
    this.contentFetchOptions = options.contentFetchOptions ?? { contentFormat: "text", onlyText: true };
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.cache = new QueryResultCache({ ttlMs: this.config.cacheTtlHours * HOUR_MS, now: options.now });
  }

  isConnected(): boolean {
    return this.connected;
  }

  getConfig(): SemanticSearchConfig {
    return { ...this.config };
  }

  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }
    try {
      await this.store.connect();
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      throw new StoreUnavailableError(`vector store "${this.store.provider}" cannot be reached`, { cause: error });
    }
    this.connected = true;
    this.logger?.info("semantic_coordinator_connected", {
      provider: this.store.provider,
      collection: this.config.collectionName,
      embedding_model: this.embedder.model,
    });
  }

  async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }
    this.connected = false;
    await this.store.close();
    this.logger?.info("semantic_coordinator_disconnected", { provider: this.store.provider });
  }

  async search(query: string, options: SemanticSearchOptions = {}): Promise<SemanticSearchResult> {
    this.assertConnected("search");
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      throw new InvalidQueryError("Search queries must be non-empty");
    }
    const limit = options.limit ?? this.config.localSearchLimit;
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new InvalidQueryError(`limit must be a positive integer, received ${limit}`);
    }
    const forceWebSearch = options.forceWebSearch ?? false;

    const cacheKey = buildCacheKey(trimmed, limit, options.filters);
    if (this.config.enableCaching) {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        this.logger?.debug("semantic_cache_hit", { query: trimmed, limit });
        return cached;
      }
    }

    const startedAt = performance.now();
    const queryVector = await this.embed(trimmed);
    const local = await this.queryLocal(queryVector, limit, options.filters);

    const needsWeb = forceWebSearch || local.length < this.config.fallbackThreshold;
    const web = needsWeb ? await this.searchWeb(trimmed, local, forceWebSearch) : [];

    const ordered = forceWebSearch ? [...web, ...local] : [...local, ...web];
    const chunks = ordered.slice(0, limit);
    const localResults = chunks.filter((entry) => entry.origin === "local").length;
    const webResults = chunks.length - localResults;

    if (this.config.autoStoreWebResults && web.length > 0) {
      await this.storeWebChunks(web);
    }

    const result: SemanticSearchResult = Object.freeze({
      query: trimmed,
      totalResults: chunks.length,
      localResults,
      webResults,
      chunks: Object.freeze(chunks),
      searchTimeMs: performance.now() - startedAt,
    });

    if (this.config.enableCaching) {
      this.cache.set(cacheKey, result);
    }
    this.logger?.info("semantic_search_completed", {
      query: trimmed,
      local_results: localResults,
      web_results: webResults,
      search_time_ms: Math.round(result.searchTimeMs),
    });
    return result;
  }

  /** Embeds and persists one document. Either the chunk is stored or an error is thrown. */
  async storeDocument(
    content: string,
    sourceUrl: string,
    sourceTitle: string,
    metadata: Readonly<Record<string, unknown>> = {},
  ): Promise<DocumentChunk> {
    this.assertConnected("store documents");
    if (content.trim().length === 0) {
      throw new StoreWriteError("document content must be non-empty");
    }
    const embedding = await this.embed(content);
    const chunk: DocumentChunk = Object.freeze({
      id: randomUUID(),
      content,
      sourceUrl,
      sourceTitle,
      metadata: Object.freeze({ ...metadata }),
      embedding: Object.freeze(embedding),
    });
    await this.upsert(chunk);
    this.logger?.debug("semantic_document_stored", { id: chunk.id, source_url: sourceUrl });
    return chunk;
  }

  async getStats(): Promise<VectorStoreStats> {
    this.assertConnected("read statistics");
    try {
      return await this.store.stats();
    } catch (error) {
      if (error instanceof PolysearchError) {
        throw error;
      }
      throw new StoreUnavailableError(`vector store "${this.store.provider}" did not report statistics`, {
        cause: error,
      });
    }
  }

  clearCache(): void {
    const evicted = this.cache.size();
    this.cache.clear();
    this.logger?.debug("semantic_cache_cleared", { evicted });
  }

  cacheSize(): number {
    return this.cache.size();
  }

  private assertConnected(operation: string): void {
    if (!this.connected) {
      throw new NotConnectedError(operation);
    }
  }

  private async embed(text: string): Promise<number[]> {
    const run = async () => {
      try {
        return await this.embedder.embed(text);
      } catch (error) {
        if (error instanceof EmbeddingError) {
          throw error;
        }
        throw new EmbeddingError(`model "${this.embedder.model}" failed: ${describeError(error)}`, { cause: error });
      }
    };
    return this.metrics ? this.metrics.measure("embed", run) : run();
  }

  private async queryLocal(vector: number[], limit: number, filters?: MetadataFilters): Promise<ScoredChunk[]> {
    const run = async () => {
      try {
        return await this.store.queryByEmbedding(vector, limit, filters);
      } catch (error) {
        if (error instanceof PolysearchError) {
          throw error;
        }
        throw new StoreUnavailableError(`vector store "${this.store.provider}" query failed`, { cause: error });
      }
    };
    const hits = this.metrics ? await this.metrics.measure("vectorQuery", run) : await run();
    return hits
      .map((hit): ScoredChunk => ({ chunk: hit.chunk, score: hit.score, origin: "local" }))
      .sort((a, b) => b.score - a.score);
  }

  /**
   * Fetches live results and turns them into pseudo-chunks. Hits whose URL is
   * already among the local chunks, or repeated within the web answer, are
   * dropped. Failures of the source propagate as typed errors.
   */
  private async searchWeb(query: string, local: readonly ScoredChunk[], forced: boolean): Promise<ScoredChunk[]> {
    const source = this.webSource;
    if (!source) {
      this.logger?.debug("web_fallback_unavailable", { query, local_results: local.length });
      return [];
    }
    this.logger?.info("web_fallback_triggered", {
      query,
      source: source.name,
      local_results: local.length,
      forced,
    });

    const run = async (): Promise<NormalizedResult> => {
      try {
        return await source.search(query, { limit: this.config.webSearchLimit });
      } catch (error) {
        if (error instanceof PolysearchError) {
          throw error;
        }
        throw new EngineCallError(source.name, describeError(error), { cause: error });
      }
    };
    const response = this.metrics ? await this.metrics.measure("webFallback", run, source.name) : await run();

    const seen = new Set(local.map((entry) => entry.chunk.sourceUrl));
    const chunks: ScoredChunk[] = [];
    for (const item of response.sources) {
      if (chunks.length >= this.config.webSearchLimit) {
        break;
      }
      if (seen.has(item.url)) {
        continue;
      }
      seen.add(item.url);
      chunks.push({
        chunk: Object.freeze({
          id: `web:${createHash("sha256").update(item.url).digest("hex").slice(0, 16)}`,
          content: item.content || item.rawContent || "",
          sourceUrl: item.url,
          sourceTitle: item.title,
          metadata: Object.freeze({ origin: "web", engine: source.name }),
          embedding: Object.freeze([]),
        }),
        score: item.score ?? this.config.webResultScore,
        origin: "web",
      });
    }
    return chunks;
  }

  /** Best effort: every failure is logged and the search carries on. */
  private async storeWebChunks(candidates: readonly ScoredChunk[]): Promise<void> {
    const limit = pLimit(this.config.autoStoreConcurrency);
    const outcomes = await Promise.all(
      candidates.map((candidate) =>
        limit(async (): Promise<"stored" | "skipped" | "failed"> => {
          const { chunk } = candidate;
          try {
            if (await this.store.hasSource(chunk.sourceUrl)) {
              return "skipped";
            }
            const content =
              chunk.content.trim().length === 0 ? await this.fetchPageContent(chunk.sourceUrl) : chunk.content;
            if (content.trim().length === 0) {
              return "skipped";
            }
            const embedding = await this.embed(content);
            await this.upsert({ ...chunk, id: randomUUID(), content, embedding });
            return "stored";
          } catch (error) {
            this.logger?.warn("auto_store_failed", { source_url: chunk.sourceUrl, message: describeError(error) });
            return "failed";
          }
        }),
      ),
    );
    this.logger?.debug("web_results_stored", {
      stored: outcomes.filter((outcome) => outcome === "stored").length,
      skipped: outcomes.filter((outcome) => outcome === "skipped").length,
      failed: outcomes.filter((outcome) => outcome === "failed").length,
    });
  }

  /** Page text from the content fetcher, or "" when none is configured or the fetch fails. */
  private async fetchPageContent(url: string): Promise<string> {
    const fetcher = this.contentFetcher;
    if (!fetcher) {
      return "";
    }
    try {
      return await fetcher.fetch(url, this.contentFetchOptions);
    } catch (error) {
      this.logger?.warn("web_content_fetch_failed", { source_url: url, message: describeError(error) });
      return "";
    }
  }

  private async upsert(chunk: DocumentChunk): Promise<void> {
    const run = async () => {
      try {
        await this.store.upsert(chunk);
      } catch (error) {
        if (error instanceof StoreWriteError) {
          throw error;
        }
        throw new StoreWriteError(`vector store "${this.store.provider}" rejected chunk ${chunk.id}`, { cause: error });
      }
    };
    await (this.metrics ? this.metrics.measure("vectorUpsert", run) : run());
  }
}
