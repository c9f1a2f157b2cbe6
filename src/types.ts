/**
 * Core contracts shared by the registry, the orchestrator and the merger. The
 * shapes are engine agnostic: every adapter converts its wire format into a
 * {@link NormalizedResult} before handing it over.
 */
import type { EngineError, EngineFailure } from "./errors.js";

/** Single hit returned by an engine. Frozen by the adapter that produced it. */
export interface SourceItem {
  /** Identity key across engines. Not necessarily unique inside one engine's list. */
  readonly url: string;
  readonly title: string;
  /** Snippet or extracted text. */
  readonly content: string;
  /** Engine provided relevance, when the engine exposes one. */
  readonly score: number | null;
  /** Full page text when the engine returns it. */
  readonly rawContent: string | null;
}

/**
 * Normalised answer of one engine. `sources` keeps the engine's ranking
 * (best first) and is never reordered once produced.
 */
export interface NormalizedResult {
  readonly query: string;
  /** Direct answer produced by AI-answer engines. */
  readonly answer: string | null;
  readonly images: readonly string[];
  readonly sources: readonly SourceItem[];
  readonly responseTimeMs: number;
  /** Engine payload kept verbatim for diagnostics. */
  readonly rawResponse: unknown;
}

/** Options handed to {@link SearchEngine.search}. */
export interface EngineSearchOptions {
  readonly maxResults: number;
  /** Aborted once the orchestrator deadline elapses. */
  readonly signal?: AbortSignal;
  /** Engine specific runtime overrides forwarded verbatim. */
  readonly [option: string]: unknown;
}

/** Capability implemented by every search backend adapter. */
export interface SearchEngine {
  readonly name: string;
  search(query: string, options: EngineSearchOptions): Promise<NormalizedResult>;
  /** Effective adapter configuration, secrets excluded. */
  describeConfig?(): Record<string, unknown>;
}

/** Transient record produced for each engine of an orchestrated search. */
export interface EngineOutcome {
  readonly engine: string;
  readonly result: NormalizedResult | null;
  readonly error: EngineError | null;
  readonly elapsedMs: number;
}

/** Result of a multi-engine search. */
export interface MergedResult extends NormalizedResult {
  /** Mapping engine name → raw payload of that engine. */
  readonly rawResponse: Readonly<Record<string, unknown>>;
  /** Engines whose results took part in the merge, in configuration order. */
  readonly engines: readonly string[];
  /** Engines dropped because they failed while `failSilently` was on. */
  readonly failures: readonly EngineFailure[];
}

export type ContentFormat = "markdown" | "html" | "text";

/** Options accepted by {@link PageContentFetcher.fetch}. */
export interface PageFetchOptions {
  readonly contentFormat?: ContentFormat;
  readonly depth?: number;
  readonly wordCountThreshold?: number;
  readonly externalLinks?: boolean;
  readonly adaptiveCrawl?: boolean;
  /** CSS selector the crawler waits for before extracting. */
  readonly waitFor?: string | null;
  readonly screenshot?: boolean;
  readonly bypassCache?: boolean;
  readonly onlyText?: boolean;
}

/**
 * Page content extraction capability backed by an external crawling engine.
 * The library only consumes it; no implementation ships here.
 */
export interface PageContentFetcher {
  fetch(url: string, options?: PageFetchOptions): Promise<string>;
}

/** Freezes a source item so downstream consumers cannot alter adapter output. */
export function createSourceItem(input: {
  url: string;
  title?: string | null;
  content?: string | null;
  score?: number | null;
  rawContent?: string | null;
}): SourceItem {
  return Object.freeze({
    url: input.url,
    title: input.title ?? "",
    content: input.content ?? "",
    score: typeof input.score === "number" && Number.isFinite(input.score) ? input.score : null,
    rawContent: input.rawContent ?? null,
  });
}
