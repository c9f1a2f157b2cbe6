import { performance } from "node:perf_hooks";

import { z } from "zod";

import { readOptionalString, type EnvSource } from "../config/env.js";
import { InvalidConfigError } from "../errors.js";
import type { EngineContext } from "../registry.js";
import { createSourceItem, type EngineSearchOptions, type NormalizedResult, type SearchEngine, type SourceItem } from "../types.js";
import { cleanSnippet, requestJson } from "./http.js";

/** SearxNG caps `count` server side; larger values are ignored. */
const MAX_COUNT = 20;

export const searxngConfigSchema = z
  .object({
    /** Instance base URL. Falls back to `SEARX_HOST`. */
    host: z.string().url().optional(),
    apiPath: z.string().default("/search"),
    engines: z.array(z.string()).default([]),
    categories: z.array(z.string()).default(["general"]),
    language: z.string().optional(),
    safeSearch: z.union([z.literal(0), z.literal(1), z.literal(2)]).optional(),
    authToken: z.string().optional(),
    timeoutMs: z.number().int().positive().default(15_000),
    maxRetries: z.number().int().min(0).max(10).default(2),
  })
  .strict();

export type SearxngConfig = z.output<typeof searxngConfigSchema>;

const searxResultSchema = z
  .object({
    url: z.string(),
    title: z.string().nullish(),
    content: z.string().nullish(),
    score: z.number().nullish(),
    img_src: z.string().nullish(),
    category: z.string().nullish(),
  })
  .passthrough();

// Instances add answers/infoboxes/suggestions depending on enabled plugins.
const searxResponseSchema = z
  .object({
    query: z.string().optional(),
    results: z.array(z.unknown()).default([]),
    answers: z.array(z.union([z.string(), z.object({ answer: z.string() }).passthrough()])).default([]),
  })
  .passthrough();

/** Runtime overrides understood by {@link SearxngEngine.search}. */
interface SearxRuntimeOptions {
  readonly engines?: readonly string[];
  readonly categories?: readonly string[];
  readonly language?: string;
  readonly safeSearch?: 0 | 1 | 2;
  readonly querySuffix?: string;
}

const runtimeOptionsSchema = z
  .object({
    engines: z.array(z.string()).optional(),
    categories: z.array(z.string()).optional(),
    language: z.string().optional(),
    safeSearch: z.union([z.literal(0), z.literal(1), z.literal(2)]).optional(),
    querySuffix: z.string().optional(),
  })
  .passthrough();

export function isSearxngAvailable(env: EnvSource): boolean {
  return readOptionalString("SEARX_HOST", env) !== undefined;
}

/** Adapter for a self-hosted SearxNG metasearch instance (JSON output format). */
export class SearxngEngine implements SearchEngine {
  readonly name = "searxng";
  private readonly config: SearxngConfig;
  private readonly host: string;
  private readonly fetchImpl: typeof fetch;

  constructor(config: SearxngConfig, context: EngineContext) {
    const host = config.host ?? readOptionalString("SEARX_HOST", context.env);
    if (!host) {
      throw new InvalidConfigError('engine "searxng"', "a host is required (config.host or SEARX_HOST)");
    }
    this.config = { ...config, authToken: config.authToken ?? readOptionalString("SEARX_AUTH_TOKEN", context.env) };
    this.host = host;
    this.fetchImpl = context.fetch;
  }

  describeConfig(): Record<string, unknown> {
    const { authToken: _secret, ...rest } = this.config;
    return { ...rest, host: this.host };
  }

  async search(query: string, options: EngineSearchOptions): Promise<NormalizedResult> {
    const startedAt = performance.now();
    const runtime: SearxRuntimeOptions = runtimeOptionsSchema.parse(options);
    const engines = runtime.engines && runtime.engines.length > 0 ? runtime.engines : this.config.engines;
    const categories =
      runtime.categories && runtime.categories.length > 0 ? runtime.categories : this.config.categories;
    const language = runtime.language ?? this.config.language;
    const safeSearch = runtime.safeSearch ?? this.config.safeSearch;
    const fullQuery = runtime.querySuffix ? `${query} ${runtime.querySuffix}` : query;

    const url = new URL(this.config.apiPath, this.host);
    const params = new URLSearchParams({ q: fullQuery, format: "json" });
    if (categories.length > 0) {
      params.set("categories", categories.join(","));
    }
    if (engines.length > 0) {
      params.set("engines", engines.join(","));
    }
    params.set("count", String(Math.min(options.maxResults, MAX_COUNT)));
    if (language) {
      params.set("language", language);
    }
    if (safeSearch !== undefined) {
      params.set("safesearch", String(safeSearch));
    }
    url.search = params.toString();

    const headers = new Headers({ Accept: "application/json" });
    if (this.config.authToken) {
      headers.set("Authorization", `Bearer ${this.config.authToken}`);
    }

    const payload = await requestJson(this.fetchImpl, {
      engine: this.name,
      url,
      init: { method: "GET", headers },
      schema: searxResponseSchema,
      timeoutMs: this.config.timeoutMs,
      signal: options.signal,
      maxRetries: this.config.maxRetries,
    });

    const sources: SourceItem[] = [];
    const images: string[] = [];
    for (const entry of payload.results) {
      const parsed = searxResultSchema.safeParse(entry);
      // Engines occasionally emit entries without a usable URL; skip them.
      if (!parsed.success || !/^https?:\/\//i.test(parsed.data.url)) {
        continue;
      }
      const result = parsed.data;
      if (result.category === "images" && result.img_src) {
        images.push(result.img_src);
        continue;
      }
      if (sources.length < options.maxResults) {
        sources.push(
          createSourceItem({
            url: result.url,
            title: result.title ?? "",
            content: cleanSnippet(result.content),
            score: result.score ?? null,
          }),
        );
      }
    }

    const [firstAnswer] = payload.answers;
    const answer = typeof firstAnswer === "string" ? firstAnswer : firstAnswer?.answer ?? null;

    return {
      query,
      answer,
      images,
      sources,
      responseTimeMs: performance.now() - startedAt,
      rawResponse: payload,
    };
  }
}
