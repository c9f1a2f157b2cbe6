import { performance } from "node:perf_hooks";

import { z } from "zod";

import { readOptionalString, type EnvSource } from "../config/env.js";
import { InvalidConfigError } from "../errors.js";
import type { EngineContext } from "../registry.js";
import { createSourceItem, type EngineSearchOptions, type NormalizedResult, type SearchEngine } from "../types.js";
import { cleanSnippet, requestJson } from "./http.js";

const BRAVE_MAX_COUNT = 20;

export const braveConfigSchema = z
  .object({
    /** Falls back to `BRAVE_API_KEY`. */
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().default("https://api.search.brave.com"),
    country: z.string().length(2).optional(),
    searchLang: z.string().optional(),
    safeSearch: z.enum(["off", "moderate", "strict"]).default("moderate"),
    /** `pd`, `pw`, `pm`, `py` or a `YYYY-MM-DDtoYYYY-MM-DD` range. */
    freshness: z.string().optional(),
    timeoutMs: z.number().int().positive().default(15_000),
    maxRetries: z.number().int().min(0).max(5).default(1),
  })
  .strict();

export type BraveConfig = z.output<typeof braveConfigSchema>;

const runtimeOptionsSchema = z
  .object({
    country: z.string().optional(),
    searchLang: z.string().optional(),
    safeSearch: z.enum(["off", "moderate", "strict"]).optional(),
    freshness: z.string().optional(),
  })
  .passthrough();

const braveResponseSchema = z
  .object({
    query: z.object({ original: z.string().optional() }).passthrough().optional(),
    web: z
      .object({
        results: z
          .array(
            z
              .object({
                url: z.string(),
                title: z.string().nullish(),
                description: z.string().nullish(),
                extra_snippets: z.array(z.string()).optional(),
              })
              .passthrough(),
          )
          .default([]),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export function isBraveAvailable(env: EnvSource): boolean {
  return readOptionalString("BRAVE_API_KEY", env) !== undefined;
}

/** Adapter for the Brave Search web API. */
export class BraveEngine implements SearchEngine {
  readonly name = "brave";
  private readonly config: BraveConfig;
  private readonly apiKey: string;
  private readonly fetchImpl: typeof fetch;

  constructor(config: BraveConfig, context: EngineContext) {
    const apiKey = config.apiKey ?? readOptionalString("BRAVE_API_KEY", context.env);
    if (!apiKey) {
      throw new InvalidConfigError('engine "brave"', "an API key is required (config.apiKey or BRAVE_API_KEY)");
    }
    this.config = config;
    this.apiKey = apiKey;
    this.fetchImpl = context.fetch;
  }

  describeConfig(): Record<string, unknown> {
    const { apiKey: _secret, ...rest } = this.config;
    return rest;
  }

  async search(query: string, options: EngineSearchOptions): Promise<NormalizedResult> {
    const startedAt = performance.now();
    const runtime = runtimeOptionsSchema.parse(options);

    const url = new URL("/res/v1/web/search", this.config.baseUrl);
    url.searchParams.set("q", query);
    url.searchParams.set("count", String(Math.min(options.maxResults, BRAVE_MAX_COUNT)));
    url.searchParams.set("safesearch", runtime.safeSearch ?? this.config.safeSearch);
    const country = runtime.country ?? this.config.country;
    if (country) {
      url.searchParams.set("country", country);
    }
    const searchLang = runtime.searchLang ?? this.config.searchLang;
    if (searchLang) {
      url.searchParams.set("search_lang", searchLang);
    }
    const freshness = runtime.freshness ?? this.config.freshness;
    if (freshness) {
      url.searchParams.set("freshness", freshness);
    }

    const payload = await requestJson(this.fetchImpl, {
      engine: this.name,
      url,
      init: {
        method: "GET",
        headers: {
          Accept: "application/json",
          "X-Subscription-Token": this.apiKey,
        },
      },
      schema: braveResponseSchema,
      timeoutMs: this.config.timeoutMs,
      signal: options.signal,
      maxRetries: this.config.maxRetries,
    });

    const results = payload.web?.results ?? [];
    return {
      query,
      answer: null,
      images: [],
      sources: results.slice(0, options.maxResults).map((result) =>
        createSourceItem({
          url: result.url,
          title: cleanSnippet(result.title),
          content: cleanSnippet(result.description),
          rawContent: result.extra_snippets && result.extra_snippets.length > 0 ? result.extra_snippets.join("\n") : null,
        }),
      ),
      responseTimeMs: performance.now() - startedAt,
      rawResponse: payload,
    };
  }
}
