import { performance } from "node:perf_hooks";

import { z } from "zod";

import { readOptionalString, type EnvSource } from "../config/env.js";
import { InvalidConfigError } from "../errors.js";
import type { EngineContext } from "../registry.js";
import { createSourceItem, type EngineSearchOptions, type NormalizedResult, type SearchEngine } from "../types.js";
import { requestJson } from "./http.js";

const TAVILY_MAX_RESULTS = 20;

export const tavilyConfigSchema = z
  .object({
    /** Falls back to `TAVILY_API_KEY`. */
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().default("https://api.tavily.com"),
    searchDepth: z.enum(["basic", "advanced"]).default("basic"),
    topic: z.enum(["general", "news"]).default("general"),
    includeAnswer: z.boolean().default(true),
    includeImages: z.boolean().default(false),
    includeRawContent: z.boolean().default(false),
    includeDomains: z.array(z.string()).default([]),
    excludeDomains: z.array(z.string()).default([]),
    timeoutMs: z.number().int().positive().default(20_000),
  })
  .strict();

export type TavilyConfig = z.output<typeof tavilyConfigSchema>;

const runtimeOptionsSchema = z
  .object({
    searchDepth: z.enum(["basic", "advanced"]).optional(),
    topic: z.enum(["general", "news"]).optional(),
    includeDomains: z.array(z.string()).optional(),
    excludeDomains: z.array(z.string()).optional(),
    includeImages: z.boolean().optional(),
    includeRawContent: z.boolean().optional(),
  })
  .passthrough();

const tavilyResponseSchema = z
  .object({
    query: z.string().optional(),
    answer: z.string().nullish(),
    images: z.array(z.union([z.string(), z.object({ url: z.string() }).passthrough()])).default([]),
    results: z
      .array(
        z
          .object({
            url: z.string(),
            title: z.string().nullish(),
            content: z.string().nullish(),
            score: z.number().nullish(),
            raw_content: z.string().nullish(),
          })
          .passthrough(),
      )
      .default([]),
  })
  .passthrough();

export function isTavilyAvailable(env: EnvSource): boolean {
  return readOptionalString("TAVILY_API_KEY", env) !== undefined;
}

/** Adapter for the Tavily search API, an AI-answer engine returning scored sources. */
export class TavilyEngine implements SearchEngine {
  readonly name = "tavily";
  private readonly config: TavilyConfig;
  private readonly apiKey: string;
  private readonly fetchImpl: typeof fetch;

  constructor(config: TavilyConfig, context: EngineContext) {
    const apiKey = config.apiKey ?? readOptionalString("TAVILY_API_KEY", context.env);
    if (!apiKey) {
      throw new InvalidConfigError('engine "tavily"', "an API key is required (config.apiKey or TAVILY_API_KEY)");
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

    const body = {
      query,
      max_results: Math.min(options.maxResults, TAVILY_MAX_RESULTS),
      search_depth: runtime.searchDepth ?? this.config.searchDepth,
      topic: runtime.topic ?? this.config.topic,
      include_answer: this.config.includeAnswer,
      include_images: runtime.includeImages ?? this.config.includeImages,
      include_raw_content: runtime.includeRawContent ?? this.config.includeRawContent,
      include_domains: runtime.includeDomains ?? this.config.includeDomains,
      exclude_domains: runtime.excludeDomains ?? this.config.excludeDomains,
    };

    const payload = await requestJson(this.fetchImpl, {
      engine: this.name,
      url: new URL("/search", this.config.baseUrl),
      init: {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
      },
      schema: tavilyResponseSchema,
      timeoutMs: this.config.timeoutMs,
      signal: options.signal,
    });

    return {
      query,
      answer: payload.answer ?? null,
      images: payload.images.map((image) => (typeof image === "string" ? image : image.url)),
      sources: payload.results.slice(0, options.maxResults).map((result) =>
        createSourceItem({
          url: result.url,
          title: result.title,
          content: result.content,
          score: result.score,
          rawContent: result.raw_content,
        }),
      ),
      responseTimeMs: performance.now() - startedAt,
      rawResponse: payload,
    };
  }
}
