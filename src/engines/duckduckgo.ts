import { performance } from "node:perf_hooks";

import { z } from "zod";

import type { EngineContext } from "../registry.js";
import { createSourceItem, type EngineSearchOptions, type NormalizedResult, type SearchEngine, type SourceItem } from "../types.js";
import { cleanSnippet, requestJson } from "./http.js";

export const duckduckgoConfigSchema = z
  .object({
    baseUrl: z.string().url().default("https://api.duckduckgo.com"),
    /** Region code such as `us-en` or `fr-fr`. */
    region: z.string().optional(),
    safeSearch: z.enum(["strict", "moderate", "off"]).default("moderate"),
    timeoutMs: z.number().int().positive().default(10_000),
    maxRetries: z.number().int().min(0).max(5).default(1),
  })
  .strict();

export type DuckDuckGoConfig = z.output<typeof duckduckgoConfigSchema>;

const SAFE_SEARCH_PARAM: Record<DuckDuckGoConfig["safeSearch"], string> = {
  strict: "1",
  moderate: "-1",
  off: "-2",
};

const runtimeOptionsSchema = z
  .object({
    region: z.string().optional(),
    safeSearch: z.enum(["strict", "moderate", "off"]).optional(),
  })
  .passthrough();

const topicSchema = z
  .object({
    FirstURL: z.string().optional(),
    Text: z.string().optional(),
    Result: z.string().optional(),
  })
  .passthrough();

type Topic = z.output<typeof topicSchema>;

// RelatedTopics mixes plain topics with named groups holding nested topics.
const topicGroupSchema = z.object({ Name: z.string(), Topics: z.array(topicSchema) }).passthrough();

const instantAnswerSchema = z
  .object({
    Heading: z.string().default(""),
    Answer: z.union([z.string(), z.record(z.unknown())]).default(""),
    AbstractText: z.string().default(""),
    AbstractURL: z.string().default(""),
    AbstractSource: z.string().default(""),
    Image: z.string().default(""),
    Results: z.array(topicSchema).default([]),
    RelatedTopics: z.array(z.unknown()).default([]),
  })
  .passthrough();

/**
 * Adapter for the DuckDuckGo Instant Answer API. It needs no credentials and
 * is therefore always available, but it only returns topic summaries rather
 * than full web results.
 */
export class DuckDuckGoEngine implements SearchEngine {
  readonly name = "duckduckgo";
  private readonly config: DuckDuckGoConfig;
  private readonly fetchImpl: typeof fetch;

  constructor(config: DuckDuckGoConfig, context: EngineContext) {
    this.config = config;
    this.fetchImpl = context.fetch;
  }

  describeConfig(): Record<string, unknown> {
    return { ...this.config };
  }

  async search(query: string, options: EngineSearchOptions): Promise<NormalizedResult> {
    const startedAt = performance.now();
    const runtime = runtimeOptionsSchema.parse(options);

    const url = new URL("/", this.config.baseUrl);
    url.searchParams.set("q", query);
    url.searchParams.set("format", "json");
    url.searchParams.set("no_html", "1");
    url.searchParams.set("skip_disambig", "1");
    url.searchParams.set("kp", SAFE_SEARCH_PARAM[runtime.safeSearch ?? this.config.safeSearch]);
    const region = runtime.region ?? this.config.region;
    if (region) {
      url.searchParams.set("kl", region);
    }

    // The API labels its JSON as `application/x-javascript`.
    const payload = await requestJson(this.fetchImpl, {
      engine: this.name,
      url,
      init: { method: "GET", headers: { Accept: "application/json" } },
      schema: instantAnswerSchema,
      timeoutMs: this.config.timeoutMs,
      signal: options.signal,
      maxRetries: this.config.maxRetries,
      lenientContentType: true,
    });

    const sources: SourceItem[] = [];
    const seen = new Set<string>();
    const push = (url: string, title: string, content: string) => {
      if (sources.length >= options.maxResults || !url || seen.has(url)) {
        return;
      }
      seen.add(url);
      sources.push(createSourceItem({ url, title, content }));
    };

    if (payload.AbstractURL) {
      push(payload.AbstractURL, payload.Heading || payload.AbstractSource, payload.AbstractText);
    }
    for (const topic of payload.Results) {
      pushTopic(topic, push);
    }
    for (const entry of payload.RelatedTopics) {
      const group = topicGroupSchema.safeParse(entry);
      if (group.success) {
        for (const topic of group.data.Topics) {
          pushTopic(topic, push);
        }
        continue;
      }
      const topic = topicSchema.safeParse(entry);
      if (topic.success) {
        pushTopic(topic.data, push);
      }
    }

    const answerText = typeof payload.Answer === "string" ? payload.Answer : "";
    const answer = answerText.trim() || payload.AbstractText.trim() || null;

    return {
      query,
      answer,
      images: payload.Image ? [new URL(payload.Image, this.config.baseUrl).toString()] : [],
      sources,
      responseTimeMs: performance.now() - startedAt,
      rawResponse: payload,
    };
  }
}

function pushTopic(topic: Topic, push: (url: string, title: string, content: string) => void): void {
  if (!topic.FirstURL) {
    return;
  }
  const text = cleanSnippet(topic.Text ?? topic.Result);
  // Topic text reads "Title - description"; the title part doubles as the link label.
  const separator = text.indexOf(" - ");
  const title = separator > 0 ? text.slice(0, separator) : text;
  push(topic.FirstURL, title, text);
}
