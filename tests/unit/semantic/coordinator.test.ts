import { beforeEach, describe, it } from "mocha";
import { expect } from "chai";

import {
  EngineCallError,
  InvalidConfigError,
  InvalidQueryError,
  NotConnectedError,
  StoreUnavailableError,
  StoreWriteError,
} from "../../../src/errors.js";
import { SearchMetricsRecorder } from "../../../src/metrics.js";
import { SemanticSearchCoordinator, type SemanticSearchConfigInput } from "../../../src/semantic/coordinator.js";
import { HashingEmbedder } from "../../../src/semantic/embedders.js";
import { InMemoryVectorStore } from "../../../src/semantic/memoryStore.js";
import type { Embedder, WebSearchSource } from "../../../src/semantic/types.js";
import {
  createSourceItem,
  type NormalizedResult,
  type PageContentFetcher,
  type PageFetchOptions,
} from "../../../src/types.js";
import { RecordingLogger } from "../../helpers/recordingLogger.js";

const HOUR_MS = 60 * 60 * 1_000;

/** Hashing embedder counting its calls; texts containing "poison" fail. */
class CountingEmbedder implements Embedder {
  readonly model = "counting";
  readonly dimensions = 64;
  readonly texts: string[] = [];
  private readonly inner = new HashingEmbedder(64);

  async embed(text: string): Promise<number[]> {
    this.texts.push(text);
    if (text.includes("poison")) {
      throw new Error("embedding backend rejected the text");
    }
    return this.inner.embed(text);
  }
}

interface WebItem {
  readonly url: string;
  readonly content?: string;
  readonly score?: number;
}

/** Web source answering from a fixed list and recording queries. */
class ScriptedWebSource implements WebSearchSource {
  readonly name = "scripted-web";
  readonly calls: Array<{ query: string; limit: number }> = [];

  constructor(
    private readonly items: readonly WebItem[],
    private readonly failure?: Error,
  ) {}

  async search(query: string, { limit }: { limit: number }): Promise<NormalizedResult> {
    this.calls.push({ query, limit });
    if (this.failure) {
      throw this.failure;
    }
    return {
      query,
      answer: null,
      images: [],
      sources: this.items.map((item) =>
        createSourceItem({
          url: item.url,
          title: `title of ${item.url}`,
          content: item.content ?? `web text about ${item.url}`,
          score: item.score,
        }),
      ),
      responseTimeMs: 1,
      rawResponse: null,
    };
  }
}

const LOCAL_DOCUMENTS = [
  { url: "https://docs.test/vectors", text: "vector databases index embeddings for similarity search" },
  { url: "https://docs.test/cosine", text: "cosine similarity compares the angle between embeddings" },
  { url: "https://docs.test/hnsw", text: "approximate nearest neighbour search over embeddings" },
];

describe("semantic/coordinator", () => {
  let store: InMemoryVectorStore;
  let embedder: CountingEmbedder;
  let logger: RecordingLogger;

  beforeEach(() => {
    store = new InMemoryVectorStore({ collection: "docs" });
    embedder = new CountingEmbedder();
    logger = new RecordingLogger();
  });

  async function createCoordinator(
    config: SemanticSearchConfigInput,
    webSource?: WebSearchSource,
    now?: () => number,
  ): Promise<SemanticSearchCoordinator> {
    const coordinator = new SemanticSearchCoordinator({ store, embedder, webSource, config, logger, now });
    await coordinator.connect();
    for (const doc of LOCAL_DOCUMENTS) {
      await coordinator.storeDocument(doc.text, doc.url, doc.url, { lang: "en", kind: "doc" });
    }
    embedder.texts.length = 0;
    return coordinator;
  }

  it("falls back to the web when the store holds fewer chunks than the threshold", async () => {
    const web = new ScriptedWebSource([{ url: "https://web.test/a" }, { url: "https://web.test/b", score: 0.9 }]);
    const coordinator = await createCoordinator({ fallbackThreshold: 5, webSearchLimit: 4 }, web);

    const result = await coordinator.search("similarity of embeddings");

    expect(web.calls).to.deep.equal([{ query: "similarity of embeddings", limit: 4 }]);
    expect(result.localResults).to.equal(3);
    expect(result.webResults).to.equal(2);
    expect(result.totalResults).to.equal(5);
    expect(result.chunks.map((entry) => entry.origin)).to.deep.equal(["local", "local", "local", "web", "web"]);
    const webChunks = result.chunks.slice(3);
    expect(webChunks.map((entry) => entry.score)).to.deep.equal([0.5, 0.9]);
    expect(webChunks[0].chunk.metadata).to.deep.equal({ origin: "web", engine: "scripted-web" });
    expect(webChunks[0].chunk.id).to.match(/^web:[0-9a-f]{16}$/);
    expect(logger.messages("info")).to.include("web_fallback_triggered");
  });

  it("orders local chunks by descending score", async () => {
    const coordinator = await createCoordinator({ fallbackThreshold: 0 });
    const result = await coordinator.search("cosine similarity compares the angle between embeddings");

    expect(result.chunks[0].chunk.sourceUrl).to.equal("https://docs.test/cosine");
    expect(result.chunks[0].score).to.be.closeTo(1, 1e-9);
    const scores = result.chunks.map((entry) => entry.score);
    expect([...scores].sort((a, b) => b - a)).to.deep.equal(scores);
  });

  it("skips the web when enough local chunks match", async () => {
    const web = new ScriptedWebSource([{ url: "https://web.test/a" }]);
    const coordinator = await createCoordinator({ fallbackThreshold: 3 }, web);

    const result = await coordinator.search("embeddings");

    expect(web.calls).to.deep.equal([]);
    expect(result.localResults).to.equal(3);
    expect(result.webResults).to.equal(0);
  });

  it("puts web chunks first when the web search is forced", async () => {
    const web = new ScriptedWebSource([{ url: "https://web.test/a" }]);
    const coordinator = await createCoordinator({ fallbackThreshold: 0 }, web);

    const result = await coordinator.search("embeddings", { forceWebSearch: true });

    expect(result.chunks.map((entry) => entry.origin)).to.deep.equal(["web", "local", "local", "local"]);
    expect(web.calls).to.have.length(1);
  });

  it("drops web hits already present locally or repeated", async () => {
    const web = new ScriptedWebSource([
      { url: "https://docs.test/cosine" },
      { url: "https://web.test/a" },
      { url: "https://web.test/a" },
    ]);
    const coordinator = await createCoordinator({ fallbackThreshold: 5, autoStoreWebResults: false }, web);

    const result = await coordinator.search("embeddings");

    expect(result.chunks.filter((entry) => entry.origin === "web").map((entry) => entry.chunk.sourceUrl)).to.deep.equal(
      ["https://web.test/a"],
    );
  });

  it("counts results from the chunks actually returned", async () => {
    const web = new ScriptedWebSource([{ url: "https://web.test/a" }]);
    const coordinator = await createCoordinator({ fallbackThreshold: 3, autoStoreWebResults: false }, web);

    const result = await coordinator.search("embeddings", { limit: 2 });

    expect(web.calls).to.have.length(1);
    expect(result.totalResults).to.equal(2);
    expect(result.localResults).to.equal(2);
    expect(result.webResults).to.equal(0);
  });

  it("stores new web results and skips known or empty ones", async () => {
    const web = new ScriptedWebSource([
      { url: "https://web.test/new", content: "fresh page about embeddings" },
      { url: "https://web.test/empty", content: "" },
    ]);
    const coordinator = await createCoordinator({ fallbackThreshold: 5 }, web);

    await coordinator.search("embeddings");

    expect(await store.hasSource("https://web.test/new")).to.equal(true);
    expect(await store.hasSource("https://web.test/empty")).to.equal(false);
    expect((await store.stats()).totalChunks).to.equal(4);
    expect(logger.find("web_results_stored")?.payload).to.deep.equal({ stored: 1, skipped: 1, failed: 0 });

    coordinator.clearCache();
    await coordinator.search("embeddings", { forceWebSearch: true });
    expect((await store.stats()).totalChunks).to.equal(4);
  });

  it("fetches page text for web hits that arrive without content before storing them", async () => {
    const fetched: Array<{ url: string; options?: PageFetchOptions }> = [];
    const contentFetcher: PageContentFetcher = {
      async fetch(url, options) {
        fetched.push({ url, options });
        if (url.endsWith("/down")) {
          throw new Error("crawler unreachable");
        }
        return `crawled text of ${url}`;
      },
    };
    const web = new ScriptedWebSource([
      { url: "https://web.test/bare", content: "" },
      { url: "https://web.test/down", content: "" },
      { url: "https://web.test/full", content: "snippet already present" },
    ]);
    const coordinator = new SemanticSearchCoordinator({
      store,
      embedder,
      webSource: web,
      contentFetcher,
      config: { fallbackThreshold: 1 },
      logger,
    });
    await coordinator.connect();

    const result = await coordinator.search("crawl");

    expect(result.chunks.map((entry) => entry.chunk.content)).to.deep.equal(["", "", "snippet already present"]);
    expect(fetched).to.deep.equal([
      { url: "https://web.test/bare", options: { contentFormat: "text", onlyText: true } },
      { url: "https://web.test/down", options: { contentFormat: "text", onlyText: true } },
    ]);
    expect(embedder.texts).to.include("crawled text of https://web.test/bare");
    expect(await store.hasSource("https://web.test/bare")).to.equal(true);
    expect(await store.hasSource("https://web.test/down")).to.equal(false);
    expect(logger.find("web_content_fetch_failed")?.payload).to.deep.equal({
      source_url: "https://web.test/down",
      message: "crawler unreachable",
    });
    expect(logger.find("web_results_stored")?.payload).to.deep.equal({ stored: 2, skipped: 1, failed: 0 });
  });

  it("logs auto-store failures without failing the search", async () => {
    const web = new ScriptedWebSource([
      { url: "https://web.test/bad", content: "poison page" },
      { url: "https://web.test/good", content: "healthy page" },
    ]);
    const coordinator = await createCoordinator({ fallbackThreshold: 5 }, web);

    const result = await coordinator.search("embeddings");

    expect(result.webResults).to.equal(2);
    const failure = logger.entries.find((entry) => entry.message === "auto_store_failed");
    expect(failure?.level).to.equal("warn");
    expect(failure?.payload).to.deep.equal({
      source_url: "https://web.test/bad",
      message: 'model "counting" failed: embedding backend rejected the text',
    });
    expect(await store.hasSource("https://web.test/good")).to.equal(true);
  });

  it("propagates web source failures as engine errors", async () => {
    const web = new ScriptedWebSource([], new Error("upstream down"));
    const coordinator = await createCoordinator({ fallbackThreshold: 5 }, web);

    try {
      await coordinator.search("embeddings");
      expect.fail("search should have thrown");
    } catch (error) {
      expect(error).to.be.instanceOf(EngineCallError);
      expect((error as EngineCallError).message).to.equal('Search engine "scripted-web" failed: upstream down');
    }
  });

  it("answers from local chunks alone when no web source is configured", async () => {
    const coordinator = await createCoordinator({ fallbackThreshold: 5 });

    const result = await coordinator.search("embeddings");

    expect(result.totalResults).to.equal(3);
    expect(result.webResults).to.equal(0);
    expect(logger.messages("debug")).to.include("web_fallback_unavailable");
  });

  describe("cache", () => {
    it("returns the stored result without touching the store, model or web", async () => {
      const web = new ScriptedWebSource([{ url: "https://web.test/a" }]);
      const coordinator = await createCoordinator({ fallbackThreshold: 5 }, web);

      const first = await coordinator.search("embeddings", { filters: { lang: "en", kind: "doc" } });
      const embedCalls = embedder.texts.length;
      const second = await coordinator.search("embeddings", { filters: { kind: "doc", lang: "en" } });

      expect(second).to.equal(first);
      expect(embedder.texts).to.have.length(embedCalls);
      expect(web.calls).to.have.length(1);
      expect(coordinator.cacheSize()).to.equal(1);
      expect(logger.messages("debug")).to.include("semantic_cache_hit");
      expect(Object.isFrozen(first)).to.equal(true);
    });

    it("keys on the limit", async () => {
      const coordinator = await createCoordinator({ fallbackThreshold: 0 });

      const first = await coordinator.search("embeddings", { limit: 2 });
      const second = await coordinator.search("embeddings", { limit: 3 });

      expect(second).to.not.equal(first);
      expect(coordinator.cacheSize()).to.equal(2);
    });

    it("expires entries after the ttl", async () => {
      let now = 0;
      const coordinator = await createCoordinator({ fallbackThreshold: 0, cacheTtlHours: 1 }, undefined, () => now);

      const first = await coordinator.search("embeddings");
      now = HOUR_MS;
      expect(await coordinator.search("embeddings")).to.equal(first);
      now = HOUR_MS + 1;
      expect(await coordinator.search("embeddings")).to.not.equal(first);
    });

    it("is bypassed when caching is disabled", async () => {
      const coordinator = await createCoordinator({ fallbackThreshold: 0, enableCaching: false });

      const first = await coordinator.search("embeddings");
      const second = await coordinator.search("embeddings");

      expect(second).to.not.equal(first);
      expect(coordinator.cacheSize()).to.equal(0);
    });

    it("is emptied by clearCache", async () => {
      const coordinator = await createCoordinator({ fallbackThreshold: 0 });
      await coordinator.search("embeddings");

      coordinator.clearCache();

      expect(coordinator.cacheSize()).to.equal(0);
      expect(logger.find("semantic_cache_cleared")?.payload).to.deep.equal({ evicted: 1 });
    });
  });

  describe("lifecycle and validation", () => {
    it("refuses to search before connect", async () => {
      const coordinator = new SemanticSearchCoordinator({ store, embedder });
      try {
        await coordinator.search("embeddings");
        expect.fail("search should have thrown");
      } catch (error) {
        expect(error).to.be.instanceOf(NotConnectedError);
      }
    });

    it("wraps store connection failures", async () => {
      const failing = new InMemoryVectorStore();
      failing.connect = async () => {
        throw new Error("connection refused");
      };
      const coordinator = new SemanticSearchCoordinator({ store: failing, embedder });

      try {
        await coordinator.connect();
        expect.fail("connect should have thrown");
      } catch (error) {
        expect(error).to.be.instanceOf(StoreUnavailableError);
        expect((error as StoreUnavailableError).cause).to.be.instanceOf(Error);
      }
      expect(coordinator.isConnected()).to.equal(false);
    });

    it("rejects blank queries and invalid limits", async () => {
      const coordinator = await createCoordinator({});
      for (const call of [() => coordinator.search("   "), () => coordinator.search("embeddings", { limit: 0 })]) {
        try {
          await call();
          expect.fail("search should have thrown");
        } catch (error) {
          expect(error).to.be.instanceOf(InvalidQueryError);
        }
      }
    });

    it("rejects invalid configuration", () => {
      expect(() => new SemanticSearchCoordinator({ store, embedder, config: { localSearchLimit: 0 } })).to.throw(
        InvalidConfigError,
      );
    });

    it("disconnects from the store", async () => {
      const coordinator = await createCoordinator({});
      await coordinator.disconnect();

      expect(coordinator.isConnected()).to.equal(false);
      try {
        await coordinator.getStats();
        expect.fail("getStats should have thrown");
      } catch (error) {
        expect(error).to.be.instanceOf(NotConnectedError);
      }
    });
  });

  describe("storeDocument", () => {
    it("stores an embedded frozen chunk", async () => {
      const coordinator = await createCoordinator({});

      const chunk = await coordinator.storeDocument("a new note on embeddings", "https://notes.test/1", "Note", {
        tag: "note",
      });

      expect(chunk.id).to.match(/^[0-9a-f-]{36}$/);
      expect(chunk.embedding).to.have.length(64);
      expect(chunk.metadata).to.deep.equal({ tag: "note" });
      expect(Object.isFrozen(chunk)).to.equal(true);
      expect(await coordinator.getStats()).to.deep.equal({
        provider: "memory",
        collection: "docs",
        totalChunks: 4,
        dimensions: 64,
        uniqueSources: 4,
        persisted: false,
      });
    });

    it("rejects empty documents", async () => {
      const coordinator = await createCoordinator({});
      try {
        await coordinator.storeDocument("  ", "https://notes.test/1", "Empty");
        expect.fail("storeDocument should have thrown");
      } catch (error) {
        expect(error).to.be.instanceOf(StoreWriteError);
      }
    });
  });

  it("measures the embedding model, the store and the web source", async () => {
    const metrics = new SearchMetricsRecorder({ now: () => 0 });
    const web = new ScriptedWebSource([{ url: "https://web.test/a" }]);
    const coordinator = new SemanticSearchCoordinator({
      store,
      embedder,
      webSource: web,
      metrics,
      config: { fallbackThreshold: 1, autoStoreWebResults: false },
    });
    await coordinator.connect();

    await coordinator.search("embeddings");

    expect(metrics.snapshot().operations).to.deep.equal([
      { operation: "embed", engine: null, success: 1, failure: 0 },
      { operation: "vectorQuery", engine: null, success: 1, failure: 0 },
      { operation: "webFallback", engine: "scripted-web", success: 1, failure: 0 },
    ]);
  });
});
