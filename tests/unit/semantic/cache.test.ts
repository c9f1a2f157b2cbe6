import { describe, it } from "mocha";
import { expect } from "chai";

import { QueryResultCache, buildCacheKey } from "../../../src/semantic/cache.js";

describe("semantic/cache", () => {
  it("derives the same key for filters that differ only in key order", () => {
    const left = buildCacheKey("query", 5, { lang: "en", kind: "doc" });
    const right = buildCacheKey("query", 5, { kind: "doc", lang: "en" });
    expect(left).to.equal(right);
    expect(left).to.match(/^[0-9a-f]{64}$/);
  });

  it("treats missing and empty filters alike", () => {
    expect(buildCacheKey("query", 5)).to.equal(buildCacheKey("query", 5, {}));
    expect(buildCacheKey("query", 5, null)).to.equal(buildCacheKey("query", 5));
  });

  it("separates queries, limits and filter values", () => {
    const base = buildCacheKey("query", 5, { lang: "en" });
    expect(buildCacheKey("query ", 5, { lang: "en" })).to.not.equal(base);
    expect(buildCacheKey("query", 6, { lang: "en" })).to.not.equal(base);
    expect(buildCacheKey("query", 5, { lang: "fr" })).to.not.equal(base);
    expect(buildCacheKey("query", 5, { lang: null })).to.not.equal(buildCacheKey("query", 5));
  });

  it("expires entries lazily once the ttl has elapsed", () => {
    let now = 1_000;
    const cache = new QueryResultCache<string>({ ttlMs: 100, now: () => now });

    cache.set("k", "value");
    now = 1_100;
    expect(cache.get("k")).to.equal("value");
    now = 1_101;
    expect(cache.size()).to.equal(1);
    expect(cache.get("k")).to.equal(null);
    expect(cache.size()).to.equal(0);
  });

  it("overwrites entries and clears everything on demand", () => {
    const cache = new QueryResultCache<number>({ ttlMs: 1_000, now: () => 0 });
    cache.set("a", 1);
    cache.set("a", 2);
    cache.set("b", 3);

    expect(cache.get("a")).to.equal(2);
    expect(cache.size()).to.equal(2);
    cache.clear();
    expect(cache.get("b")).to.equal(null);
    expect(cache.size()).to.equal(0);
  });
});
