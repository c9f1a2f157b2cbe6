import { createHash } from "node:crypto";

import type { MetadataFilters } from "./types.js";

interface CacheEntry<T> {
  readonly key: string;
  readonly value: T;
  readonly insertedAt: number;
  readonly ttlMs: number;
}

export interface QueryResultCacheOptions {
  readonly ttlMs: number;
  readonly now?: () => number;
}

/**
 * In-process result cache owned by one coordinator. Entries expire lazily:
 * a read past the TTL evicts the entry and reports a miss.
 */
export class QueryResultCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: QueryResultCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => Date.now());
  }

  get(key: string): T | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (this.now() - entry.insertedAt > entry.ttlMs) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  /** Last writer wins when two identical queries race. */
  set(key: string, value: T): void {
    this.entries.set(key, { key, value, insertedAt: this.now(), ttlMs: this.ttlMs });
  }

  clear(): void {
    this.entries.clear();
  }

  /** Number of stored entries, expired ones included until they are read. */
  size(): number {
    return this.entries.size;
  }
}

/**
 * Content-addressed key of a semantic query. Filters are serialised with
 * sorted keys so `{a, b}` and `{b, a}` share an entry; an empty filter
 * object is the same as no filter.
 */
export function buildCacheKey(query: string, limit: number, filters?: MetadataFilters | null): string {
  const normalisedFilters = filters && Object.keys(filters).length > 0 ? canonicalise(filters) : null;
  const material = JSON.stringify(["v1", query, limit, normalisedFilters]);
  return createHash("sha256").update(material).digest("hex");
}

function canonicalise(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalise);
  }
  if (value && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = canonicalise(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}
