import { performance } from "node:perf_hooks";

/** Bucket boundaries (ms) used to classify latency samples. */
const LATENCY_BUCKET_BOUNDARIES_MS = [50, 100, 250, 500, 1_000, 2_000, 5_000, 10_000, 20_000, 60_000] as const;

const ORDERED_BUCKET_LABELS: readonly string[] = [
  ...LATENCY_BUCKET_BOUNDARIES_MS.map((boundary) => formatLessOrEqual(boundary)),
  formatGreaterThan(LATENCY_BUCKET_BOUNDARIES_MS[LATENCY_BUCKET_BOUNDARIES_MS.length - 1]),
];

/** Operations measured across the orchestrator and the semantic layer. */
export type SearchMetricOperation =
  | "engineSearch"
  | "merge"
  | "embed"
  | "vectorQuery"
  | "vectorUpsert"
  | "webFallback";

export interface SearchMetricsOptions {
  /** Clock returning milliseconds, sub-millisecond precision welcome. */
  readonly now?: () => number;
}

/** Counters for one operation, optionally narrowed to one engine. */
export interface OperationMetricSnapshot {
  readonly operation: SearchMetricOperation;
  readonly engine: string | null;
  readonly success: number;
  readonly failure: number;
}

export interface LatencyBucketSnapshot {
  readonly bucket: string;
  readonly count: number;
}

export interface OperationLatencyBucketsSnapshot {
  readonly operation: SearchMetricOperation;
  readonly buckets: readonly LatencyBucketSnapshot[];
}

export interface SearchMetricsSnapshot {
  readonly operations: readonly OperationMetricSnapshot[];
  readonly latencyBuckets: readonly OperationLatencyBucketsSnapshot[];
}

interface OperationCounters {
  readonly operation: SearchMetricOperation;
  readonly engine: string | null;
  success: number;
  failure: number;
}

/**
 * Records success/failure counters and bucketed latencies. Counters are keyed
 * by operation and, for engine calls, by engine name so dashboards can compare
 * backends side by side.
 */
export class SearchMetricsRecorder {
  private readonly now: () => number;
  private readonly counters = new Map<string, OperationCounters>();
  private readonly bucketCounters = new Map<SearchMetricOperation, Map<string, number>>();

  constructor(options: SearchMetricsOptions = {}) {
    this.now = options.now ?? (() => performance.now());
  }

  /**
   * Runs {@link callback} and records its latency and outcome. Errors are
   * rethrown untouched once counted.
   */
  async measure<T>(operation: SearchMetricOperation, callback: () => Promise<T>, engine?: string): Promise<T> {
    const startedAt = this.now();
    try {
      const result = await callback();
      this.record(operation, engine ?? null, true, this.now() - startedAt);
      return result;
    } catch (error) {
      this.record(operation, engine ?? null, false, this.now() - startedAt);
      throw error;
    }
  }

  /** Records an outcome measured elsewhere, e.g. an engine call settled by a race. */
  observe(operation: SearchMetricOperation, success: boolean, durationMs: number, engine?: string): void {
    this.record(operation, engine ?? null, success, durationMs);
  }

  snapshot(): SearchMetricsSnapshot {
    const operations: OperationMetricSnapshot[] = [...this.counters.values()]
      .map(({ operation, engine, success, failure }) => ({ operation, engine, success, failure }))
      .sort(
        (left, right) =>
          left.operation.localeCompare(right.operation) || (left.engine ?? "").localeCompare(right.engine ?? ""),
      );

    const latencyBuckets: OperationLatencyBucketsSnapshot[] = [];
    for (const [operation, bucketMap] of this.bucketCounters.entries()) {
      latencyBuckets.push({
        operation,
        buckets: ORDERED_BUCKET_LABELS.map((label) => ({ bucket: label, count: bucketMap.get(label) ?? 0 })),
      });
    }
    latencyBuckets.sort((left, right) => left.operation.localeCompare(right.operation));
    return { operations, latencyBuckets };
  }

  private record(operation: SearchMetricOperation, engine: string | null, success: boolean, durationMs: number): void {
    const key = `${operation}|${engine ?? ""}`;
    let counters = this.counters.get(key);
    if (!counters) {
      counters = { operation, engine, success: 0, failure: 0 };
      this.counters.set(key, counters);
    }
    if (success) {
      counters.success += 1;
    } else {
      counters.failure += 1;
    }

    let bucketMap = this.bucketCounters.get(operation);
    if (!bucketMap) {
      bucketMap = new Map<string, number>();
      this.bucketCounters.set(operation, bucketMap);
    }
    const bucket = deriveLatencyBucket(durationMs);
    bucketMap.set(bucket, (bucketMap.get(bucket) ?? 0) + 1);
  }
}

function deriveLatencyBucket(durationMs: number): string {
  const safe = Number.isFinite(durationMs) && durationMs >= 0 ? durationMs : 0;
  for (const boundary of LATENCY_BUCKET_BOUNDARIES_MS) {
    if (safe <= boundary) {
      return formatLessOrEqual(boundary);
    }
  }
  return formatGreaterThan(LATENCY_BUCKET_BOUNDARIES_MS[LATENCY_BUCKET_BOUNDARIES_MS.length - 1]);
}

function formatLessOrEqual(boundary: number): string {
  return `le_${String(boundary).padStart(5, "0")}ms`;
}

function formatGreaterThan(boundary: number): string {
  return `gt_${String(boundary).padStart(5, "0")}ms`;
}
