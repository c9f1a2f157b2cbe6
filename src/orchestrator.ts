import { performance } from "node:perf_hooks";

import { z } from "zod";

import {
  AllEnginesFailedError,
  EngineCallError,
  EngineTimeoutError,
  InvalidConfigError,
  InvalidQueryError,
  PartialEngineFailure,
  describeError,
  type EngineError,
  type EngineFailure,
} from "./errors.js";
import type { StructuredLogger } from "./logger.js";
import { mergeOutcomes } from "./merger.js";
import type { SearchMetricsRecorder } from "./metrics.js";
import type { EngineRegistry } from "./registry.js";
import type { EngineOutcome, MergedResult, NormalizedResult, SearchEngine } from "./types.js";

export const DEFAULT_MAX_RESULTS_PER_ENGINE = 10;
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Runtime configuration of {@link MultiEngineSearch}, validated on every call. */
export const orchestratorConfigSchema = z
  .object({
    /** Engines to query, in merge order. Defaults to every available engine. */
    enabledEngines: z.array(z.string().trim().min(1)).optional(),
    maxResultsPerEngine: z.number().int().min(1).max(50).default(DEFAULT_MAX_RESULTS_PER_ENGINE),
    /** Shared deadline for the whole fan-out, measured from dispatch. */
    timeoutMs: z.number().int().min(1_000).max(60_000).default(DEFAULT_TIMEOUT_MS),
    failSilently: z.boolean().default(true),
    /** Cap applied to the merged list; `null` keeps every unique source. */
    maxResults: z.number().int().positive().nullable().default(null),
    /** Options forwarded verbatim to every adapter. */
    engineOptions: z.record(z.unknown()).default({}),
    /** Options forwarded verbatim to one adapter, keyed by engine name. */
    perEngineOptions: z.record(z.record(z.unknown())).default({}),
  })
  .strict();

export type OrchestratorConfig = z.output<typeof orchestratorConfigSchema>;
export type OrchestratorConfigInput = z.input<typeof orchestratorConfigSchema>;

export interface MultiEngineSearchOptions {
  readonly registry: EngineRegistry;
  readonly config?: OrchestratorConfigInput;
  /** Adapter configuration per engine, validated by the registry schemas. */
  readonly engineConfigs?: Readonly<Record<string, unknown>>;
  readonly logger?: StructuredLogger;
  readonly metrics?: SearchMetricsRecorder;
  readonly now?: () => number;
}

const DEADLINE = Symbol("deadline");

const sourceItemShape = z
  .object({
    url: z.string(),
    title: z.string(),
    content: z.string(),
    score: z.number().nullable(),
    rawContent: z.string().nullable(),
  })
  .passthrough();

/** Shape every adapter result must have before it reaches the merge. */
const normalizedResultShape = z
  .object({
    query: z.string(),
    answer: z.string().nullable(),
    images: z.array(z.string()),
    sources: z.array(sourceItemShape),
    responseTimeMs: z.number(),
    rawResponse: z.unknown(),
  })
  .passthrough();

type CallSettlement =
  | { readonly kind: "ok"; readonly result: NormalizedResult }
  | { readonly kind: "error"; readonly error: unknown }
  | { readonly kind: typeof DEADLINE };

interface ResolvedEngine {
  readonly name: string;
  readonly engine: SearchEngine;
}

/**
 * Fans a query out to several engines at once and merges their answers.
 *
 * Every call resolves fresh adapters from the registry, starts them together
 * and races them against a single deadline. Engines that throw or miss the
 * deadline are dropped (or abort the search when `failSilently` is off). The
 * merge only starts once every engine has settled, and follows configuration
 * order rather than completion order.
 */
export class MultiEngineSearch {
  private readonly registry: EngineRegistry;
  private readonly baseConfig: OrchestratorConfigInput;
  private readonly engineConfigs: Readonly<Record<string, unknown>>;
  private readonly logger?: StructuredLogger;
  private readonly metrics?: SearchMetricsRecorder;
  private readonly now: () => number;

  constructor(options: MultiEngineSearchOptions) {
    this.registry = options.registry;
    this.baseConfig = options.config ?? {};
    this.engineConfigs = options.engineConfigs ?? {};
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.now = options.now ?? (() => performance.now());
    // Fail fast on a malformed base configuration.
    parseOrchestratorConfig(this.baseConfig);
  }

  /** Engines a search would query with the base configuration, in merge order. */
  getEnabledEngines(): string[] {
    return this.selectEngines(parseOrchestratorConfig(this.baseConfig));
  }

  /** Effective base configuration with the engine list resolved. */
  getConfig(): OrchestratorConfig & { enabledEngines: string[] } {
    const config = parseOrchestratorConfig(this.baseConfig);
    return { ...config, enabledEngines: this.selectEngines(config) };
  }

  async search(query: string, overrides: OrchestratorConfigInput = {}): Promise<MergedResult> {
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      throw new InvalidQueryError("Search queries must be non-empty");
    }

    const config = parseOrchestratorConfig({ ...this.baseConfig, ...overrides });
    const engines = this.resolveEngines(this.selectEngines(config));

    const startedAt = this.now();
    const outcomes = await this.dispatch(trimmed, engines, config);

    const failures: EngineFailure[] = [];
    for (const outcome of outcomes) {
      if (outcome.error) {
        failures.push({ engine: outcome.engine, error: outcome.error });
      }
    }
    if (!config.failSilently && failures.length > 0) {
      this.logger?.warn("multi_search_aborted", { query: trimmed, failed_engines: failures.map((f) => f.engine) });
      throw new PartialEngineFailure(failures);
    }

    const successes = outcomes.filter((outcome) => outcome.result !== null);
    if (successes.length === 0) {
      this.logger?.error("multi_search_all_failed", { query: trimmed, failed_engines: failures.map((f) => f.engine) });
      throw new AllEnginesFailedError(failures);
    }

    const mergeStartedAt = this.now();
    const merged = mergeOutcomes(outcomes, config.maxResults);
    this.metrics?.observe("merge", true, this.now() - mergeStartedAt);

    const rawResponse: Record<string, unknown> = {};
    for (const outcome of successes) {
      rawResponse[outcome.engine] = outcome.result?.rawResponse ?? null;
    }

    const responseTimeMs = this.now() - startedAt;
    this.logger?.info("multi_search_completed", {
      query: trimmed,
      engines: successes.map((outcome) => outcome.engine),
      dropped_engines: failures.map((failure) => failure.engine),
      sources: merged.sources.length,
      response_time_ms: Math.round(responseTimeMs),
    });

    return {
      query: trimmed,
      answer: merged.answer,
      images: merged.images,
      sources: merged.sources,
      responseTimeMs,
      rawResponse,
      engines: successes.map((outcome) => outcome.engine),
      failures,
    };
  }

  private selectEngines(config: OrchestratorConfig): string[] {
    const requested = config.enabledEngines ?? this.registry.listAvailable();
    return [...new Set(requested)];
  }

  private resolveEngines(names: readonly string[]): ResolvedEngine[] {
    if (names.length === 0) {
      throw new InvalidConfigError("orchestrator", "no search engine is enabled or available");
    }
    return names.map((name) => ({ name, engine: this.registry.resolve(name, this.engineConfigs[name]) }));
  }

  /**
   * Starts every engine together and settles each one against the shared
   * deadline. The returned outcomes follow the order of {@link engines}.
   */
  private async dispatch(
    query: string,
    engines: readonly ResolvedEngine[],
    config: OrchestratorConfig,
  ): Promise<EngineOutcome[]> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<typeof DEADLINE>((resolve) => {
      timer = setTimeout(() => {
        controller.abort(new Error(`deadline of ${config.timeoutMs}ms elapsed`));
        resolve(DEADLINE);
      }, config.timeoutMs);
    });

    try {
      return await Promise.all(
        engines.map((entry) => this.runEngine(query, entry, config, controller.signal, deadline)),
      );
    } finally {
      clearTimeout(timer);
    }
  }

  private async runEngine(
    query: string,
    { name, engine }: ResolvedEngine,
    config: OrchestratorConfig,
    signal: AbortSignal,
    deadline: Promise<typeof DEADLINE>,
  ): Promise<EngineOutcome> {
    const startedAt = this.now();
    const options = {
      ...config.engineOptions,
      ...(config.perEngineOptions[name] ?? {}),
      maxResults: config.maxResultsPerEngine,
      signal,
    };

    // Synchronous throws from the adapter are folded into the promise chain.
    const call = Promise.resolve()
      .then(() => engine.search(query, options))
      .then(
        (result): CallSettlement => {
          const checked = normalizedResultShape.safeParse(result);
          if (!checked.success) {
            const detail = checked.error.issues
              .map((issue) => `${issue.path.join(".") || "result"}: ${issue.message}`)
              .join("; ");
            const error = new EngineCallError(name, `malformed result (${detail})`, { cause: checked.error });
            return { kind: "error", error };
          }
          return { kind: "ok", result };
        },
        (error: unknown): CallSettlement => ({ kind: "error", error }),
      );
    const settlement = await Promise.race([call, deadline.then((): CallSettlement => ({ kind: DEADLINE }))]);
    const elapsedMs = this.now() - startedAt;

    if (settlement.kind === "ok") {
      this.metrics?.observe("engineSearch", true, elapsedMs, name);
      this.logger?.debug("engine_search_succeeded", {
        engine: name,
        sources: settlement.result.sources.length,
        elapsed_ms: Math.round(elapsedMs),
      });
      return { engine: name, result: settlement.result, error: null, elapsedMs };
    }

    // Only the deadline aborts the shared signal, so a rejection after the
    // abort is the adapter reacting to the deadline.
    const timedOut = settlement.kind === DEADLINE || signal.aborted;
    const error: EngineError =
      settlement.kind === "error" && !timedOut
        ? wrapEngineError(name, settlement.error)
        : new EngineTimeoutError(name, config.timeoutMs);
    this.metrics?.observe("engineSearch", false, elapsedMs, name);
    this.logger?.warn(timedOut ? "engine_search_timed_out" : "engine_search_failed", {
      engine: name,
      code: error.code,
      message: error.message,
      elapsed_ms: Math.round(elapsedMs),
    });
    return { engine: name, result: null, error, elapsedMs };
  }
}

/** Validates a raw orchestrator configuration, mapping zod failures to {@link InvalidConfigError}. */
export function parseOrchestratorConfig(input: OrchestratorConfigInput): OrchestratorConfig {
  const parsed = orchestratorConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigError("orchestrator", parsed.error.message, parsed.error.issues, { cause: parsed.error });
  }
  return parsed.data;
}

function wrapEngineError(engine: string, error: unknown): EngineError {
  if (error instanceof EngineCallError || error instanceof EngineTimeoutError) {
    return error;
  }
  const status =
    error && typeof error === "object" && "status" in error && typeof error.status === "number" ? error.status : null;
  return new EngineCallError(engine, describeError(error), { status, cause: error });
}
