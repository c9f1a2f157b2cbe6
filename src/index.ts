/**
 * Public entry point. Everything callers need (registry, orchestrator, merger,
 * semantic coordinator and the bundled adapters) is re-exported from here.
 */
import { collectSearchRedactionTokens, loadSearchConfig, type SearchConfig } from "./config.js";
import type { EnvSource } from "./config/env.js";
import { createDefaultRegistry } from "./engines/index.js";
import { StructuredLogger } from "./logger.js";
import { SearchMetricsRecorder } from "./metrics.js";
import { MultiEngineSearch } from "./orchestrator.js";
import type { EngineRegistry } from "./registry.js";
import { SemanticSearchCoordinator } from "./semantic/coordinator.js";
import { createEmbedder, createVectorStore } from "./semantic/factory.js";
import { webSourceFromOrchestrator } from "./semantic/webSource.js";

export { collectSearchRedactionTokens, loadSearchConfig, type SearchConfig, type SemanticRuntimeConfig } from "./config.js";
export { parseCsvList, readBool, readInt, readNumber, readOptionalString, readString, type EnvSource } from "./config/env.js";
export * from "./errors.js";
export * from "./engines/index.js";
export { StructuredLogger, parseRedactionDirectives, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export { mergeOutcomes, mergeSources, type MergedSources } from "./merger.js";
export { SearchMetricsRecorder, type SearchMetricOperation, type SearchMetricsSnapshot } from "./metrics.js";
export {
  DEFAULT_MAX_RESULTS_PER_ENGINE,
  DEFAULT_TIMEOUT_MS,
  MultiEngineSearch,
  orchestratorConfigSchema,
  parseOrchestratorConfig,
  type MultiEngineSearchOptions,
  type OrchestratorConfig,
  type OrchestratorConfigInput,
} from "./orchestrator.js";
export {
  EngineRegistry,
  type EngineContext,
  type EngineDefinition,
  type EngineRegistryOptions,
  type RegisterOptions,
} from "./registry.js";
export { QueryResultCache, buildCacheKey } from "./semantic/cache.js";
export {
  SemanticSearchCoordinator,
  semanticConfigSchema,
  type SemanticSearchConfig,
  type SemanticSearchConfigInput,
  type SemanticSearchCoordinatorOptions,
  type SemanticSearchOptions,
} from "./semantic/coordinator.js";
export { HashingEmbedder, OllamaEmbedder, tokenise, type OllamaEmbedderOptions } from "./semantic/embedders.js";
export { createEmbedder, createVectorStore } from "./semantic/factory.js";
export { InMemoryVectorStore, type InMemoryVectorStoreOptions } from "./semantic/memoryStore.js";
export type * from "./semantic/types.js";
export { webSourceFromEngine, webSourceFromOrchestrator } from "./semantic/webSource.js";
export type * from "./types.js";
export { createSourceItem } from "./types.js";

export interface SearchStackOptions {
  readonly env?: EnvSource;
  readonly fetch?: typeof fetch;
  readonly logger?: StructuredLogger;
  readonly metrics?: SearchMetricsRecorder;
}

export interface SearchStack {
  readonly config: SearchConfig;
  readonly registry: EngineRegistry;
  readonly search: MultiEngineSearch;
  /** Not connected yet: call `connect()` before the first query. */
  readonly semantic: SemanticSearchCoordinator;
  readonly logger: StructuredLogger;
  readonly metrics: SearchMetricsRecorder;
}

/**
 * Wires the bundled adapters, the orchestrator and a semantic coordinator from
 * environment variables. The orchestrator doubles as the coordinator's web
 * source.
 */
export function createSearchStack(options: SearchStackOptions = {}): SearchStack {
  const env = options.env ?? process.env;
  const config = loadSearchConfig(env);
  const logger = options.logger ?? new StructuredLogger({ redactSecrets: collectSearchRedactionTokens(env) });
  const metrics = options.metrics ?? new SearchMetricsRecorder();

  const registry = createDefaultRegistry({ env, fetch: options.fetch, logger });
  const search = new MultiEngineSearch({ registry, config: config.orchestrator, logger, metrics });
  const semantic = new SemanticSearchCoordinator({
    store: createVectorStore({
      provider: config.semantic.vectorStoreProvider ?? "memory",
      collectionName: config.semantic.collectionName ?? "polysearch",
      filePath: config.semanticRuntime.storePath,
    }),
    embedder: createEmbedder({
      model: config.semantic.embeddingModel ?? "hashing",
      dimensions: config.semanticRuntime.embeddingDimensions ?? undefined,
      ollamaBaseUrl: config.semanticRuntime.ollamaBaseUrl ?? undefined,
      fetch: options.fetch,
    }),
    webSource: webSourceFromOrchestrator(search),
    config: config.semantic,
    logger,
    metrics,
  });

  return { config, registry, search, semantic, logger, metrics };
}
