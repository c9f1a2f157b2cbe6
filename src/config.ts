import {
  parseCsvList,
  readBool,
  readInt,
  readNumber,
  readOptionalString,
  readString,
  type EnvSource,
} from "./config/env.js";
import { DEFAULT_MAX_RESULTS_PER_ENGINE, DEFAULT_TIMEOUT_MS, type OrchestratorConfigInput } from "./orchestrator.js";
import type { SemanticSearchConfigInput } from "./semantic/coordinator.js";

/** Settings of the semantic layer that live outside the coordinator config. */
export interface SemanticRuntimeConfig {
  /** JSON mirror of the in-memory store; `null` keeps it in memory only. */
  readonly storePath: string | null;
  readonly embeddingDimensions: number | null;
  readonly ollamaBaseUrl: string | null;
}

export interface SearchConfig {
  readonly orchestrator: OrchestratorConfigInput;
  readonly semantic: SemanticSearchConfigInput;
  readonly semanticRuntime: SemanticRuntimeConfig;
}

/**
 * Reads `SEARCH_*` and `SEMANTIC_*` variables. Malformed or out-of-range
 * values fall back to their defaults; the resulting objects are validated
 * again by the components that consume them.
 */
export function loadSearchConfig(env: EnvSource = process.env): SearchConfig {
  const engines = readOptionalString("SEARCH_ENABLED_ENGINES", env);
  const maxResults = readInt("SEARCH_MAX_RESULTS", 0, { min: 0 }, env);
  const dimensions = readInt("SEMANTIC_EMBEDDING_DIMENSIONS", 0, { min: 0 }, env);

  return {
    orchestrator: {
      ...(engines ? { enabledEngines: parseCsvList(engines) } : {}),
      maxResultsPerEngine: readInt(
        "SEARCH_MAX_RESULTS_PER_ENGINE",
        DEFAULT_MAX_RESULTS_PER_ENGINE,
        { min: 1, max: 50 },
        env,
      ),
      timeoutMs: readInt("SEARCH_TIMEOUT_MS", DEFAULT_TIMEOUT_MS, { min: 1_000, max: 60_000 }, env),
      failSilently: readBool("SEARCH_FAIL_SILENTLY", true, env),
      maxResults: maxResults > 0 ? maxResults : null,
    },
    semantic: {
      vectorStoreProvider: readString("SEMANTIC_VECTOR_STORE", "memory", env),
      collectionName: readString("SEMANTIC_COLLECTION", "polysearch", env),
      embeddingModel: readString("SEMANTIC_EMBEDDING_MODEL", "hashing", env),
      localSearchLimit: readInt("SEMANTIC_LOCAL_LIMIT", 10, { min: 1, max: 200 }, env),
      webSearchLimit: readInt("SEMANTIC_WEB_LIMIT", 5, { min: 1, max: 50 }, env),
      fallbackThreshold: readInt("SEMANTIC_FALLBACK_THRESHOLD", 3, { min: 0 }, env),
      enableCaching: readBool("SEMANTIC_ENABLE_CACHE", true, env),
      cacheTtlHours: readNumber("SEMANTIC_CACHE_TTL_HOURS", 24, { min: 0.001 }, env),
      autoStoreWebResults: readBool("SEMANTIC_AUTO_STORE", true, env),
      webResultScore: readNumber("SEMANTIC_WEB_RESULT_SCORE", 0.5, { min: 0, max: 1 }, env),
    },
    semanticRuntime: {
      storePath: readOptionalString("SEMANTIC_STORE_PATH", env) ?? null,
      embeddingDimensions: dimensions > 0 ? dimensions : null,
      ollamaBaseUrl: readOptionalString("OLLAMA_BASE_URL", env) ?? null,
    },
  };
}

const SECRET_VARIABLES = ["SEARX_AUTH_TOKEN", "TAVILY_API_KEY", "BRAVE_API_KEY"] as const;

/** Configured API keys and tokens, deduplicated, for the logger's redaction list. */
export function collectSearchRedactionTokens(env: EnvSource = process.env): string[] {
  const tokens = new Set<string>();
  for (const name of SECRET_VARIABLES) {
    const value = readOptionalString(name, env);
    if (value) {
      tokens.add(value);
    }
  }
  return [...tokens];
}
