import type { MultiEngineSearch, OrchestratorConfigInput } from "../orchestrator.js";
import type { SearchEngine } from "../types.js";
import type { WebSearchSource } from "./types.js";

const MAX_RESULTS_PER_ENGINE = 50;

/** Uses a single adapter as the coordinator's live source. */
export function webSourceFromEngine(
  engine: SearchEngine,
  options: Readonly<Record<string, unknown>> = {},
): WebSearchSource {
  return {
    name: engine.name,
    search: (query, { limit }) => engine.search(query, { ...options, maxResults: limit }),
  };
}

/**
 * Uses the orchestrator as the coordinator's live source. The requested limit
 * caps both each engine and the merged list.
 */
export function webSourceFromOrchestrator(
  orchestrator: MultiEngineSearch,
  overrides: OrchestratorConfigInput = {},
): WebSearchSource {
  return {
    name: "multi-engine",
    search: (query, { limit }) =>
      orchestrator.search(query, {
        ...overrides,
        maxResultsPerEngine: Math.min(Math.max(1, limit), MAX_RESULTS_PER_ENGINE),
        maxResults: Math.max(1, limit),
      }),
  };
}
