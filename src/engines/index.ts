import { EngineRegistry, type EngineRegistryOptions, type RegisterOptions } from "../registry.js";
import { BraveEngine, braveConfigSchema, isBraveAvailable } from "./brave.js";
import { DuckDuckGoEngine, duckduckgoConfigSchema } from "./duckduckgo.js";
import { SearxngEngine, isSearxngAvailable, searxngConfigSchema } from "./searxng.js";
import { TavilyEngine, isTavilyAvailable, tavilyConfigSchema } from "./tavily.js";

export { BraveEngine, braveConfigSchema, isBraveAvailable, type BraveConfig } from "./brave.js";
export { DuckDuckGoEngine, duckduckgoConfigSchema, type DuckDuckGoConfig } from "./duckduckgo.js";
export { SearxngEngine, isSearxngAvailable, searxngConfigSchema, type SearxngConfig } from "./searxng.js";
export { TavilyEngine, isTavilyAvailable, tavilyConfigSchema, type TavilyConfig } from "./tavily.js";

/** Names of the adapters shipped with the package, in default merge order. */
export const BUILTIN_ENGINES = ["duckduckgo", "searxng", "tavily", "brave"] as const;

export type BuiltinEngineName = (typeof BUILTIN_ENGINES)[number];

const BUILTIN_REGISTRATIONS: {
  readonly [K in BuiltinEngineName]: (registry: EngineRegistry, options: RegisterOptions) => void;
} = {
  duckduckgo: (registry, options) =>
    registry.register(
      "duckduckgo",
      {
        configSchema: duckduckgoConfigSchema,
        create: (config, context) => new DuckDuckGoEngine(config, context),
        description: "DuckDuckGo Instant Answer API",
      },
      options,
    ),
  searxng: (registry, options) =>
    registry.register(
      "searxng",
      {
        configSchema: searxngConfigSchema,
        create: (config, context) => new SearxngEngine(config, context),
        isAvailable: isSearxngAvailable,
        description: "Self-hosted SearxNG metasearch instance",
      },
      options,
    ),
  tavily: (registry, options) =>
    registry.register(
      "tavily",
      {
        configSchema: tavilyConfigSchema,
        create: (config, context) => new TavilyEngine(config, context),
        isAvailable: isTavilyAvailable,
        description: "Tavily AI search API",
      },
      options,
    ),
  brave: (registry, options) =>
    registry.register(
      "brave",
      {
        configSchema: braveConfigSchema,
        create: (config, context) => new BraveEngine(config, context),
        isAvailable: isBraveAvailable,
        description: "Brave Search web API",
      },
      options,
    ),
};

/**
 * Registers the bundled adapters in {@link BUILTIN_ENGINES} order. DuckDuckGo
 * needs no credentials; the others are only listed as available when their
 * key or endpoint is configured.
 */
export function registerBuiltinEngines(registry: EngineRegistry, options: RegisterOptions = {}): EngineRegistry {
  for (const name of BUILTIN_ENGINES) {
    BUILTIN_REGISTRATIONS[name](registry, options);
  }
  return registry;
}

/** Fresh registry holding the bundled adapters. */
export function createDefaultRegistry(options: EngineRegistryOptions = {}): EngineRegistry {
  return registerBuiltinEngines(new EngineRegistry(options));
}
