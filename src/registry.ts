import type { ZodType, ZodTypeDef } from "zod";

import type { EnvSource } from "./config/env.js";
import { DuplicateEngineError, InvalidConfigError, UnknownEngineError } from "./errors.js";
import type { StructuredLogger } from "./logger.js";
import type { SearchEngine } from "./types.js";

/** Runtime collaborators handed to engine factories. */
export interface EngineContext {
  /** HTTP implementation used by network adapters; injected in tests. */
  readonly fetch: typeof fetch;
  /** Environment from which adapters read their secrets, once, at construction. */
  readonly env: EnvSource;
  readonly logger?: StructuredLogger;
}

/**
 * Registration of an engine: how to build it, which configuration it accepts,
 * and whether it can run in the current environment.
 */
export interface EngineDefinition<TConfig = unknown> {
  readonly configSchema: ZodType<TConfig, ZodTypeDef, unknown>;
  readonly create: (config: TConfig, context: EngineContext) => SearchEngine;
  /**
   * Cheap probe telling whether the engine's prerequisites (credentials,
   * endpoint) are present. Engines without a probe are always available.
   */
  readonly isAvailable?: (env: EnvSource) => boolean;
  readonly description?: string;
}

export interface RegisterOptions {
  /** Replace an existing registration instead of failing. */
  readonly override?: boolean;
}

export interface EngineRegistryOptions {
  readonly env?: EnvSource;
  readonly fetch?: typeof fetch;
  readonly logger?: StructuredLogger;
}

/** Opaque stored form; the config type is erased once registered. */
interface StoredDefinition {
  readonly build: (config: unknown, context: EngineContext) => SearchEngine;
  readonly isAvailable?: (env: EnvSource) => boolean;
  readonly description: string | null;
}

/**
 * Maps engine names to their factories. Resolution is strict (unknown names
 * and invalid configurations throw) while {@link listAvailable} is lenient:
 * engines whose prerequisites are missing are simply left out so callers can
 * enable "whatever works".
 */
export class EngineRegistry {
  private readonly definitions = new Map<string, StoredDefinition>();
  private readonly env: EnvSource;
  private readonly fetchImpl: typeof fetch;
  private readonly logger?: StructuredLogger;

  constructor(options: EngineRegistryOptions = {}) {
    this.env = options.env ?? process.env;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger;
  }

  register<TConfig>(name: string, definition: EngineDefinition<TConfig>, options: RegisterOptions = {}): void {
    const key = name.trim();
    if (key.length === 0) {
      throw new InvalidConfigError("engine registry", "engine names must be non-empty");
    }
    if (this.definitions.has(key) && !options.override) {
      throw new DuplicateEngineError(key);
    }

    this.definitions.set(key, {
      build: (config, context) => {
        const parsed = definition.configSchema.safeParse(config ?? {});
        if (!parsed.success) {
          throw new InvalidConfigError(`engine "${key}"`, parsed.error.message, parsed.error.issues, {
            cause: parsed.error,
          });
        }
        return definition.create(parsed.data, context);
      },
      isAvailable: definition.isAvailable,
      description: definition.description ?? null,
    });
  }

  unregister(name: string): boolean {
    return this.definitions.delete(name);
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  /** Every registered name, in registration order. */
  list(): string[] {
    return [...this.definitions.keys()];
  }

  describe(name: string): string | null {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new UnknownEngineError(name);
    }
    return definition.description;
  }

  /**
   * Names of the engines able to run here, in registration order. A probe that
   * throws counts as "unavailable".
   */
  listAvailable(): string[] {
    const available: string[] = [];
    for (const [name, definition] of this.definitions) {
      if (!definition.isAvailable) {
        available.push(name);
        continue;
      }
      try {
        if (definition.isAvailable(this.env)) {
          available.push(name);
        }
      } catch (error) {
        this.logger?.debug("engine_availability_probe_failed", {
          engine: name,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return available;
  }

  /** Builds a fresh adapter for `name`, validating `config` against its schema. */
  resolve(name: string, config?: unknown, context: Partial<EngineContext> = {}): SearchEngine {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new UnknownEngineError(name);
    }
    return definition.build(config, {
      fetch: context.fetch ?? this.fetchImpl,
      env: context.env ?? this.env,
      logger: context.logger ?? this.logger,
    });
  }
}
