import type { ZodIssue } from "zod";

/**
 * Stable error codes surfaced by the library. Callers are expected to branch on
 * these identifiers rather than on messages, which may change between releases.
 */
export const ERROR_CODES = {
  unknownEngine: "E-REGISTRY-UNKNOWN",
  duplicateEngine: "E-REGISTRY-DUPLICATE",
  invalidConfig: "E-CONFIG-INVALID",
  invalidQuery: "E-QUERY-INVALID",
  engineTimeout: "E-ENGINE-TIMEOUT",
  engineCall: "E-ENGINE-CALL",
  partialFailure: "E-ORCH-PARTIAL",
  allEnginesFailed: "E-ORCH-ALL-FAILED",
  notConnected: "E-SEMANTIC-NOT-CONNECTED",
  storeUnavailable: "E-SEMANTIC-STORE-UNAVAILABLE",
  storeWrite: "E-SEMANTIC-STORE-WRITE",
  embedding: "E-SEMANTIC-EMBEDDING",
} as const;

export type PolysearchErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Base class shared by every error thrown by the library. */
export class PolysearchError extends Error {
  public readonly code: PolysearchErrorCode;

  constructor(message: string, code: PolysearchErrorCode, options: { cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "PolysearchError";
    this.code = code;
  }
}

/** Raised when a caller explicitly requests an engine nobody registered. */
export class UnknownEngineError extends PolysearchError {
  public readonly engine: string;

  constructor(engine: string) {
    super(`Search engine "${engine}" is not registered`, ERROR_CODES.unknownEngine);
    this.name = "UnknownEngineError";
    this.engine = engine;
  }
}

export class DuplicateEngineError extends PolysearchError {
  public readonly engine: string;

  constructor(engine: string) {
    super(`Search engine "${engine}" is already registered`, ERROR_CODES.duplicateEngine);
    this.name = "DuplicateEngineError";
    this.engine = engine;
  }
}

/**
 * Raised when a configuration object does not satisfy its schema. The zod
 * issues are preserved so callers can point at the offending field.
 */
export class InvalidConfigError extends PolysearchError {
  public readonly subject: string;
  public readonly issues: readonly ZodIssue[];

  constructor(subject: string, message: string, issues: readonly ZodIssue[] = [], options: { cause?: unknown } = {}) {
    super(`Invalid configuration for ${subject}: ${message}`, ERROR_CODES.invalidConfig, options);
    this.name = "InvalidConfigError";
    this.subject = subject;
    this.issues = issues;
  }
}

export class InvalidQueryError extends PolysearchError {
  constructor(message: string) {
    super(message, ERROR_CODES.invalidQuery);
    this.name = "InvalidQueryError";
  }
}

/** Engine did not settle before the shared deadline. */
export class EngineTimeoutError extends PolysearchError {
  public readonly engine: string;
  public readonly timeoutMs: number;

  constructor(engine: string, timeoutMs: number) {
    super(`Search engine "${engine}" did not answer within ${timeoutMs}ms`, ERROR_CODES.engineTimeout);
    this.name = "EngineTimeoutError";
    this.engine = engine;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wraps whatever an adapter threw. Raw adapter errors never leave the
 * orchestrator; they are reachable through {@link Error.cause}.
 */
export class EngineCallError extends PolysearchError {
  public readonly engine: string;
  public readonly status: number | null;

  constructor(engine: string, message: string, options: { status?: number | null; cause?: unknown } = {}) {
    super(`Search engine "${engine}" failed: ${message}`, ERROR_CODES.engineCall, { cause: options.cause });
    this.name = "EngineCallError";
    this.engine = engine;
    this.status = options.status ?? null;
  }
}

export type EngineError = EngineTimeoutError | EngineCallError;

/** Failure attributed to a single engine inside an orchestrated search. */
export interface EngineFailure {
  readonly engine: string;
  readonly error: EngineError;
}

function describeFailures(failures: readonly EngineFailure[]): string {
  return failures.map((failure) => `${failure.engine} (${failure.error.code})`).join(", ");
}

/** Raised when `failSilently` is off and at least one engine failed. */
export class PartialEngineFailure extends PolysearchError {
  public readonly failures: readonly EngineFailure[];

  constructor(failures: readonly EngineFailure[]) {
    super(`Search aborted, failing engines: ${describeFailures(failures)}`, ERROR_CODES.partialFailure);
    this.name = "PartialEngineFailure";
    this.failures = failures;
  }

  get failedEngines(): string[] {
    return this.failures.map((failure) => failure.engine);
  }
}

export class AllEnginesFailedError extends PolysearchError {
  public readonly failures: readonly EngineFailure[];

  constructor(failures: readonly EngineFailure[]) {
    super(`Every search engine failed: ${describeFailures(failures)}`, ERROR_CODES.allEnginesFailed);
    this.name = "AllEnginesFailedError";
    this.failures = failures;
  }
}

export class NotConnectedError extends PolysearchError {
  constructor(operation: string) {
    super(`Cannot ${operation}: the semantic search coordinator is not connected`, ERROR_CODES.notConnected);
    this.name = "NotConnectedError";
  }
}

export class StoreUnavailableError extends PolysearchError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, ERROR_CODES.storeUnavailable, options);
    this.name = "StoreUnavailableError";
  }
}

export class StoreWriteError extends PolysearchError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, ERROR_CODES.storeWrite, options);
    this.name = "StoreWriteError";
  }
}

export class EmbeddingError extends PolysearchError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, ERROR_CODES.embedding, options);
    this.name = "EmbeddingError";
  }
}

/** Human readable description of an unknown thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
