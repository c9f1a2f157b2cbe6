import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

/** Placeholder written in place of redacted values. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Payload keys whose values never reach the log when redaction is on. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "x-api-key",
  "x-subscription-token",
  "api-key",
  "api_key",
  "apikey",
  "token",
  "access_token",
  "cookie",
]);

const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;
const DEFAULT_MAX_FILE_COUNT = 5;

/**
 * Parses `POLYSEARCH_LOG_REDACT`. The variable holds comma-separated
 * directives: an explicit toggle (`on`/`off`) and/or literal substrings to
 * scrub, e.g. `"on,tvly-"`. Providing substrings without a toggle enables
 * redaction.
 */
export function parseRedactionDirectives(raw: string | undefined): { enabled: boolean; tokens: string[] } {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  let enabled: boolean | undefined;
  const tokens: string[] = [];
  for (const directive of raw.split(",").map((value) => value.trim())) {
    if (directive.length === 0) {
      continue;
    }
    const lower = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(lower)) {
      enabled = false;
    } else if (REDACTION_ENABLE_TOKENS.has(lower)) {
      enabled = true;
    } else {
      tokens.push(directive);
    }
  }

  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** File mirroring every entry. `null` keeps the logger off the filesystem. */
  readonly logFile?: string | null;
  /** Size in bytes that triggers a rotation of {@link logFile}. */
  readonly maxFileSizeBytes?: number;
  /** Number of files kept, the active one included. */
  readonly maxFileCount?: number;
  /** Write entries to stdout. Enabled by default. */
  readonly stdout?: boolean;
  /** Secrets (API keys, tokens) scrubbed from every string of the payload. */
  readonly redactSecrets?: Array<string | RegExp>;
  /** Overrides the toggle derived from `POLYSEARCH_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * JSON-lines logger. Entries go to stdout and, when configured, to a rotated
 * file. File writes are chained on a single promise so lines keep their order.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly stdout: boolean;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.stdout = options.stdout ?? true;

    const directives = parseRedactionDirectives(process.env.POLYSEARCH_LOG_REDACT);
    const secrets = new Set<string | RegExp>(directives.tokens);
    for (const secret of options.redactSecrets ?? []) {
      if (typeof secret === "string" && secret.trim().length === 0) {
        continue;
      }
      secrets.add(secret);
    }
    this.redactSecrets = [...secrets];
    // Explicit secrets always imply redaction unless the caller opted out.
    this.redactionEnabled =
      options.redactionEnabled ?? (directives.enabled || (options.redactSecrets?.length ?? 0) > 0);
    this.entryListener = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /** Resolves once every queued file write has been attempted. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload: this.redact(payload) } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;

    if (this.stdout) {
      process.stdout.write(line);
    }
    this.entryListener?.(structuredClone(entry));

    const target = this.logFile;
    if (!target) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDirectory(target);
          await this.rotateIfNeeded(target, Buffer.byteLength(line, "utf8"));
          await appendFile(target, line, "utf8");
        } catch (error) {
          this.logDirectoryReady = false;
          reportInternalFailure("log_file_write_failed", error);
        }
      })
      .catch((error: unknown) => {
        this.writeQueue = Promise.resolve();
        reportInternalFailure("log_queue_failed", error);
      });
  }

  private redact(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    if (typeof value === "string") {
      return this.scrub(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redact(item));
    }
    if (value instanceof Error) {
      return { name: value.name, message: this.scrub(value.message) };
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.redact(entry);
      }
      return result;
    }
    return value;
  }

  private scrub(text: string): string {
    let sanitised = text;
    for (const pattern of this.redactSecrets) {
      sanitised =
        typeof pattern === "string"
          ? sanitised.split(pattern).join(REDACTION_TOKEN)
          : sanitised.replace(pattern, REDACTION_TOKEN);
    }
    return sanitised;
  }

  private async ensureLogDirectory(target: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(target), { recursive: true });
    this.logDirectoryReady = true;
  }

  private async rotateIfNeeded(target: string, pendingBytes: number): Promise<void> {
    let currentSize: number;
    try {
      currentSize = (await stat(target)).size;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return;
      }
      throw error;
    }
    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    if (this.maxFileCount === 1) {
      await rm(target, { force: true });
      return;
    }

    await rm(`${target}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${target}.${index}`, `${target}.${index + 1}`);
    }
    await renameIfPresent(target, `${target}.1`);
  }
}

async function renameIfPresent(source: string, destination: string): Promise<void> {
  try {
    await rename(source, destination);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
      throw error;
    }
  }
}

function reportInternalFailure(message: string, error: unknown): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: "error",
    message,
    payload: { message: error instanceof Error ? error.message : String(error) },
  };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}
