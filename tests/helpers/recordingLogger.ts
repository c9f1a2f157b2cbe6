import { StructuredLogger, type LogLevel } from "../../src/logger.js";

export interface RecordedEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly payload?: unknown;
}

/**
 * {@link StructuredLogger} that keeps entries in memory instead of printing
 * them, so assertions can inspect payloads exactly as emitted.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: RecordedEntry[] = [];

  constructor() {
    super({ logFile: null, stdout: false, redactionEnabled: false });
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.message);
  }

  find(message: string): RecordedEntry | undefined {
    return this.entries.find((entry) => entry.message === message);
  }

  private record(level: LogLevel, message: string, payload?: unknown): void {
    this.entries.push({ level, message, payload });
  }

  override debug(message: string, payload?: unknown): void {
    this.record("debug", message, payload);
  }

  override info(message: string, payload?: unknown): void {
    this.record("info", message, payload);
  }

  override warn(message: string, payload?: unknown): void {
    this.record("warn", message, payload);
  }

  override error(message: string, payload?: unknown): void {
    this.record("error", message, payload);
  }
}
