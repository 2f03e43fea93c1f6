import { StructuredLogger, type LogLevel } from "../../src/logger.js";

export interface RecordedEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly payload?: unknown;
}

/**
 * Logger capturing entries in memory instead of writing to stdout. It
 * subclasses {@link StructuredLogger} so it can be injected wherever the
 * production logger is accepted.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: RecordedEntry[] = [];

  constructor() {
    super({ logFile: null, redactionEnabled: false });
  }

  private record(level: LogLevel, message: string, payload?: unknown): void {
    this.entries.push({ level, message, payload });
  }

  /** Messages logged so far, optionally restricted to one level. */
  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => !level || entry.level === level).map((entry) => entry.message);
  }

  find(message: string): RecordedEntry | undefined {
    return this.entries.find((entry) => entry.message === message);
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
