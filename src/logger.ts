import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Default placeholder inserted when a secret token is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

/** Accepted directives enabling custom secret redaction. */
const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);

/** Directives explicitly disabling secret redaction despite configured tokens. */
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are always replaced when redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "x-subscription-token",
  "api-key",
  "api_key",
  "apikey",
  "token",
  "access_token",
  "refresh_token",
  "client_secret",
  "cookie",
  "set-cookie",
]);

/**
 * Parses the `LOG_REDACT` environment variable so operators can both toggle
 * redaction and provide extra substrings to scrub. Accepts comma-separated
 * directives such as `"on,sk-"` or `"off"`; custom patterns without an
 * explicit toggle enable redaction.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: Array<string>;
} {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  const directives = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  if (directives.length === 0) {
    return { enabled: false, tokens: [] };
  }

  let enabled: boolean | undefined;
  const tokens: Array<string> = [];

  for (const directive of directives) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
      continue;
    }
    if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
      continue;
    }
    tokens.push(directive);
  }

  if (enabled === undefined) {
    enabled = tokens.length > 0;
  }

  return { enabled, tokens: Array.from(new Set(tokens)) };
}

/** Default maximum size (in bytes) of the primary log file before rotation. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

/** Default number of historical log files retained during rotation. */
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /**
   * Secrets (API keys, client secrets) scrubbed from every string in a
   * payload. Configuration tokens are passed here at start-up.
   */
  readonly redactSecrets?: Array<string | RegExp>;
  /**
   * Explicit toggle for payload redaction. When omitted the logger follows
   * {@link parseRedactionDirectives} applied to `LOG_REDACT`, and enables
   * itself whenever secrets were supplied.
   */
  readonly redactionEnabled?: boolean;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger that emits JSON lines on stdout and optionally mirrors them
 * to a file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly logFile: string | null;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactSecrets: Array<string | RegExp>;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Whether the directory containing {@link logFile} already exists. */
  private logDirectoryReady = false;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly redactionEnabled: boolean;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? null;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(process.env.LOG_REDACT);
    const combined = new Set<string | RegExp>(directives.tokens);
    for (const entry of options.redactSecrets ?? []) {
      if (typeof entry === "string" && entry.length === 0) {
        continue;
      }
      combined.add(entry);
    }
    this.redactSecrets = [...combined];
    this.entryListener = options.onEntry;
    this.redactionEnabled = options.redactionEnabled ?? (directives.enabled || this.redactSecrets.length > 0);
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

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to assert the content of mirrored log files.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    const safePayload = payload !== undefined ? this.redactStructuredValue(payload) : undefined;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    process.stdout.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDestination(logFile);
          await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
          await appendFile(logFile, line, "utf8");
        } catch (err) {
          const errorEntry: LogEntry = {
            timestamp: new Date().toISOString(),
            level: "error",
            message: "log_file_write_failed",
            payload: err instanceof Error ? { message: err.message } : { error: String(err) },
          };
          process.stderr.write(`${JSON.stringify(errorEntry)}\n`);
          // Allow future attempts to retry directory creation after a failure.
          this.logDirectoryReady = false;
        }
      })
      .catch(() => {
        // Errors already reported; reset queue to avoid unhandled rejections.
        this.writeQueue = Promise.resolve();
      });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates the active log file when appending the pending bytes would exceed
   * the size limit. At most {@link maxFileCount} files are kept.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    const keep = this.maxFileCount;
    if (keep === 1) {
      await rm(logFile, { force: true });
      return;
    }

    await rm(`${logFile}.${keep - 1}`, { force: true });
    for (let index = keep - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await renameIfPresent(logFile, `${logFile}.1`);
  }

  private redactStructuredValue(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    return this.deepRedact(value);
  }

  private deepRedact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrub(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }

  private scrub(value: string): string {
    let sanitized = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string") {
        sanitized = sanitized.split(pattern).join(REDACTION_TOKEN);
      } else {
        sanitized = sanitized.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitized;
  }
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw error;
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
