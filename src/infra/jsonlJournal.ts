import { promises as fs } from "node:fs";
import { open as openFile, type FileHandle } from "node:fs/promises";
import path from "node:path";

import { AsyncMutex } from "./asyncMutex.js";

/** Default interval (in milliseconds) between best-effort fsync operations. */
const DEFAULT_FSYNC_INTERVAL_MS = 1_000;

export type FsyncMode = "always" | "interval" | "never";

/** Configuration accepted by {@link JsonlJournal}. */
export interface JsonlJournalOptions {
  /** Directory holding the journal and its lock file. */
  readonly directory: string;
  /** Journal file name, e.g. `setups.jsonl`. */
  readonly fileName: string;
  /**
   * Strategy governing when `fsync` is invoked. `interval` batches disk flushes
   * behind a timer to amortise I/O costs while still providing durability.
   */
  readonly fsyncMode?: FsyncMode;
  /** Interval used when `fsyncMode === "interval"`. */
  readonly fsyncIntervalMs?: number;
  /** Optional logger used to surface locking or recovery warnings. */
  readonly log?: (level: "warn" | "info", message: string) => void;
}

/**
 * Append-only JSON Lines file. Appends are serialised so concurrent writers
 * never interleave partial lines, and a lock file flags a second process
 * opening the same journal.
 */
export class JsonlJournal {
  readonly journalPath: string;
  private readonly lockPath: string;
  private readonly directory: string;
  private readonly fsyncMode: FsyncMode;
  private readonly fsyncIntervalMs: number;
  private readonly log: (level: "warn" | "info", message: string) => void;
  private readonly writeMutex = new AsyncMutex();

  private handle: FileHandle | null = null;
  private syncTimer: NodeJS.Timeout | null = null;
  private pendingSync = false;
  private hasLock = false;

  constructor(options: JsonlJournalOptions) {
    this.directory = options.directory;
    this.fsyncMode = options.fsyncMode ?? "interval";
    this.fsyncIntervalMs = options.fsyncIntervalMs ?? DEFAULT_FSYNC_INTERVAL_MS;
    this.log = options.log ?? (() => {});
    this.journalPath = path.join(this.directory, options.fileName);
    this.lockPath = path.join(this.directory, `${options.fileName}.lock`);
  }

  /**
   * Opens the journal and returns the entries already on disk. Lines that are
   * not valid JSON are reported through the logger and skipped.
   */
  async open(): Promise<unknown[]> {
    await fs.mkdir(this.directory, { recursive: true });
    await this.acquireLock();
    const entries = await this.readEntries();
    this.handle = await openFile(this.journalPath, "a");
    if (this.fsyncMode === "interval") {
      this.syncTimer = setInterval(() => {
        void this.flushPendingSync().catch((error: unknown) => {
          this.log("warn", `Failed to fsync journal ${this.journalPath}: ${String(error)}`);
        });
      }, this.fsyncIntervalMs);
      this.syncTimer.unref();
    }
    return entries;
  }

  async append(entry: unknown): Promise<void> {
    const payload = `${JSON.stringify(entry)}\n`;
    await this.writeMutex.runExclusive(async () => {
      if (!this.handle) {
        throw new Error(`Journal ${this.journalPath} is not open`);
      }
      await this.handle.write(payload);
      switch (this.fsyncMode) {
        case "always":
          await this.handle.sync();
          break;
        case "interval":
          this.pendingSync = true;
          break;
        case "never":
          break;
      }
    });
  }

  /** Flush and close resources. */
  async close(): Promise<void> {
    if (this.syncTimer) {
      clearInterval(this.syncTimer);
      this.syncTimer = null;
    }
    await this.flushPendingSync();
    if (this.handle) {
      await this.handle.close();
      this.handle = null;
    }
    if (this.hasLock) {
      await fs.rm(this.lockPath, { force: true });
      this.hasLock = false;
    }
  }

  private async readEntries(): Promise<unknown[]> {
    let content: string;
    try {
      content = await fs.readFile(this.journalPath, "utf8");
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }
    const entries: unknown[] = [];
    for (const rawLine of content.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (line.length === 0) {
        continue;
      }
      try {
        entries.push(JSON.parse(line));
      } catch (error) {
        this.log("warn", `Failed to parse journal entry: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    return entries;
  }

  private async flushPendingSync(): Promise<void> {
    if (!this.pendingSync || !this.handle) {
      return;
    }
    try {
      await this.handle.sync();
    } finally {
      this.pendingSync = false;
    }
  }

  private async acquireLock(): Promise<void> {
    try {
      const handle = await openFile(this.lockPath, "wx");
      await handle.write(`${process.pid}`);
      await handle.close();
      this.hasLock = true;
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === "EEXIST") {
        this.log("warn", `Journal lock ${this.lockPath} already exists. Continuing without exclusive ownership.`);
        this.hasLock = false;
        return;
      }
      throw error;
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
