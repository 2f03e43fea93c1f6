import { ShardedMutex } from "../infra/asyncMutex.js";
import { JsonlJournal, type FsyncMode } from "../infra/jsonlJournal.js";

import {
  StoreError,
  clampLimit,
  setupRecordSchema,
  sortNewestFirst,
  stampRecord,
  validateIncomingSetup,
  type SetupStore,
} from "./store.js";
import type { FingerprintedSetup, SetupRecord } from "./types.js";

/** Configuration accepted by {@link FileSetupStore}. */
export interface FileSetupStoreOptions {
  /** Directory holding `setups.jsonl`. */
  readonly directory: string;
  readonly clock?: () => number;
  readonly fsyncMode?: FsyncMode;
  readonly fsyncIntervalMs?: number;
  readonly log?: (level: "warn" | "info", message: string) => void;
}

interface SetupJournalEntry {
  readonly type: "setup";
  readonly record: SetupRecord;
}

/**
 * Durable setup store backed by an append-only JSONL journal. The journal is
 * replayed into an in-memory index on start-up; each insertion appends one
 * line while holding the fingerprint's shard lock, so the index and the file
 * only change together.
 */
export class FileSetupStore implements SetupStore {
  private readonly journal: JsonlJournal;
  private readonly clock: () => number;
  private readonly log: (level: "warn" | "info", message: string) => void;
  private readonly mutex = new ShardedMutex();
  private readonly byFingerprint = new Map<string, SetupRecord>();
  private readonly ordered: SetupRecord[] = [];
  private ready: Promise<void> | null = null;

  constructor(options: FileSetupStoreOptions) {
    this.clock = options.clock ?? (() => Date.now());
    this.log = options.log ?? (() => {});
    this.journal = new JsonlJournal({
      directory: options.directory,
      fileName: "setups.jsonl",
      fsyncMode: options.fsyncMode,
      fsyncIntervalMs: options.fsyncIntervalMs,
      log: this.log,
    });
  }

  /** Loads the journal. Called lazily by every operation; exposed for eager start-up. */
  initialise(): Promise<void> {
    if (!this.ready) {
      this.ready = this.load().catch((error: unknown) => {
        this.ready = null;
        throw new StoreError("initialise", `Failed to open setup journal ${this.journal.journalPath}`, {
          cause: error,
        });
      });
    }
    return this.ready;
  }

  async exists(fingerprint: string): Promise<boolean> {
    await this.initialise();
    return this.byFingerprint.has(fingerprint);
  }

  async insertIfAbsent(input: FingerprintedSetup): Promise<boolean> {
    await this.initialise();
    const record = validateIncomingSetup(input);
    return this.mutex.runExclusive(record.fingerprint, async () => {
      if (this.byFingerprint.has(record.fingerprint)) {
        return false;
      }
      const stored = stampRecord(record, new Date(this.clock()).toISOString());
      const entry: SetupJournalEntry = { type: "setup", record: stored };
      try {
        await this.journal.append(entry);
      } catch (error) {
        throw new StoreError("insertIfAbsent", `Failed to persist setup ${stored.fingerprint}`, { cause: error });
      }
      this.index(stored);
      return true;
    });
  }

  async recent(limit: number): Promise<SetupRecord[]> {
    await this.initialise();
    return sortNewestFirst(this.ordered).slice(0, clampLimit(limit));
  }

  async size(): Promise<number> {
    await this.initialise();
    return this.byFingerprint.size;
  }

  /** Flush and close resources. */
  async dispose(): Promise<void> {
    if (this.ready) {
      await this.ready.catch(() => undefined);
    }
    await this.journal.close();
    this.ready = null;
  }

  private async load(): Promise<void> {
    const entries = await this.journal.open();
    this.byFingerprint.clear();
    this.ordered.length = 0;
    for (const entry of entries) {
      const parsed = setupRecordSchema.safeParse(
        typeof entry === "object" && entry !== null && "record" in entry ? entry.record : undefined,
      );
      if (!parsed.success) {
        this.log("warn", "Skipping malformed setup journal entry");
        continue;
      }
      if (this.byFingerprint.has(parsed.data.fingerprint)) {
        continue;
      }
      this.index(Object.freeze(parsed.data));
    }
  }

  private index(record: SetupRecord): void {
    this.byFingerprint.set(record.fingerprint, record);
    this.ordered.push(record);
  }
}
