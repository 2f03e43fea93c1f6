import { ShardedMutex } from "../infra/asyncMutex.js";

import {
  clampLimit,
  sortNewestFirst,
  stampRecord,
  validateIncomingSetup,
  type SetupStore,
} from "./store.js";
import type { FingerprintedSetup, SetupRecord } from "./types.js";

/** Options controlling the behaviour of {@link InMemorySetupStore}. */
export interface InMemorySetupStoreOptions {
  /** Clock used for deterministic testing. */
  readonly clock?: () => number;
}

/** Process-local setup store. Used by the tests and by runs without a data directory. */
export class InMemorySetupStore implements SetupStore {
  private readonly clock: () => number;
  private readonly mutex = new ShardedMutex();
  private readonly byFingerprint = new Map<string, SetupRecord>();
  /** Insertion order, oldest first. */
  private readonly ordered: SetupRecord[] = [];

  constructor(options: InMemorySetupStoreOptions = {}) {
    this.clock = options.clock ?? (() => Date.now());
  }

  async exists(fingerprint: string): Promise<boolean> {
    return this.byFingerprint.has(fingerprint);
  }

  async insertIfAbsent(input: FingerprintedSetup): Promise<boolean> {
    const record = validateIncomingSetup(input);
    return this.mutex.runExclusive(record.fingerprint, () => {
      if (this.byFingerprint.has(record.fingerprint)) {
        return false;
      }
      const stored = stampRecord(record, new Date(this.clock()).toISOString());
      this.byFingerprint.set(stored.fingerprint, stored);
      this.ordered.push(stored);
      return true;
    });
  }

  async recent(limit: number): Promise<SetupRecord[]> {
    return sortNewestFirst(this.ordered).slice(0, clampLimit(limit));
  }

  async size(): Promise<number> {
    return this.byFingerprint.size;
  }
}
