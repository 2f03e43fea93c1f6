import { z } from "zod";

import { FINGERPRINT_PATTERN, computeSetupFingerprint } from "./fingerprint.js";
import { SETUP_SOURCES, type FingerprintedSetup, type SetupRecord } from "./types.js";

/** Error code carried by every {@link StoreError}. */
export const ERROR_STORE = "E-STORE" as const;

/**
 * Raised when the persistence backend cannot serve a request or rejects a
 * record. Store failures are fatal to the request that triggered them and are
 * never absorbed by the ingestion or answer flows.
 */
export class StoreError extends Error {
  public readonly code = ERROR_STORE;
  public readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "StoreError";
    this.operation = operation;
  }
}

/**
 * Keyed collection of setups with "insert if absent" semantics. Two concurrent
 * `insertIfAbsent` calls for the same fingerprint must never both resolve to
 * `true`; implementations serialise the check and the write.
 */
export interface SetupStore {
  exists(fingerprint: string): Promise<boolean>;
  /** Resolves `true` when the record was added, `false` when the fingerprint was already stored. */
  insertIfAbsent(record: FingerprintedSetup): Promise<boolean>;
  /** Newest first, at most {@link limit} entries. */
  recent(limit: number): Promise<SetupRecord[]>;
  size(): Promise<number>;
}

const fingerprintedSetupSchema = z.object({
  car: z.string().trim().min(1),
  track: z.string().trim().min(1),
  url: z.string().trim().min(1),
  source: z.enum(SETUP_SOURCES),
  notes: z.string().nullable(),
  fingerprint: z.string().regex(FINGERPRINT_PATTERN),
});

/** Schema of a persisted record, used when replaying journals. */
export const setupRecordSchema = fingerprintedSetupSchema.extend({
  createdAt: z.string().datetime(),
});

/**
 * Validates an incoming record and checks that its fingerprint matches the
 * content. The digest is derived data; a caller cannot pick it.
 */
export function validateIncomingSetup(record: FingerprintedSetup): FingerprintedSetup {
  const parsed = fingerprintedSetupSchema.safeParse(record);
  if (!parsed.success) {
    throw new StoreError("insertIfAbsent", `Invalid setup record: ${parsed.error.issues[0]?.message ?? "unknown"}`, {
      cause: parsed.error,
    });
  }
  const expected = computeSetupFingerprint(parsed.data.car, parsed.data.track, parsed.data.notes);
  if (expected !== parsed.data.fingerprint) {
    throw new StoreError("insertIfAbsent", "Fingerprint does not match the record content");
  }
  return parsed.data;
}

/** Builds the frozen record persisted by the stores. */
export function stampRecord(record: FingerprintedSetup, createdAt: string): SetupRecord {
  return Object.freeze({
    car: record.car,
    track: record.track,
    url: record.url,
    source: record.source,
    notes: record.notes,
    fingerprint: record.fingerprint,
    createdAt,
  });
}

/** Normalises the `limit` argument of {@link SetupStore.recent}. */
export function clampLimit(limit: number): number {
  if (!Number.isFinite(limit) || limit <= 0) {
    return 0;
  }
  return Math.floor(limit);
}

/**
 * Orders records newest first. Records sharing a timestamp keep reverse
 * insertion order, which the callers pass in as the array order.
 */
export function sortNewestFirst(records: readonly SetupRecord[]): SetupRecord[] {
  return records
    .map((record, index) => ({ record, index, at: Date.parse(record.createdAt) }))
    .sort((a, b) => (b.at === a.at ? b.index - a.index : b.at - a.at))
    .map((entry) => entry.record);
}
