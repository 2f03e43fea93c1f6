import { createHash } from "node:crypto";

import type { FingerprintedSetup, SetupCandidate } from "./types.js";

/**
 * Content digest used as the deduplication key. Provenance (source, url) is
 * deliberately left out so the same setup found on two sites collapses into a
 * single record.
 */
export function computeSetupFingerprint(car: string, track: string, notes: string | null | undefined): string {
  const payload = [car.toLowerCase(), track.toLowerCase(), (notes ?? "").toLowerCase()].join("|");
  return createHash("sha256").update(payload, "utf8").digest("hex");
}

/** Attaches the digest to a normalised candidate. */
export function fingerprintCandidate(candidate: SetupCandidate): FingerprintedSetup {
  return {
    ...candidate,
    fingerprint: computeSetupFingerprint(candidate.car, candidate.track, candidate.notes),
  };
}

/** Pattern matched by every digest produced by {@link computeSetupFingerprint}. */
export const FINGERPRINT_PATTERN = /^[0-9a-f]{64}$/;
