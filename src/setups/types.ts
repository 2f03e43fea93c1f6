/**
 * Core domain types shared by the ingestion pipeline, the stores and the
 * answer service. Kept in a leaf module so connectors and stores never import
 * each other.
 */

/** Provenance tags accepted on stored setups. */
export const SETUP_SOURCES = ["scraped-site-a", "scraped-site-b", "social-api", "ai"] as const;

export type SetupSource = (typeof SETUP_SOURCES)[number];

/** Sentinel stored when a source cannot tell which track a setup targets. */
export const UNKNOWN_TRACK = "Unknown";

/** Locator stored on AI-generated setups, which have no page behind them. */
export const NO_URL = "N/A";

/**
 * Raw candidate produced by a source connector before normalisation. The
 * connector keeps whatever the source gave it; the normalizer decides what is
 * usable.
 */
export interface RawItem {
  readonly source: SetupSource;
  /** Absolute link to the page or post, when the source exposes one. */
  readonly url: string | null;
  /** Headline text, usually where the car and track are named. */
  readonly title: string;
  /** Detail text (setup sheet, forum body, model explanation...). */
  readonly body: string | null;
}

/** Normalised setup ready to be fingerprinted. */
export interface SetupCandidate {
  readonly car: string;
  readonly track: string;
  readonly url: string;
  readonly source: SetupSource;
  readonly notes: string | null;
}

/** Candidate carrying its content digest, the shape accepted by the stores. */
export interface FingerprintedSetup extends SetupCandidate {
  /** Lower-case hexadecimal SHA-256 digest of the normalised content. */
  readonly fingerprint: string;
}

/** Persisted setup. Instances returned by the stores are frozen. */
export interface SetupRecord extends FingerprintedSetup {
  /** ISO-8601 timestamp stamped by the store at insertion. */
  readonly createdAt: string;
}

/** Scope of an ingestion run. Both fields are optional; connectors widen their query when absent. */
export interface IngestionQuery {
  readonly car?: string;
  readonly track?: string;
}

/** One completed answer request. */
export interface ChatExchange {
  readonly id: string;
  readonly prompt: string;
  readonly response: string;
  /** ISO-8601 timestamp of the append. */
  readonly timestamp: string;
}
