import { z } from "zod";

import {
  NO_URL,
  SETUP_SOURCES,
  UNKNOWN_TRACK,
  type IngestionQuery,
  type RawItem,
  type SetupCandidate,
  type SetupSource,
} from "./types.js";

/** Maximum number of characters kept in the `notes` field. */
export const MAX_NOTES_LENGTH = 4_000;

/** Car/track pair produced by a strategy. `track: null` means "could not tell". */
export interface CarTrack {
  readonly car: string;
  readonly track: string | null;
}

/** Extra hints available to strategies, typically the scope of the ingestion run. */
export interface NormalizationContext {
  readonly query?: IngestionQuery;
}

/**
 * Source-scoped heuristic splitting an item into car and track. Returning
 * `null` lets the next strategy in a {@link firstOf} chain try.
 */
export type CarTrackStrategy = (item: RawItem, context: NormalizationContext) => CarTrack | null;

export type NormalizationFailureReason = "invalid-item" | "empty-title" | "unresolved-car";

/** Per-item diagnostic. Failures are counted and dropped, never thrown. */
export interface NormalizationFailure {
  readonly reason: NormalizationFailureReason;
  readonly source: SetupSource | null;
  readonly url: string | null;
  readonly message: string;
}

export type NormalizationOutcome =
  | { readonly ok: true; readonly candidate: SetupCandidate }
  | { readonly ok: false; readonly failure: NormalizationFailure };

const rawItemSchema = z.object({
  source: z.enum(SETUP_SOURCES),
  url: z.string().nullable(),
  title: z.string(),
  body: z.string().nullable(),
});

/** Separators tried by {@link separatorStrategy}, most specific first. */
export const DEFAULT_SEPARATORS: readonly RegExp[] = [
  /\s+at\s+/i,
  /\s+@\s+/,
  /\s+[-–—]\s+/,
  /\s*\|\s*/,
  /\s*:\s+/,
];

const EDGE_PUNCTUATION = /^[\s"'“”‘’()[\]{}<>\-–—:|,.;!?*#]+|[\s"'“”‘’()[\]{}<>\-–—:|,.;!?*#]+$/g;
const LEADING_SETUP_WORDS = /^(?:setups?\s+(?:for\s+)?)/i;
const TRAILING_SETUP_WORDS = /\s*\b(?:setups?|guide|sheet)$/i;

/** Collapses whitespace, normalises to NFC and trims decorative punctuation. */
export function cleanLabel(value: string): string {
  let label = value.normalize("NFC").replace(/\s+/g, " ").trim();
  label = label.replace(LEADING_SETUP_WORDS, "");
  let previous: string;
  do {
    previous = label;
    label = label.replace(EDGE_PUNCTUATION, "").replace(TRAILING_SETUP_WORDS, "");
  } while (label !== previous);
  return label;
}

function cleanNotes(value: string | null): string | null {
  if (value === null) {
    return null;
  }
  const collapsed = value.normalize("NFC").replace(/\s+/g, " ").trim();
  if (collapsed.length === 0) {
    return null;
  }
  return collapsed.length > MAX_NOTES_LENGTH ? collapsed.slice(0, MAX_NOTES_LENGTH) : collapsed;
}

/**
 * Builds a strategy splitting the title on the first separator that matches.
 * The left side is the car; without any separator the whole title is the car
 * and the track stays unresolved.
 */
export function createSeparatorStrategy(separators: readonly RegExp[] = DEFAULT_SEPARATORS): CarTrackStrategy {
  return (item) => {
    const title = item.title.normalize("NFC").replace(/\s+/g, " ").trim();
    for (const separator of separators) {
      const match = separator.exec(title);
      if (!match) {
        continue;
      }
      const car = title.slice(0, match.index);
      const track = title.slice(match.index + match[0].length);
      if (cleanLabel(car).length === 0) {
        continue;
      }
      return { car, track: track.length > 0 ? track : null };
    }
    return { car: title, track: null };
  };
}

export const separatorStrategy: CarTrackStrategy = createSeparatorStrategy();

/**
 * Uses the car/track the run was scoped to when the item mentions that car.
 * Forum titles rarely follow a pattern, but a search scoped to one car mostly
 * returns posts about it.
 */
export const hintStrategy: CarTrackStrategy = (item, context) => {
  const car = context.query?.car?.trim();
  if (!car) {
    return null;
  }
  const haystack = `${item.title} ${item.body ?? ""}`.toLowerCase();
  if (!haystack.includes(car.toLowerCase())) {
    return null;
  }
  const track = context.query?.track?.trim();
  const trackMentioned = track ? haystack.includes(track.toLowerCase()) : false;
  return { car, track: track && trackMentioned ? track : null };
};

/**
 * Reads "... for <car> at <track>" out of a free-text request, the phrasing
 * used by chat prompts.
 */
export const promptStrategy: CarTrackStrategy = (item) => {
  const forMatch = /\bfor\b/i.exec(item.title);
  if (!forMatch) {
    return null;
  }
  const rest = item.title.slice(forMatch.index + forMatch[0].length);
  const atMatch = /\bat\b/i.exec(rest);
  if (!atMatch) {
    return { car: rest, track: null };
  }
  return {
    car: rest.slice(0, atMatch.index),
    track: rest.slice(atMatch.index + atMatch[0].length),
  };
};

/** Chains strategies; the first non-null answer wins. */
export function firstOf(...strategies: readonly CarTrackStrategy[]): CarTrackStrategy {
  return (item, context) => {
    for (const strategy of strategies) {
      const resolved = strategy(item, context);
      if (resolved) {
        return resolved;
      }
    }
    return null;
  };
}

/** Strategy registered for each source when the caller does not override it. */
export const DEFAULT_STRATEGIES: Readonly<Record<SetupSource, CarTrackStrategy>> = {
  "scraped-site-a": separatorStrategy,
  "scraped-site-b": createSeparatorStrategy([/\s*\|\s*/, /\s+[-–—]\s+/, /\s+at\s+/i]),
  "social-api": firstOf(hintStrategy, separatorStrategy),
  ai: promptStrategy,
};

export interface NormalizeOptions extends NormalizationContext {
  readonly strategy?: CarTrackStrategy;
}

/**
 * Turns a raw connector item into a {@link SetupCandidate}. The function never
 * throws: malformed items and unresolved cars come back as failures so a
 * single bad entry cannot discard a batch.
 */
export function normalizeRawItem(input: RawItem, options: NormalizeOptions = {}): NormalizationOutcome {
  const parsed = rawItemSchema.safeParse(input);
  if (!parsed.success) {
    return fail("invalid-item", null, null, parsed.error.issues[0]?.message ?? "invalid raw item");
  }
  const item = parsed.data;
  if (item.title.trim().length === 0) {
    return fail("empty-title", item.source, item.url, "item has no title");
  }

  const strategy = options.strategy ?? DEFAULT_STRATEGIES[item.source];
  let resolved: CarTrack | null;
  try {
    resolved = strategy(item, { query: options.query });
  } catch (error) {
    return fail("invalid-item", item.source, item.url, error instanceof Error ? error.message : String(error));
  }
  const car = resolved ? cleanLabel(resolved.car) : "";
  if (car.length === 0) {
    return fail("unresolved-car", item.source, item.url, `no car found in "${item.title.slice(0, 120)}"`);
  }
  const track = resolved?.track ? cleanLabel(resolved.track) : "";
  const url = item.url?.trim();

  return {
    ok: true,
    candidate: {
      car,
      track: track.length > 0 ? track : UNKNOWN_TRACK,
      url: url && url.length > 0 ? url : NO_URL,
      source: item.source,
      notes: cleanNotes(item.body),
    },
  };
}

function fail(
  reason: NormalizationFailureReason,
  source: SetupSource | null,
  url: string | null,
  message: string,
): NormalizationOutcome {
  return { ok: false, failure: { reason, source, url, message } };
}
