import type { IngestionQuery, RawItem, SetupSource } from "../setups/types.js";

/** Phase of a connector run that failed. */
export type SourceErrorStage = "auth" | "fetch" | "parse" | "timeout";

/** Options handed to {@link SourceConnector.fetch}. */
export interface ConnectorFetchOptions {
  /** Aborted by the coordinator when the per-source timeout elapses. */
  readonly signal?: AbortSignal;
}

/**
 * Adapter pulling raw setup entries from one external source. Items are
 * yielded as they are parsed so the coordinator can persist a partial batch
 * when the source fails midway.
 */
export interface SourceConnector {
  /** Stable identifier used in reports and logs. */
  readonly name: string;
  /** Provenance tag stamped on every item. */
  readonly source: SetupSource;
  fetch(query: IngestionQuery, options?: ConnectorFetchOptions): AsyncIterable<RawItem>;
}

/** Failure raised by a connector. Carries enough context for the run report. */
export class SourceError extends Error {
  public readonly code = "E-SOURCE" as const;
  public readonly connector: string;
  public readonly source: SetupSource;
  public readonly stage: SourceErrorStage;
  public readonly status: number | null;

  constructor(
    message: string,
    options: {
      connector: string;
      source: SetupSource;
      stage: SourceErrorStage;
      status?: number | null;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "SourceError";
    this.connector = options.connector;
    this.source = options.source;
    this.stage = options.stage;
    this.status = options.status ?? null;
  }
}

/** Builds the free-text query sent to search-capable sources. */
export function describeQuery(query: IngestionQuery): string {
  return [query.car, query.track]
    .map((part) => part?.trim() ?? "")
    .filter((part) => part.length > 0)
    .join(" ");
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

/**
 * Wraps a failed request into a {@link SourceError}. Aborts map to the
 * `timeout` stage; everything else keeps the stage of the caller.
 */
export function toSourceError(
  error: unknown,
  context: { connector: string; source: SetupSource; stage: SourceErrorStage; message: string },
): SourceError {
  if (error instanceof SourceError) {
    return error;
  }
  if (isAbortError(error)) {
    return new SourceError(`${context.connector} request aborted`, {
      connector: context.connector,
      source: context.source,
      stage: "timeout",
      cause: error,
    });
  }
  return new SourceError(context.message, {
    connector: context.connector,
    source: context.source,
    stage: context.stage,
    cause: error,
  });
}
