import pLimit from "p-limit";

import { SourceError, toSourceError, type SourceConnector, type SourceErrorStage } from "../connectors/connector.js";
import type { StructuredLogger } from "../logger.js";
import { fingerprintCandidate } from "../setups/fingerprint.js";
import { normalizeRawItem, type NormalizationFailureReason } from "../setups/normalizer.js";
import { StoreError, type SetupStore } from "../setups/store.js";
import type { IngestionQuery, RawItem, SetupSource } from "../setups/types.js";

/** Default number of connectors running at the same time. */
const DEFAULT_PARALLELISM = 2;
/** Default wall-clock budget granted to a single connector run. */
const DEFAULT_SOURCE_TIMEOUT_MS = 20_000;

/** Stage recorded when a requested connector does not exist. */
export type SourceReportStage = SourceErrorStage | "config";

/** Machine readable summary of the error that ended a connector run. */
export interface SourceErrorSummary {
  readonly stage: SourceReportStage;
  readonly message: string;
  readonly status: number | null;
}

/** Per-connector outcome of an ingestion run. */
export interface SourceReport {
  readonly connector: string;
  /** `null` when the requested connector is unknown. */
  readonly source: SetupSource | null;
  /** Raw items received from the connector. */
  readonly attempted: number;
  /** Items that produced a candidate. */
  readonly normalized: number;
  readonly inserted: number;
  readonly skippedDuplicate: number;
  /** Items rejected by the normalizer, grouped by reason. */
  readonly failed: number;
  readonly failureReasons: Readonly<Partial<Record<NormalizationFailureReason, number>>>;
  readonly error: SourceErrorSummary | null;
  readonly durationMs: number;
}

export interface IngestionTotals {
  readonly attempted: number;
  readonly normalized: number;
  readonly inserted: number;
  readonly skippedDuplicate: number;
  readonly failed: number;
  /** Connectors whose run ended with an error. */
  readonly sourcesFailed: number;
}

export interface IngestionReport {
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly query: IngestionQuery;
  readonly totals: IngestionTotals;
  readonly sources: readonly SourceReport[];
}

export interface IngestionRequest {
  /** Connector names or source tags. Defaults to every registered connector. */
  readonly sources?: readonly string[];
  readonly query?: IngestionQuery;
}

export interface IngestionCoordinatorOptions {
  readonly connectors: readonly SourceConnector[];
  readonly store: SetupStore;
  readonly parallelism?: number;
  readonly sourceTimeoutMs?: number;
  readonly logger?: StructuredLogger;
  readonly clock?: () => number;
}

interface MutableCounters {
  attempted: number;
  normalized: number;
  inserted: number;
  skippedDuplicate: number;
  failed: number;
  failureReasons: Partial<Record<NormalizationFailureReason, number>>;
}

/**
 * Runs source connectors and commits their items to the setup store. Each
 * connector is isolated: its failure or timeout is recorded in its own report
 * entry and the items it produced before failing stay committed. A store
 * failure is not isolated and rejects the run.
 */
export class IngestionCoordinator {
  private readonly connectors: readonly SourceConnector[];
  private readonly store: SetupStore;
  private readonly parallelism: number;
  private readonly sourceTimeoutMs: number;
  private readonly logger: StructuredLogger | null;
  private readonly clock: () => number;

  constructor(options: IngestionCoordinatorOptions) {
    this.connectors = options.connectors;
    this.store = options.store;
    this.parallelism = Math.max(1, Math.floor(options.parallelism ?? DEFAULT_PARALLELISM));
    this.sourceTimeoutMs = Math.max(1, options.sourceTimeoutMs ?? DEFAULT_SOURCE_TIMEOUT_MS);
    this.logger = options.logger ?? null;
    this.clock = options.clock ?? (() => Date.now());
  }

  /** Names of the registered connectors, in registration order. */
  listConnectors(): string[] {
    return this.connectors.map((connector) => connector.name);
  }

  async run(request: IngestionRequest = {}): Promise<IngestionReport> {
    const startedAt = new Date(this.clock()).toISOString();
    const query = request.query ?? {};
    const { selected, unknown } = this.select(request.sources);

    this.logger?.info("ingest_run_started", {
      connectors: selected.map((connector) => connector.name),
      unknown,
      query,
    });

    const limit = pLimit(this.parallelism);
    const reports = await Promise.all(selected.map((connector) => limit(() => this.runConnector(connector, query))));
    const sources = [...reports, ...unknown.map((name) => unknownSourceReport(name))];
    const totals = summarise(sources);
    const finishedAt = new Date(this.clock()).toISOString();

    this.logger?.info("ingest_run_completed", { ...totals });
    return { startedAt, finishedAt, query, totals, sources };
  }

  private select(requested: readonly string[] | undefined): { selected: SourceConnector[]; unknown: string[] } {
    if (!requested || requested.length === 0) {
      return { selected: [...this.connectors], unknown: [] };
    }
    const selected: SourceConnector[] = [];
    const unknown: string[] = [];
    for (const raw of requested) {
      const name = raw.trim();
      const matches = this.connectors.filter((connector) => connector.name === name || connector.source === name);
      if (matches.length === 0) {
        if (!unknown.includes(name)) {
          unknown.push(name);
        }
        continue;
      }
      for (const match of matches) {
        if (!selected.includes(match)) {
          selected.push(match);
        }
      }
    }
    return { selected, unknown };
  }

  private async runConnector(connector: SourceConnector, query: IngestionQuery): Promise<SourceReport> {
    const started = this.clock();
    const counters: MutableCounters = {
      attempted: 0,
      normalized: 0,
      inserted: 0,
      skippedDuplicate: 0,
      failed: 0,
      failureReasons: {},
    };
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(
        new SourceError(`${connector.name} exceeded ${this.sourceTimeoutMs}ms`, {
          connector: connector.name,
          source: connector.source,
          stage: "timeout",
        }),
      );
    }, this.sourceTimeoutMs);

    let error: SourceErrorSummary | null = null;
    let iterator: AsyncIterator<RawItem> | null = null;
    try {
      iterator = connector.fetch(query, { signal: controller.signal })[Symbol.asyncIterator]();
      while (true) {
        const step = await this.raceAbort(iterator.next(), controller.signal, connector);
        if (step.done) {
          break;
        }
        await this.commit(step.value, query, counters, connector);
      }
    } catch (cause) {
      if (cause instanceof StoreError) {
        throw cause;
      }
      const sourceError = controller.signal.aborted
        ? timeoutError(connector, controller.signal, cause)
        : toSourceError(cause, {
            connector: connector.name,
            source: connector.source,
            stage: "fetch",
            message: cause instanceof Error ? cause.message : String(cause),
          });
      error = { stage: sourceError.stage, message: sourceError.message, status: sourceError.status };
      this.logger?.warn("ingest_source_failed", {
        connector: connector.name,
        stage: sourceError.stage,
        status: sourceError.status,
        message: sourceError.message,
        attempted: counters.attempted,
      });
      if (controller.signal.aborted && iterator?.return) {
        void iterator.return().catch((closeError: unknown) => {
          this.logger?.debug("ingest_source_close_failed", {
            connector: connector.name,
            message: closeError instanceof Error ? closeError.message : String(closeError),
          });
        });
      }
    } finally {
      clearTimeout(timer);
    }

    const report: SourceReport = {
      connector: connector.name,
      source: connector.source,
      attempted: counters.attempted,
      normalized: counters.normalized,
      inserted: counters.inserted,
      skippedDuplicate: counters.skippedDuplicate,
      failed: counters.failed,
      failureReasons: { ...counters.failureReasons },
      error,
      durationMs: Math.max(0, this.clock() - started),
    };
    this.logger?.info("ingest_source_completed", {
      connector: report.connector,
      attempted: report.attempted,
      inserted: report.inserted,
      skipped_duplicate: report.skippedDuplicate,
      failed: report.failed,
      error: report.error?.stage ?? null,
    });
    return report;
  }

  private async commit(
    item: RawItem,
    query: IngestionQuery,
    counters: MutableCounters,
    connector: SourceConnector,
  ): Promise<void> {
    counters.attempted += 1;
    const outcome = normalizeRawItem(item, { query });
    if (!outcome.ok) {
      counters.failed += 1;
      const reason = outcome.failure.reason;
      counters.failureReasons[reason] = (counters.failureReasons[reason] ?? 0) + 1;
      this.logger?.debug("ingest_item_rejected", {
        connector: connector.name,
        reason,
        url: outcome.failure.url,
        message: outcome.failure.message,
      });
      return;
    }
    counters.normalized += 1;
    const record = fingerprintCandidate(outcome.candidate);
    const inserted = await this.store.insertIfAbsent(record);
    if (inserted) {
      counters.inserted += 1;
    } else {
      counters.skippedDuplicate += 1;
    }
  }

  /**
   * Resolves with the connector's next step unless the run is aborted first.
   * Connectors that ignore the signal are abandoned rather than awaited.
   */
  private raceAbort<T>(pending: Promise<T>, signal: AbortSignal, connector: SourceConnector): Promise<T> {
    if (signal.aborted) {
      void pending.catch((error: unknown) => this.reportLateFailure(connector, error));
      return Promise.reject(signal.reason);
    }
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        void pending.catch((error: unknown) => this.reportLateFailure(connector, error));
        reject(signal.reason);
      };
      signal.addEventListener("abort", onAbort, { once: true });
      void pending.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        },
      );
    });
  }

  private reportLateFailure(connector: SourceConnector, error: unknown): void {
    this.logger?.debug("ingest_source_late_failure", {
      connector: connector.name,
      message: error instanceof Error ? error.message : String(error),
    });
  }
}

function timeoutError(connector: SourceConnector, signal: AbortSignal, cause: unknown): SourceError {
  if (signal.reason instanceof SourceError) {
    return signal.reason;
  }
  return new SourceError(`${connector.name} timed out`, {
    connector: connector.name,
    source: connector.source,
    stage: "timeout",
    cause,
  });
}

function unknownSourceReport(name: string): SourceReport {
  return {
    connector: name,
    source: null,
    attempted: 0,
    normalized: 0,
    inserted: 0,
    skippedDuplicate: 0,
    failed: 0,
    failureReasons: {},
    error: { stage: "config", message: `Unknown source connector "${name}"`, status: null },
    durationMs: 0,
  };
}

function summarise(reports: readonly SourceReport[]): IngestionTotals {
  let attempted = 0;
  let normalized = 0;
  let inserted = 0;
  let skippedDuplicate = 0;
  let failed = 0;
  let sourcesFailed = 0;
  for (const report of reports) {
    attempted += report.attempted;
    normalized += report.normalized;
    inserted += report.inserted;
    skippedDuplicate += report.skippedDuplicate;
    failed += report.failed;
    if (report.error) {
      sourcesFailed += 1;
    }
  }
  return { attempted, normalized, inserted, skippedDuplicate, failed, sourcesFailed };
}
