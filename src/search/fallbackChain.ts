import type { StructuredLogger } from "../logger.js";

import {
  ERROR_SEARCH_NETWORK,
  ERROR_SEARCH_TIMEOUT,
  SearchProviderError,
  type SearchProvider,
  type SearchResult,
} from "./types.js";

/** Text handed to the completion step when no provider produced results. */
export const NO_INFORMATION_AVAILABLE = "No information available.";

const DEFAULT_RESULT_LIMIT = 3;
const DEFAULT_TIMEOUT_MS = 8_000;

export type SearchAttemptOutcome = "results" | "empty" | "error";

/** Record of one provider call made while resolving a query. */
export interface SearchAttempt {
  readonly provider: string;
  readonly outcome: SearchAttemptOutcome;
  /** Error message for failed attempts, `null` otherwise. */
  readonly message: string | null;
  readonly code: string | null;
  readonly durationMs: number;
}

export interface SearchResolution {
  readonly query: string;
  /** Provider whose results were kept, `null` when every provider failed. */
  readonly provider: string | null;
  readonly results: readonly SearchResult[];
  /** Prompt-ready rendering of {@link results}, or {@link NO_INFORMATION_AVAILABLE}. */
  readonly formatted: string;
  readonly attempts: readonly SearchAttempt[];
}

export interface SearchFallbackChainOptions {
  /** Providers in priority order. */
  readonly providers: readonly SearchProvider[];
  readonly resultLimit?: number;
  readonly timeoutMs?: number;
  readonly logger?: StructuredLogger;
  readonly clock?: () => number;
}

/** Renders results as `- <title>: <url>` lines. */
export function formatSearchResults(results: readonly SearchResult[]): string {
  if (results.length === 0) {
    return NO_INFORMATION_AVAILABLE;
  }
  return results.map((result) => `- ${result.title}: ${result.url}`).join("\n");
}

/**
 * Queries search providers one after the other until one returns results.
 * Providers are never called in parallel, and a provider that answered is
 * never followed by another. {@link resolve} does not reject: when every
 * provider fails the resolution carries the sentinel text instead.
 */
export class SearchFallbackChain {
  private readonly providers: readonly SearchProvider[];
  private readonly resultLimit: number;
  private readonly timeoutMs: number;
  private readonly logger: StructuredLogger | null;
  private readonly clock: () => number;

  constructor(options: SearchFallbackChainOptions) {
    this.providers = options.providers;
    this.resultLimit = Math.max(1, Math.floor(options.resultLimit ?? DEFAULT_RESULT_LIMIT));
    this.timeoutMs = Math.max(1, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.logger = options.logger ?? null;
    this.clock = options.clock ?? (() => Date.now());
  }

  get providerNames(): string[] {
    return this.providers.map((provider) => provider.name);
  }

  async resolve(query: string): Promise<SearchResolution> {
    const trimmed = query.trim();
    const attempts: SearchAttempt[] = [];
    if (trimmed.length === 0) {
      return exhausted(trimmed, attempts);
    }

    for (const provider of this.providers) {
      const started = this.clock();
      try {
        const results = (await this.callWithTimeout(provider, trimmed)).slice(0, this.resultLimit);
        const durationMs = Math.max(0, this.clock() - started);
        if (results.length === 0) {
          attempts.push({ provider: provider.name, outcome: "empty", message: null, code: null, durationMs });
          this.logger?.info("search_provider_empty", { provider: provider.name });
          continue;
        }
        attempts.push({ provider: provider.name, outcome: "results", message: null, code: null, durationMs });
        return {
          query: trimmed,
          provider: provider.name,
          results,
          formatted: formatSearchResults(results),
          attempts,
        };
      } catch (error) {
        const durationMs = Math.max(0, this.clock() - started);
        const message = error instanceof Error ? error.message : String(error);
        const code = error instanceof SearchProviderError ? error.code : null;
        attempts.push({ provider: provider.name, outcome: "error", message, code, durationMs });
        this.logger?.warn("search_provider_failed", { provider: provider.name, code, message });
      }
    }

    this.logger?.warn("search_chain_exhausted", { providers: this.providerNames });
    return exhausted(trimmed, attempts);
  }

  /**
   * Runs one provider under the chain timeout. The signal is forwarded, and
   * the call is also raced so a provider ignoring it cannot stall the chain.
   */
  private callWithTimeout(provider: SearchProvider, query: string): Promise<SearchResult[]> {
    const controller = new AbortController();
    return new Promise<SearchResult[]>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(
          new SearchProviderError(`${provider.name} exceeded ${this.timeoutMs}ms`, {
            code: ERROR_SEARCH_TIMEOUT,
            provider: provider.name,
          }),
        );
      }, this.timeoutMs);

      let pending: Promise<SearchResult[]>;
      try {
        pending = provider.search(query, { signal: controller.signal, limit: this.resultLimit });
      } catch (error) {
        clearTimeout(timer);
        reject(
          new SearchProviderError(`${provider.name} failed synchronously`, {
            code: ERROR_SEARCH_NETWORK,
            provider: provider.name,
            cause: error,
          }),
        );
        return;
      }
      void pending.then(
        (results) => {
          clearTimeout(timer);
          resolve(results);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        },
      );
    });
  }
}

function exhausted(query: string, attempts: readonly SearchAttempt[]): SearchResolution {
  return { query, provider: null, results: [], formatted: NO_INFORMATION_AVAILABLE, attempts };
}
