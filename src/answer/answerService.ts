import type { ChatHistoryStore } from "../history/store.js";
import type { StructuredLogger } from "../logger.js";
import type { SearchResolution } from "../search/fallbackChain.js";
import { fingerprintCandidate } from "../setups/fingerprint.js";
import type { SetupStore } from "../setups/store.js";
import type { ChatExchange } from "../setups/types.js";

import {
  ERROR_COMPLETION_NETWORK,
  ERROR_COMPLETION_TIMEOUT,
  ProviderError,
  type CompletionProvider,
  type ProviderErrorCode,
} from "./completionClient.js";
import { assembleContext, type AssembledContext } from "./contextAssembler.js";
import { extractSetupObject, normalizeGeneratedSetup } from "./setupExtraction.js";

const DEFAULT_RECENT_SETUP_LIMIT = 5;
const DEFAULT_COMPLETION_TIMEOUT_MS = 60_000;

/** Anything able to turn a query into search context. */
export interface SearchResolver {
  resolve(query: string): Promise<SearchResolution>;
}

export interface StoredSetupSummary {
  readonly fingerprint: string;
  /** `false` when an identical setup was already stored. */
  readonly inserted: boolean;
}

export type AnswerOutcome =
  | {
      readonly ok: true;
      readonly response: string;
      readonly exchange: ChatExchange;
      readonly setup: StoredSetupSummary | null;
      readonly search: SearchResolution;
    }
  | {
      readonly ok: false;
      readonly error: { readonly code: ProviderErrorCode; readonly message: string; readonly provider: string };
      readonly search: SearchResolution;
    };

export interface AnswerServiceOptions {
  readonly search: SearchResolver;
  readonly completion: CompletionProvider;
  readonly setups: SetupStore;
  readonly history: ChatHistoryStore;
  readonly recentSetupLimit?: number;
  readonly completionTimeoutMs?: number;
  readonly logger?: StructuredLogger;
}

/**
 * Answers a setup request: gathers search results and recently stored setups,
 * asks the completion provider, then records the exchange. A completion
 * failure is returned as a value and leaves history and setups untouched;
 * store failures propagate.
 */
export class AnswerService {
  private readonly search: SearchResolver;
  private readonly completion: CompletionProvider;
  private readonly setups: SetupStore;
  private readonly history: ChatHistoryStore;
  private readonly recentSetupLimit: number;
  private readonly completionTimeoutMs: number;
  private readonly logger: StructuredLogger | null;

  constructor(options: AnswerServiceOptions) {
    this.search = options.search;
    this.completion = options.completion;
    this.setups = options.setups;
    this.history = options.history;
    this.recentSetupLimit = Math.max(0, Math.floor(options.recentSetupLimit ?? DEFAULT_RECENT_SETUP_LIMIT));
    this.completionTimeoutMs = Math.max(1, options.completionTimeoutMs ?? DEFAULT_COMPLETION_TIMEOUT_MS);
    this.logger = options.logger ?? null;
  }

  async answer(prompt: string): Promise<AnswerOutcome> {
    const query = prompt.trim();
    if (query.length === 0) {
      throw new RangeError("prompt must be a non-empty string");
    }

    const search = await this.search.resolve(query);
    const recent = this.recentSetupLimit > 0 ? await this.setups.recent(this.recentSetupLimit) : [];
    const context = assembleContext({ query, search, recent });

    let response: string;
    try {
      response = await this.completeWithTimeout(context);
    } catch (error) {
      const failure =
        error instanceof ProviderError
          ? error
          : new ProviderError("Completion provider failed", {
              code: ERROR_COMPLETION_NETWORK,
              provider: this.completion.name,
              cause: error,
            });
      this.logger?.warn("answer_completion_failed", {
        provider: failure.provider,
        code: failure.code,
        status: failure.status,
        message: failure.message,
      });
      return {
        ok: false,
        error: { code: failure.code, message: failure.message, provider: failure.provider },
        search,
      };
    }

    const exchange = await this.history.append({ prompt: query, response });
    const setup = await this.storeGeneratedSetup(query, response);
    this.logger?.info("answer_completed", {
      exchange_id: exchange.id,
      search_provider: search.provider,
      setup_stored: setup?.inserted ?? false,
    });
    return { ok: true, response, exchange, setup, search };
  }

  private async storeGeneratedSetup(prompt: string, response: string): Promise<StoredSetupSummary | null> {
    const parsed = extractSetupObject(response);
    if (!parsed) {
      return null;
    }
    const outcome = normalizeGeneratedSetup(prompt, parsed);
    if (!outcome.ok) {
      this.logger?.info("answer_setup_unresolved", { reason: outcome.failure.reason, message: outcome.failure.message });
      return null;
    }
    const record = fingerprintCandidate(outcome.candidate);
    const inserted = await this.setups.insertIfAbsent(record);
    return { fingerprint: record.fingerprint, inserted };
  }

  private completeWithTimeout(context: AssembledContext): Promise<string> {
    const controller = new AbortController();
    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(
          new ProviderError(`Completion exceeded ${this.completionTimeoutMs}ms`, {
            code: ERROR_COMPLETION_TIMEOUT,
            provider: this.completion.name,
          }),
        );
      }, this.completionTimeoutMs);
      void this.completion.complete(context, { signal: controller.signal }).then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        },
      );
    });
  }
}
