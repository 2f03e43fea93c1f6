/**
 * Public entry point for the search subsystem: provider clients, the
 * fallback chain and the factory wiring them from configuration.
 */
import type { SearchConfig, SearchProviderName } from "../config/appConfig.js";
import type { StructuredLogger } from "../logger.js";

import { BraveSearchClient } from "./braveClient.js";
import { SearchFallbackChain } from "./fallbackChain.js";
import { SerpApiClient } from "./serpApiClient.js";
import type { SearchProvider } from "./types.js";

export { BraveSearchClient } from "./braveClient.js";
export { SerpApiClient } from "./serpApiClient.js";
export {
  NO_INFORMATION_AVAILABLE,
  SearchFallbackChain,
  formatSearchResults,
  type SearchAttempt,
  type SearchAttemptOutcome,
  type SearchResolution,
} from "./fallbackChain.js";
export * from "./types.js";

export interface SearchDependencies {
  readonly fetchImpl?: typeof fetch;
  readonly logger?: StructuredLogger;
}

/**
 * Instantiates the providers named in {@link SearchConfig.order}, in that
 * order. Providers without an API key are skipped with a warning.
 */
export function buildSearchProviders(config: SearchConfig, deps: SearchDependencies = {}): SearchProvider[] {
  const providers: SearchProvider[] = [];
  for (const name of config.order) {
    const provider = createProvider(name, config, deps.fetchImpl);
    if (provider) {
      providers.push(provider);
    } else {
      deps.logger?.warn("search_provider_disabled", { provider: name, reason: "missing api key" });
    }
  }
  return providers;
}

export function buildSearchChain(config: SearchConfig, deps: SearchDependencies = {}): SearchFallbackChain {
  return new SearchFallbackChain({
    providers: buildSearchProviders(config, deps),
    resultLimit: config.resultLimit,
    timeoutMs: config.timeoutMs,
    logger: deps.logger,
  });
}

function createProvider(
  name: SearchProviderName,
  config: SearchConfig,
  fetchImpl: typeof fetch | undefined,
): SearchProvider | null {
  switch (name) {
    case "brave":
      return config.brave.apiKey ? new BraveSearchClient(config.brave, fetchImpl) : null;
    case "serpapi":
      return config.serpapi.apiKey ? new SerpApiClient(config.serpapi, fetchImpl) : null;
  }
}
