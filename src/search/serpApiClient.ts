import { z } from "zod";

import type { SearchConfig } from "../config/appConfig.js";

import { requestProviderJson } from "./providerRequest.js";
import { ERROR_SEARCH_HTTP, SearchProviderError, type SearchOptions, type SearchProvider, type SearchResult } from "./types.js";

const organicResultSchema = z
  .object({
    title: z.string().optional().nullable(),
    link: z.string().optional().nullable(),
    snippet: z.string().optional().nullable(),
  })
  .passthrough();

const serpApiResponseSchema = z
  .object({
    organic_results: z.array(organicResultSchema).optional(),
    error: z.string().optional(),
  })
  .passthrough();

/** SerpAPI answers HTTP 200 with this kind of message when the engine found nothing. */
const NO_RESULTS_PATTERN = /hasn't returned any results|no results/i;

/** Client for SerpAPI, used as the secondary web search backend. */
export class SerpApiClient implements SearchProvider {
  readonly name = "serpapi";
  private readonly config: SearchConfig["serpapi"];
  private readonly fetchImpl: typeof fetch;

  constructor(config: SearchConfig["serpapi"], fetchImpl: typeof fetch = fetch) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const url = new URL(this.config.baseUrl);
    const params = new URLSearchParams({ q: query, engine: this.config.engine });
    if (this.config.apiKey) {
      params.set("api_key", this.config.apiKey);
    }
    if (options.limit && options.limit > 0) {
      params.set("num", String(Math.min(options.limit, 20)));
    }
    url.search = params.toString();

    const payload = await requestProviderJson({
      provider: this.name,
      url,
      headers: new Headers({ Accept: "application/json" }),
      schema: serpApiResponseSchema,
      fetchImpl: this.fetchImpl,
      signal: options.signal,
    });

    if (payload.error && !payload.organic_results) {
      if (NO_RESULTS_PATTERN.test(payload.error)) {
        return [];
      }
      throw new SearchProviderError(`serpapi reported an error: ${payload.error}`, {
        code: ERROR_SEARCH_HTTP,
        provider: this.name,
      });
    }

    const results: SearchResult[] = [];
    for (const entry of payload.organic_results ?? []) {
      const link = entry.link?.trim();
      if (!link) {
        continue;
      }
      const title = entry.title?.trim();
      results.push({
        title: title && title.length > 0 ? title : link,
        url: link,
        snippet: entry.snippet?.trim() || null,
        provider: this.name,
        position: results.length,
      });
    }
    return results;
  }
}
