import { z } from "zod";

import type { SearchConfig } from "../config/appConfig.js";

import { requestProviderJson } from "./providerRequest.js";
import type { SearchOptions, SearchProvider, SearchResult } from "./types.js";

const braveResultSchema = z
  .object({
    title: z.string().optional().nullable(),
    url: z.string().optional().nullable(),
    description: z.string().optional().nullable(),
  })
  .passthrough();

/** Brave omits the `web` section entirely when nothing matched. */
const braveResponseSchema = z
  .object({
    web: z
      .object({
        results: z.array(braveResultSchema).default([]),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/** Client for the Brave web search API. */
export class BraveSearchClient implements SearchProvider {
  readonly name = "brave";
  private readonly config: SearchConfig["brave"];
  private readonly fetchImpl: typeof fetch;

  constructor(config: SearchConfig["brave"], fetchImpl: typeof fetch = fetch) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const url = new URL(this.config.baseUrl);
    const params = new URLSearchParams({ q: query });
    if (options.limit && options.limit > 0) {
      params.set("count", String(Math.min(options.limit, 20)));
    }
    url.search = params.toString();

    const headers = new Headers({ Accept: "application/json" });
    if (this.config.apiKey) {
      headers.set("X-Subscription-Token", this.config.apiKey);
    }

    const payload = await requestProviderJson({
      provider: this.name,
      url,
      headers,
      schema: braveResponseSchema,
      fetchImpl: this.fetchImpl,
      signal: options.signal,
    });

    const results: SearchResult[] = [];
    for (const entry of payload.web?.results ?? []) {
      const link = entry.url?.trim();
      if (!link) {
        continue;
      }
      const title = entry.title?.trim();
      results.push({
        title: title && title.length > 0 ? title : link,
        url: link,
        snippet: entry.description?.trim() || null,
        provider: this.name,
        position: results.length,
      });
    }
    return results;
  }
}
