import { Buffer } from "node:buffer";

import * as cheerio from "cheerio";

import type { ScraperRule } from "../config/appConfig.js";
import type { StructuredLogger } from "../logger.js";
import type { IngestionQuery, RawItem } from "../setups/types.js";

import {
  SourceError,
  describeQuery,
  toSourceError,
  type ConnectorFetchOptions,
  type SourceConnector,
} from "./connector.js";

/** Maximum HTML payload accepted from a listing page. */
const MAX_PAGE_BYTES = 2 * 1024 * 1024;

export interface SiteScraperOptions {
  readonly rule: ScraperRule;
  readonly userAgent: string;
  readonly fetchImpl?: typeof fetch;
  readonly logger?: StructuredLogger;
  readonly maxPageBytes?: number;
}

/**
 * Resolves the page to fetch for a run. Scoped runs fill `{query}` in the
 * rule URL; unscoped runs use the listing page when the rule has one.
 */
export function resolveScrapeUrl(rule: ScraperRule, query: IngestionQuery): string {
  const terms = describeQuery(query);
  if (terms.length === 0 && rule.listingUrl) {
    return rule.listingUrl;
  }
  return rule.url.split("{query}").join(encodeURIComponent(terms));
}

/**
 * Connector reading setup listings out of HTML pages. Extraction is driven by
 * CSS selectors from configuration; a selector matching nothing yields zero
 * items and a warning rather than an error, since markup drift is expected.
 */
export class SiteScraperConnector implements SourceConnector {
  readonly name: string;
  readonly source: ScraperRule["source"];
  private readonly rule: ScraperRule;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: StructuredLogger | null;
  private readonly maxPageBytes: number;

  constructor(options: SiteScraperOptions) {
    this.rule = options.rule;
    this.name = options.rule.name;
    this.source = options.rule.source;
    this.userAgent = options.userAgent;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? null;
    this.maxPageBytes = options.maxPageBytes ?? MAX_PAGE_BYTES;
  }

  async *fetch(query: IngestionQuery, options: ConnectorFetchOptions = {}): AsyncIterable<RawItem> {
    const url = resolveScrapeUrl(this.rule, query);
    const html = await this.download(url, options.signal);

    let items: RawItem[];
    try {
      items = this.extract(html, url);
    } catch (error) {
      throw toSourceError(error, {
        connector: this.name,
        source: this.source,
        stage: "parse",
        message: `Unable to parse ${url}`,
      });
    }

    if (items.length === 0) {
      this.logger?.warn("scraper_selector_no_match", {
        connector: this.name,
        url,
        item_selector: this.rule.itemSelector,
      });
    }
    for (const item of items) {
      yield item;
    }
  }

  /** Applies the rule selectors to {@link html}. Relative links resolve against {@link pageUrl}. */
  extract(html: string, pageUrl: string): RawItem[] {
    const $ = cheerio.load(html);
    const items: RawItem[] = [];
    $(this.rule.itemSelector).each((_, element) => {
      if (items.length >= this.rule.maxItems) {
        return false;
      }
      const node = $(element);
      const titleNode = this.rule.titleSelector ? node.find(this.rule.titleSelector).first() : node;
      const title = collapse(titleNode.text());
      const linkNode = this.rule.linkSelector ? node.find(this.rule.linkSelector).first() : node.find("a").first();
      const notes = this.rule.notesSelector ? collapse(node.find(this.rule.notesSelector).text()) : "";

      items.push({
        source: this.source,
        url: absolutise(linkNode.attr("href"), pageUrl),
        title,
        body: notes.length > 0 ? notes : null,
      });
      return undefined;
    });
    return items;
  }

  private async download(url: string, signal: AbortSignal | undefined): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: { Accept: "text/html,application/xhtml+xml", "User-Agent": this.userAgent },
        signal,
      });
    } catch (error) {
      throw toSourceError(error, {
        connector: this.name,
        source: this.source,
        stage: "fetch",
        message: `Failed to fetch ${url}`,
      });
    }

    if (!response.ok) {
      throw new SourceError(`${this.name} responded with HTTP ${response.status}`, {
        connector: this.name,
        source: this.source,
        stage: "fetch",
        status: response.status,
      });
    }

    const declared = Number(response.headers.get("content-length") ?? "0");
    if (Number.isFinite(declared) && declared > this.maxPageBytes) {
      throw this.oversized(response.status);
    }

    try {
      return await this.readPage(response);
    } catch (error) {
      throw toSourceError(error, {
        connector: this.name,
        source: this.source,
        stage: "fetch",
        message: `Failed to read ${url}`,
      });
    }
  }

  /** Reads the body chunk by chunk, giving up as soon as the page outgrows the cap. */
  private async readPage(response: Response): Promise<string> {
    const body = response.body;
    if (!body) {
      return "";
    }
    const reader = body.getReader();
    const chunks: Buffer[] = [];
    let total = 0;
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      total += value.byteLength;
      if (total > this.maxPageBytes) {
        await reader.cancel();
        throw this.oversized(response.status);
      }
      chunks.push(Buffer.from(value));
    }
    return Buffer.concat(chunks, total).toString("utf8");
  }

  private oversized(status: number): SourceError {
    return new SourceError(`${this.name} page exceeds ${this.maxPageBytes} bytes`, {
      connector: this.name,
      source: this.source,
      stage: "fetch",
      status,
    });
  }
}

function collapse(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function absolutise(href: string | undefined, base: string): string | null {
  const trimmed = href?.trim();
  if (!trimmed) {
    return null;
  }
  try {
    return new URL(trimmed, base).toString();
  } catch {
    return null;
  }
}
