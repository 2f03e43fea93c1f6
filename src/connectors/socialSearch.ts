import { Buffer } from "node:buffer";

import { z } from "zod";

import type { SocialConnectorConfig } from "../config/appConfig.js";
import type { StructuredLogger } from "../logger.js";
import type { IngestionQuery, RawItem } from "../setups/types.js";

import {
  SourceError,
  describeQuery,
  toSourceError,
  type ConnectorFetchOptions,
  type SourceConnector,
} from "./connector.js";

/** A cached token is refreshed this long before the server-side expiry. */
export const TOKEN_REFRESH_MARGIN_MS = 60_000;
const DEFAULT_TOKEN_TIMEOUT_MS = 10_000;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().positive(),
});

const postSchema = z.object({
  title: z.string(),
  selftext: z.string().optional().nullable(),
  permalink: z.string().optional().nullable(),
  url: z.string().optional().nullable(),
});

const listingSchema = z.object({
  data: z.object({
    children: z.array(z.object({ data: postSchema.passthrough() }).passthrough()).default([]),
  }),
});

interface CachedToken {
  readonly value: string;
  readonly expiresAt: number;
}

export interface SocialSearchOptions {
  readonly config: SocialConnectorConfig;
  readonly userAgent: string;
  readonly fetchImpl?: typeof fetch;
  readonly clock?: () => number;
  readonly logger?: StructuredLogger;
  /** Budget of the shared token request, independent of any single run. */
  readonly tokenTimeoutMs?: number;
}

/**
 * Connector searching a forum community through its OAuth API. The
 * application-only token (client credentials grant) is cached and reused
 * until shortly before it expires; concurrent runs share one token request.
 */
export class SocialSearchConnector implements SourceConnector {
  readonly name: string;
  readonly source = "social-api" as const;
  private readonly config: SocialConnectorConfig;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;
  private readonly clock: () => number;
  private readonly logger: StructuredLogger | null;
  private readonly tokenTimeoutMs: number;
  private token: CachedToken | null = null;
  private pendingToken: Promise<string> | null = null;

  constructor(options: SocialSearchOptions) {
    this.config = options.config;
    this.name = options.config.name;
    this.userAgent = options.userAgent;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.clock = options.clock ?? (() => Date.now());
    this.logger = options.logger ?? null;
    this.tokenTimeoutMs = Math.max(1, options.tokenTimeoutMs ?? DEFAULT_TOKEN_TIMEOUT_MS);
  }

  async *fetch(query: IngestionQuery, options: ConnectorFetchOptions = {}): AsyncIterable<RawItem> {
    const token = await this.getAccessToken(options.signal);
    const url = this.buildSearchUrl(query);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: { Authorization: `Bearer ${token}`, "User-Agent": this.userAgent, Accept: "application/json" },
        signal: options.signal,
      });
    } catch (error) {
      throw toSourceError(error, {
        connector: this.name,
        source: this.source,
        stage: "fetch",
        message: `Search request to ${this.name} failed`,
      });
    }

    if (response.status === 401 || response.status === 403) {
      this.token = null;
      throw new SourceError(`${this.name} rejected the access token`, {
        connector: this.name,
        source: this.source,
        stage: "auth",
        status: response.status,
      });
    }
    if (!response.ok) {
      throw new SourceError(`${this.name} search responded with HTTP ${response.status}`, {
        connector: this.name,
        source: this.source,
        stage: "fetch",
        status: response.status,
      });
    }

    const listing = await this.readJson(response, listingSchema, "parse", "search listing");
    for (const child of listing.data.children) {
      const post = child.data;
      const body = post.selftext?.trim();
      yield {
        source: this.source,
        url: this.resolvePostUrl(post),
        title: post.title,
        body: body && body.length > 0 ? body : null,
      };
    }
  }

  /**
   * Returns a valid bearer token, requesting a new one when none is cached or
   * the cached one expires within {@link TOKEN_REFRESH_MARGIN_MS}. The token
   * request is shared and runs under its own timeout; `signal` only stops
   * this caller from waiting for it.
   */
  async getAccessToken(signal?: AbortSignal): Promise<string> {
    if (this.token && this.token.expiresAt - TOKEN_REFRESH_MARGIN_MS > this.clock()) {
      return this.token.value;
    }
    if (!this.pendingToken) {
      this.pendingToken = this.requestSharedToken().finally(() => {
        this.pendingToken = null;
      });
    }
    return this.awaitToken(this.pendingToken, signal);
  }

  buildSearchUrl(query: IngestionQuery): string {
    const url = new URL(`/r/${encodeURIComponent(this.config.community)}/search`, this.config.apiBaseUrl);
    const terms = describeQuery(query);
    url.search = new URLSearchParams({
      q: terms.length > 0 ? `${terms} setup` : "setup",
      restrict_sr: "1",
      sort: "new",
      limit: String(this.config.limit),
      raw_json: "1",
    }).toString();
    return url.toString();
  }

  private async requestSharedToken(): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(
        new SourceError(`Token request to ${this.name} exceeded ${this.tokenTimeoutMs}ms`, {
          connector: this.name,
          source: this.source,
          stage: "timeout",
        }),
      );
    }, this.tokenTimeoutMs);
    try {
      return await this.requestToken(controller.signal);
    } finally {
      clearTimeout(timer);
    }
  }

  private awaitToken(pending: Promise<string>, signal: AbortSignal | undefined): Promise<string> {
    if (!signal) {
      return pending;
    }
    const abandoned = (): SourceError =>
      toSourceError(signal.reason, {
        connector: this.name,
        source: this.source,
        stage: "timeout",
        message: `${this.name} request aborted`,
      });
    if (signal.aborted) {
      return Promise.reject(abandoned());
    }
    return new Promise<string>((resolve, reject) => {
      const onAbort = () => reject(abandoned());
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

  private async requestToken(signal: AbortSignal): Promise<string> {
    const { clientId, clientSecret } = this.config;
    if (!clientId || !clientSecret) {
      throw new SourceError(`${this.name} has no client credentials configured`, {
        connector: this.name,
        source: this.source,
        stage: "auth",
      });
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.config.tokenUrl, {
        method: "POST",
        headers: {
          Authorization: `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString("base64")}`,
          "Content-Type": "application/x-www-form-urlencoded",
          "User-Agent": this.userAgent,
        },
        body: new URLSearchParams({ grant_type: "client_credentials" }).toString(),
        signal,
      });
    } catch (error) {
      if (signal.aborted && signal.reason instanceof SourceError) {
        throw signal.reason;
      }
      throw toSourceError(error, {
        connector: this.name,
        source: this.source,
        stage: "auth",
        message: `Token request to ${this.name} failed`,
      });
    }
    if (!response.ok) {
      throw new SourceError(`${this.name} token endpoint responded with HTTP ${response.status}`, {
        connector: this.name,
        source: this.source,
        stage: "auth",
        status: response.status,
      });
    }

    const payload = await this.readJson(response, tokenResponseSchema, "auth", "token response");
    const issuedAt = this.clock();
    this.token = { value: payload.access_token, expiresAt: issuedAt + payload.expires_in * 1000 };
    this.logger?.info("social_token_refreshed", { connector: this.name, expires_in: payload.expires_in });
    return payload.access_token;
  }

  private async readJson<T>(
    response: Response,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    stage: "auth" | "parse",
    label: string,
  ): Promise<T> {
    let parsed: unknown;
    try {
      parsed = await response.json();
    } catch (error) {
      throw toSourceError(error, {
        connector: this.name,
        source: this.source,
        stage,
        message: `Unable to parse ${this.name} ${label}`,
      });
    }
    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new SourceError(`${this.name} ${label} did not match the expected schema`, {
        connector: this.name,
        source: this.source,
        stage,
        status: response.status,
        cause: result.error,
      });
    }
    return result.data;
  }

  private resolvePostUrl(post: z.infer<typeof postSchema>): string | null {
    if (post.permalink) {
      try {
        return new URL(post.permalink, this.config.siteUrl).toString();
      } catch {
        return null;
      }
    }
    return post.url ?? null;
  }
}
