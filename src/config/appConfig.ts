import { readFile } from "node:fs/promises";
import { resolve as resolvePath } from "node:path";

import { z } from "zod";

import type { FsyncMode } from "../infra/jsonlJournal.js";

import {
  parseCsvList,
  readBool,
  readEnum,
  readInt,
  readNumber,
  readOptionalString,
  readString,
  type EnvSource,
} from "./env.js";

/** Default timeout (ms) applied to each search provider attempt. */
const DEFAULT_SEARCH_TIMEOUT_MS = 8_000;
/** Default timeout (ms) applied to a whole connector run. */
const DEFAULT_SOURCE_TIMEOUT_MS = 20_000;
/** Default timeout (ms) for the completion request. */
const DEFAULT_COMPLETION_TIMEOUT_MS = 60_000;
/** Search results kept per query to bound the prompt size. */
const DEFAULT_SEARCH_RESULT_LIMIT = 3;
/** Recent setups quoted in the answer prompt. */
const DEFAULT_RECENT_SETUP_LIMIT = 5;

export const SEARCH_PROVIDER_NAMES = ["brave", "serpapi"] as const;
export type SearchProviderName = (typeof SEARCH_PROVIDER_NAMES)[number];

const FSYNC_MODES: readonly FsyncMode[] = ["always", "interval", "never"];

/**
 * Selector rule describing how to pull setup entries out of one site. Site
 * markup changes without notice, so rules live in configuration rather than
 * code.
 */
export const scraperRuleSchema = z.object({
  name: z.string().trim().min(1),
  source: z.enum(["scraped-site-a", "scraped-site-b"]),
  /** Page to fetch. `{query}` is replaced by the URL-encoded search terms. */
  url: z.string().trim().min(1),
  /** URL used when the run is not scoped to a car or track. Defaults to {@link url} with an empty query. */
  listingUrl: z.string().trim().min(1).optional(),
  itemSelector: z.string().trim().min(1),
  titleSelector: z.string().trim().min(1).optional(),
  linkSelector: z.string().trim().min(1).optional(),
  notesSelector: z.string().trim().min(1).optional(),
  maxItems: z.number().int().positive().max(200).default(25),
});

export type ScraperRule = z.infer<typeof scraperRuleSchema>;

const scraperRulesFileSchema = z.array(scraperRuleSchema);

export const DEFAULT_SCRAPER_RULES: readonly ScraperRule[] = [
  {
    name: "setup-library",
    source: "scraped-site-a",
    url: "https://www.simracingsetup.com/?s={query}",
    itemSelector: "article",
    titleSelector: ".entry-title",
    linkSelector: ".entry-title a",
    notesSelector: ".entry-summary",
    maxItems: 25,
  },
  {
    name: "setup-market",
    source: "scraped-site-b",
    url: "https://www.racedepartment.com/search/?q={query}&t=resource",
    listingUrl: "https://www.racedepartment.com/downloads/categories/setups.13/",
    itemSelector: ".structItem--resource",
    titleSelector: ".structItem-title",
    linkSelector: ".structItem-title a",
    notesSelector: ".structItem-resourceTagLine",
    maxItems: 25,
  },
];

export interface SocialConnectorConfig {
  readonly name: string;
  readonly tokenUrl: string;
  readonly apiBaseUrl: string;
  /** Public site used to build links to posts. */
  readonly siteUrl: string;
  readonly clientId: string | null;
  readonly clientSecret: string | null;
  readonly community: string;
  readonly limit: number;
}

export interface IngestConfig {
  readonly parallelism: number;
  readonly sourceTimeoutMs: number;
  readonly userAgent: string;
  readonly scrapers: readonly ScraperRule[];
  readonly social: SocialConnectorConfig;
}

export interface SearchConfig {
  readonly order: readonly SearchProviderName[];
  readonly resultLimit: number;
  readonly timeoutMs: number;
  readonly brave: { readonly baseUrl: string; readonly apiKey: string | null };
  readonly serpapi: { readonly baseUrl: string; readonly apiKey: string | null; readonly engine: string };
}

export interface CompletionConfig {
  readonly baseUrl: string;
  readonly apiKey: string | null;
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly timeoutMs: number;
}

export interface AnswerConfig {
  readonly recentSetupLimit: number;
}

export interface StorageConfig {
  /** Directory holding the JSONL journals. `null` keeps everything in memory. */
  readonly dataDir: string | null;
  readonly fsyncMode: FsyncMode;
}

export interface CorsConfig {
  /** Origins allowed to call the API from a browser. `*` admits any origin. */
  readonly allowedOrigins: readonly string[];
  readonly allowCredentials: boolean;
}

export interface HttpConfig {
  readonly host: string;
  readonly port: number;
  readonly maxBodyBytes: number;
  readonly cors: CorsConfig;
}

export interface LoggingConfig {
  readonly file: string | null;
}

/** Static configuration object handed to the composition root. */
export interface AppConfig {
  readonly ingest: IngestConfig;
  readonly search: SearchConfig;
  readonly completion: CompletionConfig;
  readonly answer: AnswerConfig;
  readonly storage: StorageConfig;
  readonly http: HttpConfig;
  readonly logging: LoggingConfig;
}

/** Error raised when a configuration file cannot be used. */
export class ConfigError extends Error {
  public readonly code = "E-CONFIG" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ConfigError";
  }
}

/**
 * Reads the search fallback order. Unknown provider names are dropped; an
 * empty result restores the default order.
 */
export function resolveProviderOrder(raw: string | undefined): SearchProviderName[] {
  const order: SearchProviderName[] = [];
  for (const entry of parseCsvList(raw ?? "")) {
    const match = SEARCH_PROVIDER_NAMES.find((name) => name === entry.toLowerCase());
    if (match) {
      order.push(match);
    }
  }
  return order.length > 0 ? order : [...SEARCH_PROVIDER_NAMES];
}

/**
 * Reads the browser origins allowed by CORS. Trailing slashes are dropped so
 * entries compare equal to the `Origin` header; nothing configured admits any
 * origin.
 */
export function resolveCorsOrigins(raw: string | undefined): string[] {
  const origins = new Set(
    parseCsvList(raw ?? "")
      .map((origin) => origin.replace(/\/+$/, ""))
      .filter((origin) => origin.length > 0),
  );
  return origins.size > 0 ? [...origins] : ["*"];
}

/** Loads and validates a JSON file holding an array of {@link ScraperRule}. */
export async function loadScraperRules(file: string): Promise<ScraperRule[]> {
  let raw: string;
  try {
    raw = await readFile(file, "utf8");
  } catch (error) {
    throw new ConfigError(`Unable to read scraper rules from ${file}`, { cause: error });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Scraper rules file ${file} is not valid JSON`, { cause: error });
  }
  const result = scraperRulesFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(
      `Scraper rules file ${file} is invalid at ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "unknown"}`,
      { cause: result.error },
    );
  }
  return result.data;
}

/**
 * Assembles the configuration from environment variables. Defaults work for
 * a local run; providers without credentials are left out by the composition
 * root instead of failing here.
 */
export async function loadAppConfig(env: EnvSource = process.env): Promise<AppConfig> {
  const rulesFile = readOptionalString("SCRAPER_RULES_FILE", env);
  const scrapers = rulesFile ? await loadScraperRules(resolvePath(rulesFile)) : [...DEFAULT_SCRAPER_RULES];
  const dataDir = readOptionalString("DATA_DIR", env);

  return {
    ingest: {
      parallelism: readInt("INGEST_PARALLEL", 2, { min: 1, max: 16 }, env),
      sourceTimeoutMs: readInt("INGEST_SOURCE_TIMEOUT_MS", DEFAULT_SOURCE_TIMEOUT_MS, { min: 1 }, env),
      userAgent: readString("INGEST_USER_AGENT", "setup-scout/0.1", env),
      scrapers,
      social: {
        name: readString("SOCIAL_CONNECTOR_NAME", "reddit", env),
        tokenUrl: readString("SOCIAL_TOKEN_URL", "https://www.reddit.com/api/v1/access_token", env),
        apiBaseUrl: readString("SOCIAL_API_BASE_URL", "https://oauth.reddit.com", env),
        siteUrl: readString("SOCIAL_SITE_URL", "https://www.reddit.com", env),
        clientId: readOptionalString("SOCIAL_CLIENT_ID", env) ?? null,
        clientSecret: readOptionalString("SOCIAL_CLIENT_SECRET", env) ?? null,
        community: readString("SOCIAL_COMMUNITY", "simracing", env),
        limit: readInt("SOCIAL_RESULT_LIMIT", 10, { min: 1, max: 100 }, env),
      },
    },
    search: {
      order: resolveProviderOrder(readOptionalString("SEARCH_PROVIDER_ORDER", env)),
      resultLimit: readInt("SEARCH_RESULT_LIMIT", DEFAULT_SEARCH_RESULT_LIMIT, { min: 1, max: 20 }, env),
      timeoutMs: readInt("SEARCH_TIMEOUT_MS", DEFAULT_SEARCH_TIMEOUT_MS, { min: 1 }, env),
      brave: {
        baseUrl: readString("BRAVE_BASE_URL", "https://api.search.brave.com/res/v1/web/search", env),
        apiKey: readOptionalString("BRAVE_API_KEY", env) ?? null,
      },
      serpapi: {
        baseUrl: readString("SERPAPI_BASE_URL", "https://serpapi.com/search", env),
        apiKey: readOptionalString("SERPAPI_KEY", env) ?? null,
        engine: readString("SERPAPI_ENGINE", "google", env),
      },
    },
    completion: {
      baseUrl: readString("COMPLETION_BASE_URL", "https://api.together.xyz/v1", env),
      apiKey: readOptionalString("TOGETHER_API_KEY", env) ?? null,
      model: readString("COMPLETION_MODEL", "mistralai/Mixtral-8x7B-Instruct-v0.1", env),
      temperature: readNumber("COMPLETION_TEMPERATURE", 0.5, { min: 0, max: 2 }, env),
      maxTokens: readInt("COMPLETION_MAX_TOKENS", 700, { min: 1, max: 32_000 }, env),
      timeoutMs: readInt("COMPLETION_TIMEOUT_MS", DEFAULT_COMPLETION_TIMEOUT_MS, { min: 1 }, env),
    },
    answer: {
      recentSetupLimit: readInt("RECENT_SETUP_LIMIT", DEFAULT_RECENT_SETUP_LIMIT, { min: 0, max: 50 }, env),
    },
    storage: {
      dataDir: dataDir ? resolvePath(dataDir) : null,
      fsyncMode: readEnum("STORE_FSYNC", FSYNC_MODES, "interval", env),
    },
    http: {
      host: readString("HTTP_HOST", "127.0.0.1", env),
      port: readInt("HTTP_PORT", 8080, { min: 0, max: 65_535 }, env),
      maxBodyBytes: readInt("HTTP_MAX_BODY_BYTES", 64 * 1024, { min: 1_024 }, env),
      cors: {
        allowedOrigins: resolveCorsOrigins(readOptionalString("CORS_ALLOWED_ORIGINS", env)),
        allowCredentials: readBool("CORS_ALLOW_CREDENTIALS", true, env),
      },
    },
    logging: {
      file: readOptionalString("LOG_FILE", env) ?? null,
    },
  };
}

/**
 * Returns the secrets that must be scrubbed from log entries. Only non-empty
 * values are surfaced so the list can be handed straight to the logger.
 */
export function collectRedactionTokens(config: AppConfig): string[] {
  const candidates = [
    config.search.brave.apiKey,
    config.search.serpapi.apiKey,
    config.completion.apiKey,
    config.ingest.social.clientSecret,
  ];
  const deduped = new Set<string>();
  for (const candidate of candidates) {
    const trimmed = candidate?.trim();
    if (trimmed) {
      deduped.add(trimmed);
    }
  }
  return [...deduped];
}
