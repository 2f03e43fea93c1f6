/** Error code emitted when a provider responds with a non-success status. */
export const ERROR_SEARCH_HTTP = "E-SEARCH-HTTP" as const;
/** Error code emitted when the provider payload does not match its schema. */
export const ERROR_SEARCH_SCHEMA = "E-SEARCH-SCHEMA" as const;
/** Error code emitted when the request could not be performed. */
export const ERROR_SEARCH_NETWORK = "E-SEARCH-NETWORK" as const;
/** Error code emitted when the request exceeded its time budget. */
export const ERROR_SEARCH_TIMEOUT = "E-SEARCH-TIMEOUT" as const;

export type SearchProviderErrorCode =
  | typeof ERROR_SEARCH_HTTP
  | typeof ERROR_SEARCH_SCHEMA
  | typeof ERROR_SEARCH_NETWORK
  | typeof ERROR_SEARCH_TIMEOUT;

/** One web result. Results are only used to build a prompt and never stored. */
export interface SearchResult {
  readonly title: string;
  readonly url: string;
  readonly snippet: string | null;
  /** Name of the provider that produced the result. */
  readonly provider: string;
  /** Zero-based rank within the provider response. */
  readonly position: number;
}

export interface SearchOptions {
  readonly signal?: AbortSignal;
  /** Maximum number of results requested from the provider. */
  readonly limit?: number;
}

/** Web search backend consulted by the fallback chain. */
export interface SearchProvider {
  readonly name: string;
  search(query: string, options?: SearchOptions): Promise<SearchResult[]>;
}

/** Error thrown when a provider cannot produce a valid response. */
export class SearchProviderError extends Error {
  public readonly code: SearchProviderErrorCode;
  public readonly provider: string;
  public readonly status: number | null;

  constructor(
    message: string,
    options: {
      code: SearchProviderErrorCode;
      provider: string;
      status?: number | null;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "SearchProviderError";
    this.code = options.code;
    this.provider = options.provider;
    this.status = options.status ?? null;
  }
}
