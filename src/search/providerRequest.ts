import type { z } from "zod";

import {
  ERROR_SEARCH_HTTP,
  ERROR_SEARCH_NETWORK,
  ERROR_SEARCH_SCHEMA,
  ERROR_SEARCH_TIMEOUT,
  SearchProviderError,
} from "./types.js";

export interface ProviderRequest<T> {
  readonly provider: string;
  readonly url: URL;
  readonly headers: Headers;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  readonly fetchImpl: typeof fetch;
  readonly signal?: AbortSignal;
}

/**
 * Performs a GET against a search API and validates the JSON body. Every
 * failure surfaces as a {@link SearchProviderError} so callers only have one
 * error type to classify.
 */
export async function requestProviderJson<T>(request: ProviderRequest<T>): Promise<T> {
  const { provider, url, headers, schema, fetchImpl, signal } = request;

  let response: Response;
  try {
    response = await fetchImpl(url, { method: "GET", headers, signal });
  } catch (error) {
    if (signal?.aborted || isAbortError(error)) {
      throw new SearchProviderError(`${provider} query timed out`, {
        code: ERROR_SEARCH_TIMEOUT,
        provider,
        cause: error,
      });
    }
    throw new SearchProviderError(`Failed to execute request against ${provider}`, {
      code: ERROR_SEARCH_NETWORK,
      provider,
      cause: error,
    });
  }

  if (!response.ok) {
    throw new SearchProviderError(`${provider} responded with HTTP ${response.status}`, {
      code: ERROR_SEARCH_HTTP,
      provider,
      status: response.status,
    });
  }

  const contentType = response.headers.get("content-type") ?? "";
  if (!contentType.includes("json")) {
    throw new SearchProviderError(`${provider} returned a non-JSON payload`, {
      code: ERROR_SEARCH_HTTP,
      provider,
      status: response.status,
    });
  }

  let parsed: unknown;
  try {
    parsed = await response.json();
  } catch (error) {
    throw new SearchProviderError(`Unable to parse ${provider} JSON payload`, {
      code: ERROR_SEARCH_SCHEMA,
      provider,
      status: response.status,
      cause: error,
    });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new SearchProviderError(`${provider} payload did not match the expected schema`, {
      code: ERROR_SEARCH_SCHEMA,
      provider,
      status: response.status,
      cause: result.error,
    });
  }
  return result.data;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}
