import { z } from "zod";

import type { AnswerOutcome } from "../answer/answerService.js";
import type { IngestionReport, IngestionRequest } from "../ingest/coordinator.js";
import type { StructuredLogger } from "../logger.js";
import type { SearchResolution } from "../search/fallbackChain.js";
import { ERROR_STORE, StoreError, type SetupStore } from "../setups/store.js";

import { RequestBodyError } from "./body.js";

export const ERROR_VALIDATION = "E-VALIDATION" as const;
export const ERROR_NOT_FOUND = "E-NOT-FOUND" as const;
export const ERROR_METHOD = "E-METHOD-NOT-ALLOWED" as const;
export const ERROR_INTERNAL = "E-INTERNAL" as const;

/** Greeting served on `GET /`. */
export const BANNER_MESSAGE = "Sim racing setup assistant is running.";

const DEFAULT_SETUP_PAGE = 20;
const MAX_SETUP_PAGE = 100;
const MAX_PROMPT_LENGTH = 4_000;

const chatBodySchema = z.object({
  prompt: z.string().trim().min(1, "prompt must be a non-empty string").max(MAX_PROMPT_LENGTH),
});

const optionalLabel = z.string().trim().min(1).max(200).optional();

const ingestBodySchema = z.object({
  sources: z.array(z.string().trim().min(1)).max(20).optional(),
  car: optionalLabel,
  track: optionalLabel,
});

const limitSchema = z.coerce.number().int().min(1).max(MAX_SETUP_PAGE);

export interface RouteRequest {
  readonly method: string;
  readonly url: URL;
  /** Parsed JSON body. `undefined` for requests without one. */
  readonly body?: unknown;
}

export interface RouteResponse {
  readonly status: number;
  readonly body: unknown;
}

export interface RouterDependencies {
  readonly answer: { answer(prompt: string): Promise<AnswerOutcome> };
  readonly ingest: { run(request?: IngestionRequest): Promise<IngestionReport> };
  readonly search: { resolve(query: string): Promise<SearchResolution> };
  readonly setups: SetupStore;
  readonly logger?: StructuredLogger;
}

/** Routes whose handler needs a JSON body. */
export const ROUTES_WITH_BODY: ReadonlySet<string> = new Set(["POST /chat", "POST /ingest"]);

type Handler = (request: RouteRequest) => Promise<RouteResponse>;

/**
 * Builds the request handler. The handler never throws: validation, store and
 * unexpected failures are turned into JSON error responses.
 */
export function createRouter(deps: RouterDependencies): (request: RouteRequest) => Promise<RouteResponse> {
  const routes = new Map<string, Map<string, Handler>>([
    ["/", new Map<string, Handler>([["GET", async () => ({ status: 200, body: { message: BANNER_MESSAGE } })]])],
    ["/chat", new Map<string, Handler>([["POST", (request: RouteRequest) => handleChat(deps, request)]])],
    ["/ingest", new Map<string, Handler>([["POST", (request: RouteRequest) => handleIngest(deps, request)]])],
    ["/search", new Map<string, Handler>([["GET", (request: RouteRequest) => handleSearch(deps, request)]])],
    ["/setups", new Map<string, Handler>([["GET", (request: RouteRequest) => handleSetups(deps, request)]])],
  ]);

  return async (request) => {
    const byMethod = routes.get(request.url.pathname);
    if (!byMethod) {
      return errorResponse(404, ERROR_NOT_FOUND, `No route for ${request.url.pathname}`);
    }
    const handler = byMethod.get(request.method.toUpperCase());
    if (!handler) {
      return errorResponse(405, ERROR_METHOD, `${request.method} is not allowed on ${request.url.pathname}`);
    }
    try {
      return await handler(request);
    } catch (error) {
      return toErrorResponse(error, deps.logger);
    }
  };
}

/** Maps an error raised while serving a request to its JSON response. */
export function toErrorResponse(error: unknown, logger?: StructuredLogger): RouteResponse {
  if (error instanceof RequestBodyError) {
    return errorResponse(error.status, error.code, error.message);
  }
  if (error instanceof z.ZodError) {
    const issue = error.issues[0];
    const location = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return errorResponse(400, ERROR_VALIDATION, `${location}${issue?.message ?? "invalid request"}`);
  }
  if (error instanceof StoreError) {
    logger?.error("http_store_failure", { operation: error.operation, message: error.message });
    return errorResponse(500, ERROR_STORE, "Setup storage is unavailable");
  }
  logger?.error("http_request_failure", { message: error instanceof Error ? error.message : String(error) });
  return errorResponse(500, ERROR_INTERNAL, "Internal error");
}

function errorResponse(status: number, code: string, message: string): RouteResponse {
  return { status, body: { error: { code, message } } };
}

async function handleChat(deps: RouterDependencies, request: RouteRequest): Promise<RouteResponse> {
  const { prompt } = chatBodySchema.parse(request.body);
  const outcome = await deps.answer.answer(prompt);
  if (!outcome.ok) {
    return { status: 502, body: { error: outcome.error } };
  }
  return {
    status: 200,
    body: {
      response: outcome.response,
      setup: outcome.setup,
      exchangeId: outcome.exchange.id,
      searchProvider: outcome.search.provider,
    },
  };
}

async function handleIngest(deps: RouterDependencies, request: RouteRequest): Promise<RouteResponse> {
  const body = ingestBodySchema.parse(request.body ?? {});
  const report = await deps.ingest.run({
    sources: body.sources,
    query: {
      ...(body.car ? { car: body.car } : {}),
      ...(body.track ? { track: body.track } : {}),
    },
  });
  return { status: 200, body: report };
}

async function handleSearch(deps: RouterDependencies, request: RouteRequest): Promise<RouteResponse> {
  const query = request.url.searchParams.get("q")?.trim() ?? "";
  if (query.length === 0) {
    return errorResponse(400, ERROR_VALIDATION, "q must be a non-empty string");
  }
  const resolution = await deps.search.resolve(query);
  return { status: 200, body: resolution };
}

async function handleSetups(deps: RouterDependencies, request: RouteRequest): Promise<RouteResponse> {
  const rawLimit = request.url.searchParams.get("limit");
  let limit = DEFAULT_SETUP_PAGE;
  if (rawLimit !== null) {
    const parsed = limitSchema.safeParse(rawLimit);
    if (!parsed.success) {
      return errorResponse(400, ERROR_VALIDATION, `limit must be an integer between 1 and ${MAX_SETUP_PAGE}`);
    }
    limit = parsed.data;
  }
  const setups = await deps.setups.recent(limit);
  return { status: 200, body: { setups, total: await deps.setups.size() } };
}
