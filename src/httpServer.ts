import { Buffer } from "node:buffer";
import { createServer as createHttpServer, type IncomingMessage, type Server as NodeHttpServer, type ServerResponse } from "node:http";

import { DEFAULT_MAX_BODY_BYTES, RequestBodyError, readJsonBody } from "./http/body.js";
import { applyCorsHeaders, applySecurityHeaders, ensureRequestId, type CorsPolicy } from "./http/headers.js";
import { ROUTES_WITH_BODY, toErrorResponse, type RouteRequest, type RouteResponse } from "./http/routes.js";
import type { StructuredLogger } from "./logger.js";

export interface HttpRuntimeOptions {
  readonly host: string;
  readonly port: number;
  readonly maxBodyBytes?: number;
  readonly cors?: CorsPolicy;
}

/** Any origin, with credentials, the way browser front-ends of the chat expect. */
export const DEFAULT_CORS_POLICY: CorsPolicy = { allowedOrigins: ["*"], allowCredentials: true };

export interface HttpServerHandle {
  close(): Promise<void>;
  /** Port actually bound, useful when `0` was requested. */
  readonly port: number;
}

export type RequestHandler = (request: RouteRequest) => Promise<RouteResponse>;

/** Everything {@link serveRequest} needs besides the exchange itself. */
export interface RequestContext {
  readonly handler: RequestHandler;
  readonly maxBodyBytes: number;
  readonly cors: CorsPolicy;
  readonly logger: StructuredLogger;
}

/**
 * Starts the JSON HTTP API. Each request is logged once it completes; handler
 * failures never escape the request callback.
 */
export async function startHttpServer(
  handler: RequestHandler,
  options: HttpRuntimeOptions,
  logger: StructuredLogger,
): Promise<HttpServerHandle> {
  const context: RequestContext = {
    handler,
    maxBodyBytes: options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES,
    cors: options.cors ?? DEFAULT_CORS_POLICY,
    logger,
  };

  const httpServer = createHttpServer((req, res) => {
    void serveRequest(req, res, context).catch((error: unknown) => {
      logger.error("http_request_unhandled", { message: error instanceof Error ? error.message : String(error) });
      if (!res.headersSent) {
        res.statusCode = 500;
      }
      res.end();
    });
  });

  httpServer.on("error", (error) => {
    logger.error("http_server_error", { message: error instanceof Error ? error.message : String(error) });
  });

  httpServer.on("clientError", (error, socket) => {
    logger.warn("http_client_error", { message: error instanceof Error ? error.message : String(error) });
    socket.end("HTTP/1.1 400 Bad Request\r\n\r\n");
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off("error", reject);
      logger.info("http_listening", {
        host: options.host,
        port: extractListeningPort(httpServer),
        requested_port: options.port,
      });
      resolve();
    });
  });

  return {
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    },
    port: extractListeningPort(httpServer),
  };
}

/**
 * Serves one exchange: hardening and CORS headers, `OPTIONS` preflights,
 * body parsing and routing. Every failure, including an unparsable request
 * target, is answered with a JSON error envelope.
 */
export async function serveRequest(req: IncomingMessage, res: ServerResponse, context: RequestContext): Promise<void> {
  const startedAt = process.hrtime.bigint();
  applySecurityHeaders(res);
  applyCorsHeaders(req, res, context.cors);
  const requestId = ensureRequestId(req, res);
  const method = (req.method ?? "GET").toUpperCase();
  let route = req.url ?? "/";

  let result: RouteResponse | null;
  try {
    const url = parseRequestUrl(req);
    route = url.pathname;
    if (method === "OPTIONS") {
      result = null;
    } else {
      const body = ROUTES_WITH_BODY.has(`${method} ${url.pathname}`)
        ? (await readJsonBody(req, context.maxBodyBytes)).parsed
        : undefined;
      result = await context.handler({ method, url, body });
    }
  } catch (error) {
    result = toErrorResponse(error, context.logger);
  }

  let bytesOut = 0;
  if (result === null) {
    res.statusCode = 204;
    res.end();
  } else {
    const payload = JSON.stringify(result.body);
    bytesOut = Buffer.byteLength(payload, "utf8");
    res.statusCode = result.status;
    res.setHeader("Content-Type", "application/json");
    res.end(payload, "utf8");
  }

  context.logger.info("http_request_completed", {
    request_id: requestId,
    method,
    route,
    status: res.statusCode,
    bytes_out: bytesOut,
    duration_ms: Number(process.hrtime.bigint() - startedAt) / 1_000_000,
  });
}

function parseRequestUrl(req: Pick<IncomingMessage, "url" | "headers">): URL {
  try {
    return new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  } catch (error) {
    throw new RequestBodyError(400, "Request target is not a valid URL", { cause: error });
  }
}

function extractListeningPort(server: NodeHttpServer): number {
  const address = server.address();
  if (typeof address === "object" && address && typeof address.port === "number") {
    return address.port;
  }
  return 0;
}
