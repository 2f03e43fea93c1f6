import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";

/** Headers applied to every response. */
export function applySecurityHeaders(res: Pick<ServerResponse, "setHeader">): void {
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Referrer-Policy", "no-referrer");
}

/** Cross-origin policy applied by {@link applyCorsHeaders}. */
export interface CorsPolicy {
  readonly allowedOrigins: readonly string[];
  readonly allowCredentials: boolean;
}

export const CORS_ALLOWED_METHODS = "GET, POST, OPTIONS";
const DEFAULT_ALLOWED_HEADERS = "Content-Type, X-Request-Id";
const PREFLIGHT_MAX_AGE_SECONDS = "600";

/**
 * Adds the `Access-Control-Allow-*` headers when the request carries an
 * allowed `Origin`. Credentialed responses echo the origin, since browsers
 * refuse a wildcard together with credentials. Returns whether the origin was
 * admitted.
 */
export function applyCorsHeaders(
  req: Pick<IncomingMessage, "headers">,
  res: Pick<ServerResponse, "setHeader">,
  policy: CorsPolicy,
): boolean {
  const origin = req.headers.origin;
  if (typeof origin !== "string" || origin.length === 0) {
    return false;
  }
  const wildcard = policy.allowedOrigins.includes("*");
  if (!wildcard && !policy.allowedOrigins.includes(origin)) {
    return false;
  }

  if (wildcard && !policy.allowCredentials) {
    res.setHeader("Access-Control-Allow-Origin", "*");
  } else {
    res.setHeader("Access-Control-Allow-Origin", origin);
    res.setHeader("Vary", "Origin");
  }
  if (policy.allowCredentials) {
    res.setHeader("Access-Control-Allow-Credentials", "true");
  }
  res.setHeader("Access-Control-Allow-Methods", CORS_ALLOWED_METHODS);
  const requested = req.headers["access-control-request-headers"];
  res.setHeader(
    "Access-Control-Allow-Headers",
    typeof requested === "string" && requested.trim() ? requested.trim() : DEFAULT_ALLOWED_HEADERS,
  );
  res.setHeader("Access-Control-Max-Age", PREFLIGHT_MAX_AGE_SECONDS);
  return true;
}

/**
 * Returns the correlation id of the request, reusing the one a proxy set in
 * `x-request-id` or minting a UUID, and echoes it on the response.
 */
export function ensureRequestId(
  req: Pick<IncomingMessage, "headers">,
  res: Pick<ServerResponse, "setHeader">,
): string {
  const incoming = req.headers["x-request-id"];
  const requestId = typeof incoming === "string" && incoming.trim() ? incoming.trim() : randomUUID();
  res.setHeader("x-request-id", requestId);
  return requestId;
}
