import { IncomingMessage, ServerResponse } from "node:http";
import { Socket } from "node:net";

import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import type { CorsPolicy } from "../../src/http/headers.js";
import type { RouteRequest, RouteResponse } from "../../src/http/routes.js";
import { DEFAULT_CORS_POLICY, serveRequest, type RequestContext } from "../../src/httpServer.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

interface Exchange {
  readonly req: IncomingMessage;
  readonly res: ServerResponse;
  readonly end: sinon.SinonSpy;
}

function exchange(method: string, url: string, headers: Record<string, string> = {}): Exchange {
  const req = new IncomingMessage(new Socket());
  req.method = method;
  req.url = url;
  Object.assign(req.headers, { host: "localhost:8080", ...headers });
  const res = new ServerResponse(req);
  return { req, res, end: sinon.spy(res, "end") };
}

function context(overrides: { cors?: CorsPolicy; handler?: (request: RouteRequest) => Promise<RouteResponse> } = {}) {
  const route: (request: RouteRequest) => Promise<RouteResponse> =
    overrides.handler ?? (async () => ({ status: 200, body: { message: "ok" } }));
  const handler = sinon.spy(route);
  const logger = new RecordingLogger();
  const value: RequestContext = {
    handler,
    maxBodyBytes: 1_024,
    cors: overrides.cors ?? DEFAULT_CORS_POLICY,
    logger,
  };
  return { value, handler, logger };
}

describe("httpServer/serveRequest", () => {
  it("answers an unparsable request target with a validation error", async () => {
    const { req, res, end } = exchange("GET", "/", { host: "[" });
    const { value, handler, logger } = context();

    await serveRequest(req, res, value);

    expect(res.statusCode).to.equal(400);
    expect(end.firstCall.args[0]).to.equal(
      '{"error":{"code":"E-VALIDATION","message":"Request target is not a valid URL"}}',
    );
    expect(handler.called).to.equal(false);
    expect(logger.find("http_request_completed")?.payload).to.deep.include({ method: "GET", route: "/", status: 400 });
  });

  it("routes ordinary requests and reports the response size", async () => {
    const { req, res, end } = exchange("GET", "/setups?limit=2");
    const { value, handler, logger } = context();

    await serveRequest(req, res, value);

    expect(handler.firstCall.args[0].url.searchParams.get("limit")).to.equal("2");
    expect(res.statusCode).to.equal(200);
    expect(res.getHeader("content-type")).to.equal("application/json");
    expect(end.firstCall.args[0]).to.equal('{"message":"ok"}');
    expect(logger.find("http_request_completed")?.payload).to.deep.include({ route: "/setups", bytes_out: 16 });
  });

  it("answers CORS preflights without reaching the router", async () => {
    const { req, res } = exchange("OPTIONS", "/chat", {
      origin: "https://chat.test",
      "access-control-request-method": "POST",
      "access-control-request-headers": "content-type",
    });
    const { value, handler } = context();

    await serveRequest(req, res, value);

    expect(res.statusCode).to.equal(204);
    expect(handler.called).to.equal(false);
    expect(res.getHeader("access-control-allow-origin")).to.equal("https://chat.test");
    expect(res.getHeader("access-control-allow-credentials")).to.equal("true");
    expect(res.getHeader("access-control-allow-methods")).to.equal("GET, POST, OPTIONS");
    expect(res.getHeader("access-control-allow-headers")).to.equal("content-type");
    expect(res.getHeader("vary")).to.equal("Origin");
  });

  it("uses a wildcard origin when credentials are disabled", async () => {
    const { req, res } = exchange("GET", "/", { origin: "https://chat.test" });
    const { value } = context({ cors: { allowedOrigins: ["*"], allowCredentials: false } });

    await serveRequest(req, res, value);

    expect(res.statusCode).to.equal(200);
    expect(res.getHeader("access-control-allow-origin")).to.equal("*");
    expect(res.getHeader("access-control-allow-credentials")).to.equal(undefined);
  });

  it("omits CORS headers for origins outside the allow-list", async () => {
    const { req, res } = exchange("GET", "/", { origin: "https://other.test" });
    const { value } = context({ cors: { allowedOrigins: ["https://chat.test"], allowCredentials: false } });

    await serveRequest(req, res, value);

    expect(res.statusCode).to.equal(200);
    expect(res.getHeader("access-control-allow-origin")).to.equal(undefined);
    expect(res.getHeader("x-content-type-options")).to.equal("nosniff");
  });
});
