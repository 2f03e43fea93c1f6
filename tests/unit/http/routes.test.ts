import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import type { AnswerOutcome } from "../../../src/answer/answerService.js";
import { RequestBodyError } from "../../../src/http/body.js";
import { BANNER_MESSAGE, createRouter, toErrorResponse, type RouteRequest } from "../../../src/http/routes.js";
import type { IngestionReport, IngestionRequest } from "../../../src/ingest/coordinator.js";
import type { SearchResolution } from "../../../src/search/fallbackChain.js";
import { StoreError, type SetupStore } from "../../../src/setups/store.js";
import { InMemorySetupStore } from "../../../src/setups/storeMemory.js";
import { makeSetup, steppingClock } from "../../helpers/setups.js";
import { RecordingLogger } from "../../helpers/recordingLogger.js";

const RESOLUTION: SearchResolution = {
  query: "Porsche Spa",
  provider: "brave",
  results: [],
  formatted: "No information available.",
  attempts: [],
};

const REPORT: IngestionReport = {
  startedAt: "2024-05-01T10:00:00.000Z",
  finishedAt: "2024-05-01T10:00:01.000Z",
  query: {},
  totals: { attempted: 0, normalized: 0, inserted: 0, skippedDuplicate: 0, failed: 0, sourcesFailed: 0 },
  sources: [],
};

function request(method: string, path: string, body?: unknown): RouteRequest {
  return { method, url: new URL(path, "http://localhost"), body };
}

function setupRouter(overrides: { answer?: (prompt: string) => Promise<AnswerOutcome>; setups?: SetupStore } = {}) {
  const ingestCalls: IngestionRequest[] = [];
  const searchCalls: string[] = [];
  const logger = new RecordingLogger();
  const setups = overrides.setups ?? new InMemorySetupStore({ clock: steppingClock() });
  const handle = createRouter({
    answer: {
      answer:
        overrides.answer ??
        (async () => {
          throw new Error("answer not expected");
        }),
    },
    ingest: {
      async run(ingestRequest: IngestionRequest = {}) {
        ingestCalls.push(ingestRequest);
        return REPORT;
      },
    },
    search: {
      async resolve(query: string) {
        searchCalls.push(query);
        return RESOLUTION;
      },
    },
    setups,
    logger,
  });
  return { handle, ingestCalls, searchCalls, logger, setups };
}

describe("http/routes", () => {
  it("greets on the root path", async () => {
    const { handle } = setupRouter();

    expect(await handle(request("GET", "/"))).to.deep.equal({ status: 200, body: { message: BANNER_MESSAGE } });
  });

  it("answers unknown paths and methods with error envelopes", async () => {
    const { handle } = setupRouter();

    expect(await handle(request("GET", "/nope"))).to.deep.equal({
      status: 404,
      body: { error: { code: "E-NOT-FOUND", message: "No route for /nope" } },
    });
    expect(await handle(request("DELETE", "/chat"))).to.deep.equal({
      status: 405,
      body: { error: { code: "E-METHOD-NOT-ALLOWED", message: "DELETE is not allowed on /chat" } },
    });
  });

  describe("POST /chat", () => {
    it("returns the answer and the stored setup summary", async () => {
      const answer = sinon.stub<[string], Promise<AnswerOutcome>>().resolves({
        ok: true,
        response: "Use wing 5.",
        exchange: { id: "exchange-1", prompt: "Setup for BMW M4 GT3 at Monza", response: "Use wing 5.", timestamp: "2024-05-01T10:00:00.000Z" },
        setup: { fingerprint: "f".repeat(64), inserted: true },
        search: RESOLUTION,
      });
      const { handle } = setupRouter({ answer });

      const response = await handle(request("POST", "/chat", { prompt: "  Setup for BMW M4 GT3 at Monza " }));

      expect(answer.firstCall.args).to.deep.equal(["Setup for BMW M4 GT3 at Monza"]);
      expect(response).to.deep.equal({
        status: 200,
        body: {
          response: "Use wing 5.",
          setup: { fingerprint: "f".repeat(64), inserted: true },
          exchangeId: "exchange-1",
          searchProvider: "brave",
        },
      });
    });

    it("rejects a blank prompt", async () => {
      const { handle } = setupRouter();

      expect(await handle(request("POST", "/chat", { prompt: "   " }))).to.deep.equal({
        status: 400,
        body: { error: { code: "E-VALIDATION", message: "prompt: prompt must be a non-empty string" } },
      });
    });

    it("maps a completion failure to a bad gateway response", async () => {
      const { handle } = setupRouter({
        answer: async () => ({
          ok: false,
          error: { code: "E-COMPLETION-TIMEOUT", message: "Completion exceeded 100ms", provider: "together" },
          search: RESOLUTION,
        }),
      });

      expect(await handle(request("POST", "/chat", { prompt: "Setup for BMW M4 GT3 at Monza" }))).to.deep.equal({
        status: 502,
        body: { error: { code: "E-COMPLETION-TIMEOUT", message: "Completion exceeded 100ms", provider: "together" } },
      });
    });
  });

  describe("POST /ingest", () => {
    it("forwards the requested sources and scope", async () => {
      const { handle, ingestCalls } = setupRouter();

      const response = await handle(request("POST", "/ingest", { sources: ["forum"], car: " BMW M4 GT3 " }));

      expect(response).to.deep.equal({ status: 200, body: REPORT });
      expect(ingestCalls).to.deep.equal([{ sources: ["forum"], query: { car: "BMW M4 GT3" } }]);
    });

    it("runs every connector for an empty body", async () => {
      const { handle, ingestCalls } = setupRouter();

      await handle(request("POST", "/ingest", {}));

      expect(ingestCalls).to.deep.equal([{ sources: undefined, query: {} }]);
    });

    it("rejects malformed source lists", async () => {
      const { handle, ingestCalls } = setupRouter();

      const response = await handle(request("POST", "/ingest", { sources: "forum" }));

      expect(response.status).to.equal(400);
      expect(ingestCalls).to.deep.equal([]);
    });
  });

  describe("GET /search", () => {
    it("requires a query", async () => {
      const { handle } = setupRouter();

      expect(await handle(request("GET", "/search?q=%20"))).to.deep.equal({
        status: 400,
        body: { error: { code: "E-VALIDATION", message: "q must be a non-empty string" } },
      });
    });

    it("returns the resolution of the fallback chain", async () => {
      const { handle, searchCalls } = setupRouter();

      expect(await handle(request("GET", "/search?q=Porsche+Spa"))).to.deep.equal({ status: 200, body: RESOLUTION });
      expect(searchCalls).to.deep.equal(["Porsche Spa"]);
    });
  });

  describe("GET /setups", () => {
    it("lists recent setups with the store size", async () => {
      const { handle, setups } = setupRouter();
      await setups.insertIfAbsent(makeSetup({ track: "Spa" }));
      await setups.insertIfAbsent(makeSetup({ track: "Monza" }));

      const response = await handle(request("GET", "/setups?limit=1"));

      expect(response.status).to.equal(200);
      expect(response.body).to.deep.equal({
        setups: [{ ...makeSetup({ track: "Monza" }), createdAt: "2024-05-01T10:00:01.000Z" }],
        total: 2,
      });
    });

    it("validates the limit", async () => {
      const { handle } = setupRouter();
      const invalid = {
        status: 400,
        body: { error: { code: "E-VALIDATION", message: "limit must be an integer between 1 and 100" } },
      };

      expect(await handle(request("GET", "/setups?limit=0"))).to.deep.equal(invalid);
      expect(await handle(request("GET", "/setups?limit=abc"))).to.deep.equal(invalid);
      expect(await handle(request("GET", "/setups?limit=101"))).to.deep.equal(invalid);
    });

    it("reports storage failures without leaking details", async () => {
      const failing: SetupStore = {
        exists: sinon.stub().resolves(false),
        insertIfAbsent: sinon.stub().resolves(false),
        recent: sinon.stub().rejects(new StoreError("recent", "journal unreadable")),
        size: sinon.stub().resolves(0),
      };
      const { handle, logger } = setupRouter({ setups: failing });

      expect(await handle(request("GET", "/setups"))).to.deep.equal({
        status: 500,
        body: { error: { code: "E-STORE", message: "Setup storage is unavailable" } },
      });
      expect(logger.find("http_store_failure")?.payload).to.deep.equal({
        operation: "recent",
        message: "journal unreadable",
      });
    });
  });

  it("maps body and unexpected errors", () => {
    expect(toErrorResponse(new RequestBodyError(413, "Request body exceeds 1024 bytes"))).to.deep.equal({
      status: 413,
      body: { error: { code: "E-PAYLOAD-TOO-LARGE", message: "Request body exceeds 1024 bytes" } },
    });
    expect(toErrorResponse(new Error("secret detail"))).to.deep.equal({
      status: 500,
      body: { error: { code: "E-INTERNAL", message: "Internal error" } },
    });
  });
});
