import { describe, it } from "mocha";
import { expect } from "chai";

import type { IngestConfig } from "../../../src/config/appConfig.js";
import { buildConnectors } from "../../../src/connectors/index.js";
import { makeRule, makeSocialConfig } from "../../helpers/connectors.js";
import { RecordingLogger } from "../../helpers/recordingLogger.js";

function makeIngestConfig(overrides: Partial<IngestConfig> = {}): IngestConfig {
  return {
    parallelism: 2,
    sourceTimeoutMs: 1_000,
    userAgent: "tests",
    scrapers: [makeRule(), makeRule({ name: "setup-market", source: "scraped-site-b" })],
    social: makeSocialConfig(),
    ...overrides,
  };
}

describe("connectors/buildConnectors", () => {
  it("creates one scraper per rule plus the social connector", () => {
    const connectors = buildConnectors(makeIngestConfig());

    expect(connectors.map((connector) => [connector.name, connector.source])).to.deep.equal([
      ["setup-library", "scraped-site-a"],
      ["setup-market", "scraped-site-b"],
      ["forum", "social-api"],
    ]);
  });

  it("leaves the social connector out when credentials are missing", () => {
    const logger = new RecordingLogger();

    const connectors = buildConnectors(makeIngestConfig({ social: makeSocialConfig({ clientId: null }) }), { logger });

    expect(connectors.map((connector) => connector.name)).to.deep.equal(["setup-library", "setup-market"]);
    expect(logger.messages("warn")).to.deep.equal(["social_connector_disabled"]);
  });

  it("rejects duplicate connector names", () => {
    expect(() => buildConnectors(makeIngestConfig({ scrapers: [makeRule(), makeRule()] }))).to.throw(
      'Duplicate connector name "setup-library"',
    );
  });
});
