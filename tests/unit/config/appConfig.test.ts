import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";

import {
  ConfigError,
  DEFAULT_SCRAPER_RULES,
  collectRedactionTokens,
  loadAppConfig,
  loadScraperRules,
  resolveCorsOrigins,
  resolveProviderOrder,
} from "../../../src/config/appConfig.js";

async function captureConfigError(promise: Promise<unknown>): Promise<ConfigError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a configuration error");
}

describe("config/appConfig", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "app-config-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("provides working defaults for an empty environment", async () => {
    const config = await loadAppConfig({});

    expect(config.ingest.parallelism).to.equal(2);
    expect(config.ingest.sourceTimeoutMs).to.equal(20_000);
    expect(config.ingest.scrapers).to.deep.equal(DEFAULT_SCRAPER_RULES);
    expect(config.ingest.social.clientId).to.equal(null);
    expect(config.search.order).to.deep.equal(["brave", "serpapi"]);
    expect(config.search.resultLimit).to.equal(3);
    expect(config.search.brave.apiKey).to.equal(null);
    expect(config.completion.model).to.equal("mistralai/Mixtral-8x7B-Instruct-v0.1");
    expect(config.completion.temperature).to.equal(0.5);
    expect(config.answer.recentSetupLimit).to.equal(5);
    expect(config.storage).to.deep.equal({ dataDir: null, fsyncMode: "interval" });
    expect(config.http).to.deep.equal({
      host: "127.0.0.1",
      port: 8080,
      maxBodyBytes: 65_536,
      cors: { allowedOrigins: ["*"], allowCredentials: true },
    });
    expect(config.logging.file).to.equal(null);
  });

  it("applies environment overrides", async () => {
    const config = await loadAppConfig({
      INGEST_PARALLEL: "4",
      SEARCH_PROVIDER_ORDER: "SerpAPI, brave",
      SEARCH_RESULT_LIMIT: "5",
      BRAVE_API_KEY: "test-brave-key",
      SOCIAL_CLIENT_ID: "test-client",
      SOCIAL_CLIENT_SECRET: "test-secret",
      RECENT_SETUP_LIMIT: "0",
      STORE_FSYNC: "always",
      DATA_DIR: directory,
      HTTP_PORT: "0",
      CORS_ALLOWED_ORIGINS: "https://chat.test/, https://admin.test",
      CORS_ALLOW_CREDENTIALS: "off",
    });

    expect(config.ingest.parallelism).to.equal(4);
    expect(config.search.order).to.deep.equal(["serpapi", "brave"]);
    expect(config.search.resultLimit).to.equal(5);
    expect(config.search.brave.apiKey).to.equal("test-brave-key");
    expect(config.ingest.social.clientSecret).to.equal("test-secret");
    expect(config.answer.recentSetupLimit).to.equal(0);
    expect(config.storage).to.deep.equal({ dataDir: path.resolve(directory), fsyncMode: "always" });
    expect(config.http.port).to.equal(0);
    expect(config.http.cors).to.deep.equal({
      allowedOrigins: ["https://chat.test", "https://admin.test"],
      allowCredentials: false,
    });
  });

  it("loads scraper rules from a JSON file and fills defaults", async () => {
    const file = path.join(directory, "rules.json");
    await writeFile(
      file,
      JSON.stringify([
        { name: "local", source: "scraped-site-b", url: "https://setups.test/?q={query}", itemSelector: "li" },
      ]),
      "utf8",
    );

    const config = await loadAppConfig({ SCRAPER_RULES_FILE: file });

    expect(config.ingest.scrapers).to.deep.equal([
      {
        name: "local",
        source: "scraped-site-b",
        url: "https://setups.test/?q={query}",
        itemSelector: "li",
        maxItems: 25,
      },
    ]);
  });

  it("reports unreadable, malformed and invalid rule files", async () => {
    const invalid = path.join(directory, "invalid.json");
    const malformed = path.join(directory, "malformed.json");
    await writeFile(
      invalid,
      JSON.stringify([{ name: "x", source: "scraped-site-c", url: "https://x.test", itemSelector: "li" }]),
      "utf8",
    );
    await writeFile(malformed, "[{", "utf8");

    const missing = await captureConfigError(loadScraperRules(path.join(directory, "missing.json")));
    const badJson = await captureConfigError(loadScraperRules(malformed));
    const badRule = await captureConfigError(loadScraperRules(invalid));

    expect(missing.message).to.equal(`Unable to read scraper rules from ${path.join(directory, "missing.json")}`);
    expect(badJson.message).to.equal(`Scraper rules file ${malformed} is not valid JSON`);
    expect(badRule.message.startsWith(`Scraper rules file ${invalid} is invalid at 0.source: `)).to.equal(true);
    expect(badRule.code).to.equal("E-CONFIG");
  });

  it("restores the default provider order when nothing usable is configured", () => {
    expect(resolveProviderOrder(undefined)).to.deep.equal(["brave", "serpapi"]);
    expect(resolveProviderOrder("bing, duckduckgo")).to.deep.equal(["brave", "serpapi"]);
    expect(resolveProviderOrder("serpapi")).to.deep.equal(["serpapi"]);
  });

  it("admits any origin unless an allow-list is configured", () => {
    expect(resolveCorsOrigins(undefined)).to.deep.equal(["*"]);
    expect(resolveCorsOrigins(" , /")).to.deep.equal(["*"]);
    expect(resolveCorsOrigins("https://chat.test//,https://chat.test")).to.deep.equal(["https://chat.test"]);
  });

  it("collects every configured secret once for log redaction", async () => {
    const config = await loadAppConfig({
      BRAVE_API_KEY: "test-shared-key",
      SERPAPI_KEY: "test-shared-key",
      TOGETHER_API_KEY: "test-llm-key",
      SOCIAL_CLIENT_SECRET: "test-secret",
    });

    expect(collectRedactionTokens(config)).to.deep.equal(["test-shared-key", "test-llm-key", "test-secret"]);
  });
});
