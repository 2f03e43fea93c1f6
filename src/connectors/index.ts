import type { IngestConfig } from "../config/appConfig.js";
import type { StructuredLogger } from "../logger.js";

import type { SourceConnector } from "./connector.js";
import { SiteScraperConnector } from "./siteScraper.js";
import { SocialSearchConnector } from "./socialSearch.js";

export * from "./connector.js";
export { SiteScraperConnector, resolveScrapeUrl } from "./siteScraper.js";
export { SocialSearchConnector, TOKEN_REFRESH_MARGIN_MS } from "./socialSearch.js";

export interface ConnectorDependencies {
  readonly fetchImpl?: typeof fetch;
  readonly logger?: StructuredLogger;
  readonly clock?: () => number;
}

/**
 * Instantiates one connector per scraper rule plus the social connector when
 * client credentials are configured. Connector names must be unique since the
 * coordinator selects them by name.
 */
export function buildConnectors(config: IngestConfig, deps: ConnectorDependencies = {}): SourceConnector[] {
  const connectors: SourceConnector[] = config.scrapers.map(
    (rule) =>
      new SiteScraperConnector({
        rule,
        userAgent: config.userAgent,
        fetchImpl: deps.fetchImpl,
        logger: deps.logger,
      }),
  );

  if (config.social.clientId && config.social.clientSecret) {
    connectors.push(
      new SocialSearchConnector({
        config: config.social,
        userAgent: config.userAgent,
        fetchImpl: deps.fetchImpl,
        clock: deps.clock,
        logger: deps.logger,
        tokenTimeoutMs: config.sourceTimeoutMs,
      }),
    );
  } else {
    deps.logger?.warn("social_connector_disabled", { reason: "missing client credentials" });
  }

  const seen = new Set<string>();
  for (const connector of connectors) {
    if (seen.has(connector.name)) {
      throw new Error(`Duplicate connector name "${connector.name}"`);
    }
    seen.add(connector.name);
  }
  return connectors;
}
