import { AnswerService } from "./answer/answerService.js";
import { TogetherCompletionClient, type CompletionProvider } from "./answer/completionClient.js";
import type { AppConfig } from "./config/appConfig.js";
import { buildConnectors } from "./connectors/index.js";
import type { SourceConnector } from "./connectors/connector.js";
import { InMemoryChatHistory, type ChatHistoryStore } from "./history/store.js";
import { FileChatHistory } from "./history/storeFile.js";
import { createRouter, type RouteRequest, type RouteResponse } from "./http/routes.js";
import { IngestionCoordinator } from "./ingest/coordinator.js";
import type { StructuredLogger } from "./logger.js";
import { buildSearchChain } from "./search/index.js";
import type { SearchFallbackChain } from "./search/fallbackChain.js";
import type { SetupStore } from "./setups/store.js";
import { FileSetupStore } from "./setups/storeFile.js";
import { InMemorySetupStore } from "./setups/storeMemory.js";

/** Overrides accepted by {@link assembleRuntime}, mostly for tests. */
export interface RuntimeAssemblyDependencies {
  readonly fetchImpl?: typeof fetch;
  readonly clock?: () => number;
  readonly connectors?: readonly SourceConnector[];
  readonly completion?: CompletionProvider;
  readonly setups?: SetupStore;
  readonly history?: ChatHistoryStore;
}

export interface Runtime {
  readonly setups: SetupStore;
  readonly history: ChatHistoryStore;
  readonly coordinator: IngestionCoordinator;
  readonly search: SearchFallbackChain;
  readonly answer: AnswerService;
  readonly handle: (request: RouteRequest) => Promise<RouteResponse>;
  /** Flushes and closes the durable stores. */
  dispose(): Promise<void>;
}

/**
 * Wires stores, connectors, search and the answer service from a static
 * configuration. Stores are durable when a data directory is configured and
 * in-memory otherwise.
 */
export async function assembleRuntime(
  config: AppConfig,
  logger: StructuredLogger,
  deps: RuntimeAssemblyDependencies = {},
): Promise<Runtime> {
  const closers: Array<() => Promise<void>> = [];
  const storeLog = (level: "warn" | "info", message: string): void => {
    logger[level]("store_notice", { message });
  };

  let setups = deps.setups;
  let history = deps.history;
  const dataDir = config.storage.dataDir;
  if (!setups) {
    if (dataDir) {
      const store = new FileSetupStore({
        directory: dataDir,
        clock: deps.clock,
        fsyncMode: config.storage.fsyncMode,
        log: storeLog,
      });
      await store.initialise();
      closers.push(() => store.dispose());
      setups = store;
    } else {
      setups = new InMemorySetupStore({ clock: deps.clock });
    }
  }
  if (!history) {
    if (dataDir) {
      const store = new FileChatHistory({
        directory: dataDir,
        clock: deps.clock,
        fsyncMode: config.storage.fsyncMode,
        log: storeLog,
      });
      await store.initialise();
      closers.push(() => store.dispose());
      history = store;
    } else {
      history = new InMemoryChatHistory({ clock: deps.clock });
    }
  }

  const connectors =
    deps.connectors ?? buildConnectors(config.ingest, { fetchImpl: deps.fetchImpl, logger, clock: deps.clock });
  const coordinator = new IngestionCoordinator({
    connectors,
    store: setups,
    parallelism: config.ingest.parallelism,
    sourceTimeoutMs: config.ingest.sourceTimeoutMs,
    logger,
    clock: deps.clock,
  });

  const search = buildSearchChain(config.search, { fetchImpl: deps.fetchImpl, logger });
  const completion = deps.completion ?? new TogetherCompletionClient(config.completion, deps.fetchImpl);
  const answer = new AnswerService({
    search,
    completion,
    setups,
    history,
    recentSetupLimit: config.answer.recentSetupLimit,
    completionTimeoutMs: config.completion.timeoutMs,
    logger,
  });

  const handle = createRouter({ answer, ingest: coordinator, search, setups, logger });

  logger.info("runtime_assembled", {
    connectors: coordinator.listConnectors(),
    search_providers: search.providerNames,
    completion_provider: completion.name,
    durable: dataDir !== null,
  });

  return {
    setups,
    history,
    coordinator,
    search,
    answer,
    handle,
    dispose: async () => {
      for (const close of closers) {
        await close();
      }
    },
  };
}
