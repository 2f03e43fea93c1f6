#!/usr/bin/env node
import { pathToFileURL } from "node:url";
import process from "node:process";

import { collectRedactionTokens, loadAppConfig } from "./config/appConfig.js";
import { startHttpServer } from "./httpServer.js";
import { StructuredLogger } from "./logger.js";
import { assembleRuntime } from "./runtime.js";

/**
 * Loads configuration from the environment, assembles the runtime and serves
 * the HTTP API until SIGINT or SIGTERM.
 */
async function main(): Promise<void> {
  const bootLogger = new StructuredLogger();
  const config = await loadAppConfig().catch((error: unknown) => {
    bootLogger.error("config_invalid", { message: error instanceof Error ? error.message : String(error) });
    return process.exit(1);
  });

  const logger = new StructuredLogger({
    logFile: config.logging.file,
    redactSecrets: collectRedactionTokens(config),
  });

  const runtime = await assembleRuntime(config, logger);
  const http = await startHttpServer(
    runtime.handle,
    {
      host: config.http.host,
      port: config.http.port,
      maxBodyBytes: config.http.maxBodyBytes,
      cors: config.http.cors,
    },
    logger,
  );

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.warn("shutdown_signal", { signal });
    try {
      await http.close();
      await runtime.dispose();
    } catch (error) {
      logger.error("shutdown_failed", { message: error instanceof Error ? error.message : String(error) });
    }
    await logger.flush();
    process.exit(0);
  };

  process.on("SIGINT", (signal) => void shutdown(signal));
  process.on("SIGTERM", (signal) => void shutdown(signal));
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
    process.exit(1);
  });
}
