#!/usr/bin/env node
/**
 * SearXNG MCP Server - Entry Point
 * Supports both stdio and HTTP/SSE transports
 */

import { loadEnvSafely } from "@searxng-mcp/shared/Utils/env.js";
import { logger } from "@searxng-mcp/shared/Utils/logger.js";
import { startApp } from "./app.js";
import { loadConfig, type Config } from "./utils/config.js";

async function main(): Promise<void> {
  logger.setContext("searxng");
  loadEnvSafely(import.meta.url);

  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    logger.error("Configuration rejected", error);
    process.exit(1);
  }

  logger.setLevel(config.logLevel);
  logger.info("Starting SearXNG MCP", {
    backend: config.searxngUrl,
    transport: config.transport,
    ...(config.transport === "sse" ? { host: config.host, port: config.port } : {}),
  });

  const app = await startApp(config, logger);

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down`);
    app.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Shutdown failed", error);
        process.exit(1);
      }
    );
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  logger.error("Fatal error", error);
  process.exit(1);
});
