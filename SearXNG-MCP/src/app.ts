/**
 * Wires config, client, registry and transport together.
 */

import {
  startTransport,
  type MCPServer,
  type SessionContext,
  type TransportMode,
  type TransportResult,
} from "@searxng-mcp/shared/Transport/dual-transport.js";
import { Logger } from "@searxng-mcp/shared/Utils/logger.js";
import { createServer } from "./server.js";
import { SearxngClient } from "./services/searxng.js";
import { createToolRegistry, type ToolRegistry } from "./tools/index.js";
import type { Config } from "./utils/config.js";
import { StartupError } from "./utils/errors.js";
import { SerialQueue } from "./utils/serial-queue.js";

export function createRegistry(config: Config, logger: Logger): ToolRegistry {
  const client = new SearxngClient(config, logger.child("client"));
  return createToolRegistry(
    { client, maxResults: config.maxResults, snippetLength: config.snippetLength },
    logger.child("registry")
  );
}

/**
 * Per-session server factory for a transport. stdio has a single client and
 * its calls are processed strictly in order; SSE sessions run calls concurrently.
 */
export function createSessionFactory(
  registry: ToolRegistry,
  transport: TransportMode
): (session: SessionContext) => MCPServer {
  const queue = transport === "stdio" ? new SerialQueue() : undefined;
  return ({ signal }) => createServer(registry, { signal, queue });
}

/**
 * Start serving on the configured transport.
 * @throws StartupError when the transport cannot start (e.g. port already bound)
 */
export async function startApp(
  config: Config,
  logger: Logger = new Logger("searxng", config.logLevel)
): Promise<TransportResult> {
  const registry = createRegistry(config, logger);
  const transportLogger = logger.child("transport");

  try {
    return await startTransport({
      transport: config.transport,
      host: config.host,
      port: config.port,
      serverName: "searxng-mcp",
      token: config.authToken,
      createServer: createSessionFactory(registry, config.transport),
      tools: registry.list(),
      onToolCall: (name, args, signal) => registry.dispatch(name, args, { signal }),
      onHealth: () => ({ backend: config.searxngUrl, tools: registry.list().map((tool) => tool.name) }),
      log: (message, data) => transportLogger.info(message, data),
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StartupError(`Could not start ${config.transport} transport: ${reason}`, {
      transport: config.transport,
      host: config.host,
      port: config.port,
    });
  }
}
