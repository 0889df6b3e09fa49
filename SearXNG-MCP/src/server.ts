/**
 * SearXNG MCP Server
 * Exposes web, image and video search from a SearXNG instance as MCP tools
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { ToolRegistry } from "./tools/registry.js";
import type { SerialQueue } from "./utils/serial-queue.js";

export const SERVER_NAME = "searxng";
export const SERVER_VERSION = "1.0.0";

export interface ServerOptions {
  /** Aborted when the session's connection closes; cancels in-flight searches */
  signal?: AbortSignal;
  /** When set, tool calls run one at a time through this queue */
  queue?: SerialQueue;
}

export function createServer(registry: ToolRegistry, options: ServerOptions = {}): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: registry.list(),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    const signal = options.signal ? AbortSignal.any([extra.signal, options.signal]) : extra.signal;

    const call = () => registry.dispatch(name, args ?? {}, { signal });
    const response = options.queue ? await options.queue.run(call) : await call();

    return {
      content: [
        {
          type: "text" as const,
          text: JSON.stringify(response),
        },
      ],
      isError: !response.success,
    };
  });

  return server;
}
