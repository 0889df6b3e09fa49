/**
 * Shared transport layer for MCP services
 * Supports both stdio (default) and HTTP/SSE transports
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { createServer as createHttpServer, type Server as HttpServer, type IncomingMessage, type ServerResponse } from 'node:http';
import type { StandardResponse } from '../Types/StandardResponse.js';
import type { ToolDefinition } from '../Types/tools.js';

/**
 * Interface for MCP Server - uses structural typing to avoid
 * dependency conflicts between different node_modules
 */
export interface MCPServer {
  connect(transport: Transport): Promise<void>;
  close(): Promise<void>;
}

export type TransportMode = 'stdio' | 'sse';

/**
 * Handed to the server factory for every session.
 * `signal` aborts when the session's connection goes away.
 */
export interface SessionContext {
  signal: AbortSignal;
  sessionId?: string;
}

export interface TransportConfig {
  /** Transport type: 'stdio' (default) or 'sse' */
  transport: TransportMode;
  /** Interface to bind for SSE (default 127.0.0.1) */
  host?: string;
  /** Port for SSE transport; 0 lets the OS pick */
  port: number;
  /** Server name for logging */
  serverName: string;
  /** Builds an MCP server per session: one for stdio, one per SSE connection */
  createServer: (session: SessionContext) => MCPServer;
  /** Optional: Shared auth token — requests to non-/health endpoints are rejected without it */
  token?: string;
  /** Optional: Additional health check data */
  onHealth?: () => Record<string, unknown>;
  /** Optional: Tool call handler for /tools/call endpoint */
  onToolCall?: (name: string, args: unknown, signal: AbortSignal) => Promise<StandardResponse>;
  /** Optional: Tool definitions for /tools/list endpoint */
  tools?: ToolDefinition[];
  /** Optional: Shutdown callback */
  onShutdown?: () => void | Promise<void>;
  /** Optional: Custom logger (defaults to console.error) */
  log?: (message: string, data?: unknown) => void;
}

export interface TransportResult {
  /** The HTTP server instance (null for stdio) */
  httpServer: HttpServer | null;
  /** Number of open SSE sessions (always 0 for stdio) */
  sessionCount: () => number;
  /** Closes every session, runs onShutdown and stops listening */
  shutdown: () => Promise<void>;
}

export const TOKEN_HEADER = 'x-mcp-token';

const MAX_BODY_BYTES = 1024 * 1024;

interface Session {
  transport: SSEServerTransport;
  server: MCPServer;
  controller: AbortController;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.setEncoding('utf8');
    req.on('data', (chunk: string) => {
      body += chunk;
      if (body.length > MAX_BODY_BYTES) {
        reject(new Error('Request body too large'));
        req.destroy();
      }
    });
    req.on('end', () => resolve(body));
    req.on('error', reject);
  });
}

function parseToolCall(body: string): { name: string; args: unknown } | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('name' in parsed)) {
    return null;
  }
  const { name } = parsed;
  if (typeof name !== 'string') {
    return null;
  }
  const args = 'arguments' in parsed ? parsed.arguments : undefined;
  return { name, args: args ?? {} };
}

/**
 * Start the MCP transport layer
 *
 * @example
 * ```typescript
 * const { shutdown } = await startTransport({
 *   transport: 'sse',
 *   port: 3000,
 *   serverName: 'searxng-mcp',
 *   createServer: ({ signal }) => createServer(registry, { signal }),
 *   onHealth: () => ({ backend: config.searxngUrl }),
 * });
 * ```
 */
export async function startTransport(config: TransportConfig): Promise<TransportResult> {
  const log = config.log ?? ((msg: string, data?: unknown) => {
    const timestamp = new Date().toISOString();
    if (data) {
      console.error(`[${timestamp}] [INFO] [${config.serverName}] ${msg}`, JSON.stringify(data));
    } else {
      console.error(`[${timestamp}] [INFO] [${config.serverName}] ${msg}`);
    }
  });

  if (config.transport === 'stdio') {
    const controller = new AbortController();
    const server = config.createServer({ signal: controller.signal });
    const transport = new StdioServerTransport();
    await server.connect(transport);
    log('Running on stdio transport');

    return {
      httpServer: null,
      sessionCount: () => 0,
      shutdown: async () => {
        controller.abort();
        await server.close();
        if (config.onShutdown) {
          await config.onShutdown();
        }
      },
    };
  }

  const sessions = new Map<string, Session>();

  const handleRequest = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? '/', 'http://localhost');

    // CORS: restrict to localhost origins
    const origin = req.headers.origin;
    if (origin && /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/.test(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
    }
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-MCP-Token');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    // Health check endpoint (always open — no token required)
    if (url.pathname === '/health' && req.method === 'GET') {
      const healthData = config.onHealth ? config.onHealth() : {};
      sendJson(res, 200, { status: 'ok', transport: 'sse', sessions: sessions.size, ...healthData });
      return;
    }

    if (config.token && req.headers[TOKEN_HEADER] !== config.token) {
      sendJson(res, 401, { error: 'Unauthorized' });
      return;
    }

    if (url.pathname === '/sse' && req.method === 'GET') {
      const transport = new SSEServerTransport('/message', res);
      const controller = new AbortController();
      const sessionId = transport.sessionId;
      const server = config.createServer({ signal: controller.signal, sessionId });
      sessions.set(sessionId, { transport, server, controller });

      res.on('close', () => {
        controller.abort();
        sessions.delete(sessionId);
        log('SSE session closed', { sessionId, open: sessions.size });
      });

      await server.connect(transport);
      log('SSE session opened', { sessionId, open: sessions.size });
      return;
    }

    if (url.pathname === '/message' && req.method === 'POST') {
      const sessionId = url.searchParams.get('sessionId');
      const session = sessionId ? sessions.get(sessionId) : undefined;
      if (!session) {
        sendJson(res, 404, { error: 'Unknown session' });
        return;
      }
      await session.transport.handlePostMessage(req, res);
      return;
    }

    if (url.pathname === '/tools/list' && req.method === 'GET') {
      sendJson(res, 200, { tools: config.tools ?? [] });
      return;
    }

    if (url.pathname === '/tools/call' && req.method === 'POST' && config.onToolCall) {
      const call = parseToolCall(await readBody(req));
      if (!call) {
        sendJson(res, 400, { success: false, error: 'Body must be JSON of the form {"name": string, "arguments"?: object}' });
        return;
      }
      if (config.tools && !config.tools.some((tool) => tool.name === call.name)) {
        sendJson(res, 404, { success: false, error: `Unknown tool: ${call.name}` });
        return;
      }

      // Abort the call if the client hangs up before we answer
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) controller.abort();
      });

      const result = await config.onToolCall(call.name, call.args, controller.signal);
      sendJson(res, 200, {
        content: [{ type: 'text', text: JSON.stringify(result) }],
        isError: !result.success,
      });
      return;
    }

    res.writeHead(404);
    res.end('Not found');
  };

  const httpServer = createHttpServer((req, res) => {
    handleRequest(req, res).catch((error: unknown) => {
      log('Request failed', { url: req.url, error: error instanceof Error ? error.message : String(error) });
      if (!res.headersSent) {
        sendJson(res, 500, { error: 'Internal server error' });
      } else {
        res.end();
      }
    });
  });

  const host = config.host ?? '127.0.0.1';
  await new Promise<void>((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    httpServer.once('error', onError);
    httpServer.listen(config.port, host, () => {
      httpServer.off('error', onError);
      resolve();
    });
  });

  const address = httpServer.address();
  const boundPort = typeof address === 'object' && address ? address.port : config.port;
  log(`Running on http://${host}:${boundPort}`);
  log('Endpoints: GET /health, GET /sse, POST /message, GET /tools/list' + (config.onToolCall ? ', POST /tools/call' : ''));

  const shutdown = async (): Promise<void> => {
    log('Shutting down...');
    for (const session of sessions.values()) {
      session.controller.abort();
      await session.server.close();
    }
    sessions.clear();
    if (config.onShutdown) {
      await config.onShutdown();
    }
    await new Promise<void>((resolveClose, rejectClose) => {
      httpServer.close((error) => (error ? rejectClose(error) : resolveClose()));
      httpServer.closeAllConnections();
    });
    log('Server closed');
  };

  return {
    httpServer,
    sessionCount: () => sessions.size,
    shutdown,
  };
}
