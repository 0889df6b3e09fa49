import { describe, it, expect, afterEach, vi } from 'vitest';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { createError, createSuccess } from '../Types/StandardResponse.js';
import type { ToolDefinition } from '../Types/tools.js';
import {
  startTransport,
  TOKEN_HEADER,
  type SessionContext,
  type TransportConfig,
  type TransportResult,
} from '../Transport/dual-transport.js';

vi.mock('@modelcontextprotocol/sdk/server/stdio.js', () => ({
  StdioServerTransport: class {},
}));

const TEST_TOKEN = 'test-secret';

const echoTool: ToolDefinition = {
  name: 'echo',
  description: 'Echo arguments back',
  inputSchema: { type: 'object', properties: { text: { type: 'string' } } },
};

function fakeServer() {
  return {
    connect: vi.fn(async (transport: Transport) => transport.start()),
    close: vi.fn(async () => {}),
  };
}

const running: TransportResult[] = [];

afterEach(async () => {
  for (const result of running) {
    await result.shutdown().catch(() => undefined);
  }
  running.length = 0;
});

describe('startTransport', () => {
  describe('stdio mode', () => {
    it('should connect one server and tear it down on shutdown', async () => {
      const server = fakeServer();
      server.connect.mockResolvedValue(undefined);
      const sessions: SessionContext[] = [];
      const onShutdown = vi.fn();

      const result = await startTransport({
        transport: 'stdio',
        port: 0,
        serverName: 'test-stdio',
        createServer: (session) => {
          sessions.push(session);
          return server;
        },
        onShutdown,
        log: () => {},
      });

      expect(result.httpServer).toBeNull();
      expect(result.sessionCount()).toBe(0);
      expect(server.connect).toHaveBeenCalledOnce();
      expect(sessions).toHaveLength(1);
      expect(sessions[0]?.signal.aborted).toBe(false);

      await result.shutdown();
      expect(sessions[0]?.signal.aborted).toBe(true);
      expect(server.close).toHaveBeenCalledOnce();
      expect(onShutdown).toHaveBeenCalledOnce();
    });
  });

  describe('SSE mode', () => {
    async function startSse(overrides: Partial<TransportConfig> = {}): Promise<{ result: TransportResult; base: string }> {
      const result = await startTransport({
        transport: 'sse',
        port: 0,
        serverName: 'test-sse',
        token: TEST_TOKEN,
        createServer: () => fakeServer(),
        tools: [echoTool],
        onToolCall: async (name, args) => createSuccess({ name, args }),
        log: () => {},
        ...overrides,
      });
      running.push(result);
      const address = result.httpServer?.address();
      const port = typeof address === 'object' && address ? address.port : 0;
      return { result, base: `http://127.0.0.1:${port}` };
    }

    const authed = { [TOKEN_HEADER]: TEST_TOKEN };

    it('should answer /health without a token', async () => {
      const { base } = await startSse({ onHealth: () => ({ backend: 'http://searx.test' }) });
      const res = await fetch(`${base}/health`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'ok',
        transport: 'sse',
        sessions: 0,
        backend: 'http://searx.test',
      });
    });

    it('should reject other endpoints without the token', async () => {
      const { base } = await startSse();

      const missing = await fetch(`${base}/tools/list`);
      expect(missing.status).toBe(401);
      expect(await missing.json()).toEqual({ error: 'Unauthorized' });

      const wrong = await fetch(`${base}/tools/list`, { headers: { [TOKEN_HEADER]: 'nope' } });
      expect(wrong.status).toBe(401);
    });

    it('should not require a token when none is configured', async () => {
      const { base } = await startSse({ token: undefined });
      const res = await fetch(`${base}/tools/list`);
      expect(res.status).toBe(200);
    });

    it('should list tools', async () => {
      const { base } = await startSse();
      const res = await fetch(`${base}/tools/list`, { headers: authed });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ tools: [echoTool] });
    });

    it('should run /tools/call and wrap the StandardResponse as tool content', async () => {
      const onToolCall = vi.fn(async (name: string, args: unknown) => createSuccess({ name, args }));
      const { base } = await startSse({ onToolCall });

      const res = await fetch(`${base}/tools/call`, {
        method: 'POST',
        headers: { ...authed, 'Content-Type': 'application/json' },
        body: JSON.stringify({ name: 'echo', arguments: { text: 'hi' } }),
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        content: [{ type: 'text', text: '{"success":true,"data":{"name":"echo","args":{"text":"hi"}}}' }],
        isError: false,
      });
      expect(onToolCall).toHaveBeenCalledWith('echo', { text: 'hi' }, expect.any(AbortSignal));
    });

    it('should flag failed tool results with isError', async () => {
      const { base } = await startSse({ onToolCall: async () => createError('boom', 'NETWORK_ERROR') });

      const res = await fetch(`${base}/tools/call`, {
        method: 'POST',
        headers: authed,
        body: JSON.stringify({ name: 'echo' }),
      });

      expect(await res.json()).toEqual({
        content: [{ type: 'text', text: '{"success":false,"error":"boom","errorCode":"NETWORK_ERROR"}' }],
        isError: true,
      });
    });

    it('should reject malformed call bodies and unknown tools', async () => {
      const { base } = await startSse();

      const bad = await fetch(`${base}/tools/call`, { method: 'POST', headers: authed, body: 'not json' });
      expect(bad.status).toBe(400);

      const unknown = await fetch(`${base}/tools/call`, {
        method: 'POST',
        headers: authed,
        body: JSON.stringify({ name: 'missing' }),
      });
      expect(unknown.status).toBe(404);
      expect(await unknown.json()).toEqual({ success: false, error: 'Unknown tool: missing' });
    });

    it('should return 404 for unknown paths and unknown sessions', async () => {
      const { base } = await startSse();

      const path = await fetch(`${base}/nope`, { headers: authed });
      expect(path.status).toBe(404);
      expect(await path.text()).toBe('Not found');

      const session = await fetch(`${base}/message?sessionId=missing`, { method: 'POST', headers: authed, body: '{}' });
      expect(session.status).toBe(404);
      expect(await session.json()).toEqual({ error: 'Unknown session' });
    });

    it('should open one server per SSE connection and drop it when the client leaves', async () => {
      const sessions: SessionContext[] = [];
      const { result, base } = await startSse({
        createServer: (session) => {
          sessions.push(session);
          return fakeServer();
        },
      });

      const controller = new AbortController();
      const res = await fetch(`${base}/sse`, { headers: authed, signal: controller.signal });
      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toBe('text/event-stream');

      const reader = res.body?.getReader();
      const first = await reader?.read();
      const text = new TextDecoder().decode(first?.value);
      expect(text).toContain('event: endpoint');
      expect(text).toContain(`/message?sessionId=${sessions[0]?.sessionId}`);
      expect(result.sessionCount()).toBe(1);

      controller.abort();
      await vi.waitFor(() => expect(result.sessionCount()).toBe(0));
      expect(sessions[0]?.signal.aborted).toBe(true);
    });

    it('should reject when the port is already bound', async () => {
      const { result } = await startSse();
      const address = result.httpServer?.address();
      const port = typeof address === 'object' && address ? address.port : 0;

      await expect(startSse({ port })).rejects.toMatchObject({ code: 'EADDRINUSE' });
    });

    it('should close sessions and run onShutdown', async () => {
      const onShutdown = vi.fn();
      const { result } = await startSse({ onShutdown });

      await result.shutdown();
      running.length = 0;

      expect(onShutdown).toHaveBeenCalledOnce();
      expect(result.httpServer?.listening).toBe(false);
    });
  });
});
