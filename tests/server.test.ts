import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import type { Server as HttpServer } from 'http';
import { createServer } from '../src/server.js';
import { ToolRegistry } from '../src/tools/index.js';

describe('Server', () => {
  const originalToken = process.env.MCP_AUTH_TOKEN;
  let server: HttpServer;
  let baseUrl: string;

  beforeAll(async () => {
    process.env.MCP_AUTH_TOKEN = 'test-secret';
    const app = createServer(new ToolRegistry({ request: vi.fn() }));

    server = await new Promise<HttpServer>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    if (originalToken === undefined) {
      delete process.env.MCP_AUTH_TOKEN;
    } else {
      process.env.MCP_AUTH_TOKEN = originalToken;
    }
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  describe('Health endpoint', () => {
    it('should return healthy status without auth', async () => {
      const response = await fetch(`${baseUrl}/health`);
      const body: unknown = await response.json();

      expect(response.status).toBe(200);
      expect(body).toMatchObject({ status: 'healthy' });
    });
  });

  describe('MCP endpoint', () => {
    it('should reject requests without a token', async () => {
      const response = await fetch(`${baseUrl}/mcp`, { method: 'POST' });

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({ error: 'Authentication token required' });
    });

    it('should reject requests with the wrong token', async () => {
      const response = await fetch(`${baseUrl}/mcp?token=wrong-token`, { method: 'POST' });

      expect(response.status).toBe(403);
    });

    it('should return 404 when deleting an unknown session', async () => {
      const response = await fetch(`${baseUrl}/mcp`, {
        method: 'DELETE',
        headers: {
          Authorization: 'Bearer test-secret',
          'mcp-session-id': 'unknown-session',
        },
      });

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: 'Session not found' });
    });
  });
});
