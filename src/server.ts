import express, { Request, Response } from 'express';
import type { Server as HttpServer } from 'http';
import { randomUUID } from 'crypto';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { validateToken, SERVER_NAME, SERVER_VERSION, type AppConfig } from './auth/middleware.js';
import { TempoClient } from './clients/tempo.js';
import { ToolRegistry } from './tools/index.js';

interface Session {
  transport: StreamableHTTPServerTransport;
  server: McpServer;
}

function sessionIdFrom(req: Request): string | undefined {
  const header = req.headers['mcp-session-id'];
  return typeof header === 'string' ? header : undefined;
}

/**
 * Build the Streamable HTTP app. Every session gets its own McpServer, but
 * all of them share the one tool registry (and so the one API client).
 */
export function createServer(toolRegistry: ToolRegistry): express.Express {
  const app = express();
  app.use(express.json());

  const sessions: Record<string, Session> = {};

  // Health check endpoint (no auth required)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  // Session termination; registered before app.all so DELETE lands here
  app.delete('/mcp', validateToken, async (req: Request, res: Response) => {
    const sessionId = sessionIdFrom(req);
    const session = sessionId ? sessions[sessionId] : undefined;

    if (!sessionId || !session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }

    try {
      await session.transport.close();
      await session.server.close();
      delete sessions[sessionId];
      console.log(`Session terminated: ${sessionId}`);
      res.status(204).send();
    } catch (error) {
      console.error('Error terminating session:', error);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  // MCP endpoint - handles all Streamable HTTP requests
  app.all('/mcp', validateToken, async (req: Request, res: Response) => {
    const sessionId = sessionIdFrom(req);
    const existing = sessionId ? sessions[sessionId] : undefined;

    if (existing) {
      try {
        await existing.transport.handleRequest(req, res, req.body);
      } catch (error) {
        console.error('Error handling MCP request:', error);
        if (!res.headersSent) {
          res.status(500).json({ error: 'Internal server error' });
        }
      }
      return;
    }

    // For new sessions (initialization), create a new server and transport
    const mcpServer = new McpServer({
      name: SERVER_NAME,
      version: SERVER_VERSION,
    });
    toolRegistry.registerTools(mcpServer);

    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (newSessionId) => {
        console.log(`Session initialized: ${newSessionId}`);
        sessions[newSessionId] = { transport, server: mcpServer };
      },
    });

    transport.onclose = () => {
      if (transport.sessionId && sessions[transport.sessionId]) {
        console.log(`Session closed: ${transport.sessionId}`);
        delete sessions[transport.sessionId];
      }
    };

    try {
      await mcpServer.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error('Error handling MCP request:', error);
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal server error' });
      }
    }
  });

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: express.NextFunction) => {
    console.error('Server error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export function startServer(config: AppConfig): HttpServer {
  const toolRegistry = new ToolRegistry(new TempoClient(config.tempo));
  const app = createServer(toolRegistry);

  return app.listen(config.port, () => {
    console.log(`Tempo AI MCP server running on port ${config.port}`);
    console.log(`Health check: http://localhost:${config.port}/health`);
    console.log(`MCP endpoint: http://localhost:${config.port}/mcp`);
  });
}
