#!/usr/bin/env node
/**
 * Stdio transport entry point for Claude Desktop and other local clients.
 * stdout carries the protocol, so everything else is logged to stderr.
 */

import 'dotenv/config';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { getConfig, validateEnvironment, SERVER_NAME, SERVER_VERSION } from './auth/middleware.js';
import { TempoClient } from './clients/tempo.js';
import { ToolRegistry } from './tools/index.js';

async function main() {
  validateEnvironment('stdio');
  const config = getConfig();

  // One client for the life of the process, shared by every tool call
  const toolRegistry = new ToolRegistry(new TempoClient(config.tempo));

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  toolRegistry.registerTools(server);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = () => {
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
