import 'dotenv/config';
import { validateEnvironment, getConfig } from './auth/middleware.js';
import { startServer } from './server.js';

function main() {
  try {
    validateEnvironment('http');

    const config = getConfig();

    console.log('Starting Tempo AI MCP Server (Streamable HTTP)...');
    console.log(`Tempo AI API: ${config.tempo.baseUrl}`);
    console.log(`Default API key: ${config.tempo.apiKey ? 'configured' : 'not configured'}`);

    const server = startServer(config);

    const shutdown = (signal: string) => {
      console.log(`Received ${signal}, shutting down`);
      server.close(() => process.exit(0));
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

main();
