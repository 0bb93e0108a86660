#!/usr/bin/env node

/**
 * steel-web-loader MCP server
 *
 * Entry point: loads .env, parses flags, builds the tools and serves them over
 * stdio. SIGINT/SIGTERM while a session is held are handled by the interrupt
 * hook, which releases the session before the process exits.
 */

import { loadEnvironment } from '../config/env.js';
import { initServerConfig, getServerTools, disposeServerTools } from '../server/server-config.js';
import { SteelWebLoaderServer } from '../server/mcp-server.js';
import { createLogger } from '../shared/services/logging.service.js';
import { toError } from '../shared/errors/index.js';

const logger = createLogger('main');

async function main(): Promise<void> {
  loadEnvironment();
  initServerConfig(process.argv.slice(2));

  const server = new SteelWebLoaderServer(
    {
      name: 'steel-web-loader',
      version: '0.1.0',
      capabilities: {
        tools: {},
        logging: {},
      },
    },
    getServerTools(),
  );
  await server.start();

  // The client closing stdin ends the session.
  process.stdin.once('end', () => {
    void (async () => {
      logger.info('Client disconnected, shutting down');
      await disposeServerTools();
      await server.stop();
      process.exit(0);
    })();
  });
}

main().catch((error: unknown) => {
  logger.critical('Failed to start server', toError(error));
  process.exit(1);
});
