#!/usr/bin/env node

/**
 * Local chat backend - entry point
 */

import { getConfig, printConfigInfo } from './config.js';
import { McpServer } from './presentation/McpServer.js';
import { configureLogging, createLogger } from './utils/logger.js';

const logger = createLogger('main');

async function main() {
  const config = getConfig();
  configureLogging({ debug: config.server.debug });
  printConfigInfo(config);

  const server = new McpServer(config);

  const shutdown = async (signal: string, exitCode = 0) => {
    logger.info('Received signal, shutting down', { signal });
    try {
      await server.shutdown();
    } catch (error) {
      logger.error('Shutdown failed', { error });
      exitCode = 1;
    }
    process.exit(exitCode);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error });
    void shutdown('UNCAUGHT_EXCEPTION', 1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { error: reason });
    void shutdown('UNHANDLED_REJECTION', 1);
  });

  try {
    await server.start();
  } catch (error) {
    logger.error('Failed to start', { error });
    await shutdown('STARTUP_FAILURE', 1);
  }
}

main().catch((error: unknown) => {
  logger.error('Fatal error in main()', { error });
  process.exit(1);
});
