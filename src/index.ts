#!/usr/bin/env node

/**
 * design-refiner - MCP server entry point
 */

import { DesignRefinerServer } from './server.js';
import { logger } from './utils/logger.js';

// Track server instance for cleanup on fatal errors
let serverInstance: DesignRefinerServer | null = null;

async function shutdown(signal: string): Promise<void> {
  logger.info('Shutting down design refiner', { signal });
  if (serverInstance) {
    await serverInstance.stop();
  }
  process.exit(0);
}

async function main(): Promise<void> {
  const server = new DesignRefinerServer();
  serverInstance = server;

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Error during shutdown', error);
        process.exit(1);
      });
    });
  }

  await server.start();
}

main().catch(async (error: unknown) => {
  logger.error('Fatal error', error);

  if (serverInstance) {
    try {
      await serverInstance.stop();
    } catch (cleanupError) {
      logger.error('Error during cleanup', cleanupError);
    }
  }

  process.exit(1);
});
