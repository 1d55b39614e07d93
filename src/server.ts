/**
 * Server Entry Point
 * @module server
 */

import { buildApp } from './app.js';
import { loadConfig } from './config/index.js';
import { getLogger } from './logging/logger.js';

const logger = getLogger();

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string, app: Awaited<ReturnType<typeof buildApp>>): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal');

  try {
    // Closes the HTTP server, the store and the publisher
    await app.close();
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error({ err: error }, 'Error during graceful shutdown');
    process.exit(1);
  }
}

/**
 * Start the server
 */
async function start(): Promise<void> {
  try {
    const config = await loadConfig();
    const app = await buildApp({ config });

    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM', app));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT', app));

    process.on('unhandledRejection', (reason) => {
      logger.fatal({ reason }, 'Unhandled rejection');
      void gracefulShutdown('unhandledRejection', app);
    });

    await app.listen({ host: config.server.host, port: config.server.port });

    logger.info(
      { host: config.server.host, port: config.server.port, driver: config.storage.driver },
      `Server listening on http://${config.server.host}:${config.server.port}`
    );
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

void start();
