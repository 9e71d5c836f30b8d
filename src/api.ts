/**
 * API server entry point
 * Loads the sales export and starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';
import { createClusterCache, createSalesFileStore } from './modules/sales/index.js';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server, sales: config.sales } }, 'Starting API server');

  const salesStore = createSalesFileStore({
    filePath: config.sales.filePath,
    geoClusterPrecision: config.sales.geoClusterPrecision,
    logger,
    cache: createClusterCache(config.clusterCache),
  });

  // An unreadable source file is fatal at startup
  const loadResult = await salesStore.load();
  if (loadResult.isErr()) {
    logger.fatal({ err: loadResult.error }, 'Cannot start without sales data');
    process.exit(1);
  }

  const app = await buildApp({
    fastifyOptions: {
      loggerInstance: logger,
      disableRequestLogging: false,
    },
    deps: { salesStore, config },
    version: process.env['APP_VERSION'] ?? '0.1.0',
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
