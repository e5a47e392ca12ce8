/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig, type AppConfig } from './infra/config/index.js';
import { initDatabase } from './infra/database/client.js';
import { ensureSchema } from './infra/database/schema.js';
import { createLogger, SERVICE_NAME } from './infra/logger/index.js';
import { makeDbHealthChecker, type HealthChecker } from './modules/health/index.js';
import {
  makeInMemoryUrlStore,
  makeKyselyUrlStore,
  type UrlStore,
} from './modules/short-urls/index.js';

import type { Logger } from 'pino';

interface StoreSetup {
  urlStore: UrlStore;
  healthCheckers: HealthChecker[];
  close: () => Promise<void>;
}

/**
 * Creates the one URL store the whole process shares.
 * PostgreSQL when DATABASE_URL is set, otherwise an in-memory map.
 */
const createStore = async (config: AppConfig, logger: Logger): Promise<StoreSetup> => {
  const db = initDatabase(config);

  if (db === undefined) {
    logger.warn('DATABASE_URL not configured - using in-memory store, data is lost on restart');
    return {
      urlStore: makeInMemoryUrlStore({ logger }),
      healthCheckers: [],
      close: () => Promise.resolve(),
    };
  }

  logger.info('Ensuring database schema');
  await ensureSchema(db);

  return {
    urlStore: makeKyselyUrlStore({ db, logger }),
    healthCheckers: [makeDbHealthChecker(db, { name: 'database' })],
    close: () => db.destroy(),
  };
};

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  // Create logger
  const logger = createLogger({
    level: config.logger.level,
    name: SERVICE_NAME,
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server } }, 'Starting API server');

  const store = await createStore(config, logger);

  const app = await buildApp({
    fastifyOptions: {
      loggerInstance: logger,
      disableRequestLogging: false,
    },
    deps: {
      urlStore: store.urlStore,
      healthCheckers: store.healthCheckers,
      config,
    },
    version: process.env['APP_VERSION'] ?? '0.1.0',
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await store.close();
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

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address, publicBaseUrl: config.shortUrls.publicBaseUrl }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
