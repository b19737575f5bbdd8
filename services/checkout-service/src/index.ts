import { getConfig } from '@storefront/config';
import { connectDB, disconnectDB } from '@storefront/db';
import { closeEventBus, getEventBus } from '@storefront/event-bus';
import { logger } from '@storefront/logger';
import { initializeObservability, shutdownObservability } from '@storefront/observability';

import { createApp } from './app.js';
import {
  buildContainer,
  createMemoryRepositories,
  createMongoRepositories,
  loadSeedCatalog,
} from './container.js';
import type { Repositories } from './repositories/types.js';

const config = getConfig();

async function createRepositories(): Promise<Repositories> {
  if (config.STORAGE_DRIVER === 'mongo') {
    await connectDB();
    return createMongoRepositories();
  }
  logger.warn('Using in-memory storage; data is lost on restart');
  return createMemoryRepositories(loadSeedCatalog());
}

async function startService(): Promise<void> {
  try {
    // Initialize observability
    initializeObservability(config.OTEL_SERVICE_NAME);

    const container = buildContainer({
      config,
      repositories: await createRepositories(),
      events: await getEventBus(),
    });

    const app = await createApp(container);

    await app.listen({
      host: '0.0.0.0',
      port: config.CHECKOUT_SERVICE_PORT,
    });

    container.recovery.start();

    logger.info(
      {
        port: config.CHECKOUT_SERVICE_PORT,
        env: config.NODE_ENV,
        storage: config.STORAGE_DRIVER,
        paymentProvider: container.payments.provider,
      },
      'Checkout service started successfully'
    );

    const shutdown = async (signal: string): Promise<void> => {
      logger.info(`Received ${signal}, shutting down checkout service...`);

      try {
        await app.close();
        await container.recovery.stop();
        await closeEventBus();
        await disconnectDB();
        await shutdownObservability();
        logger.info('Checkout service shutdown complete');
        process.exit(0);
      } catch (error) {
        logger.error({ error }, 'Error during shutdown');
        process.exit(1);
      }
    };

    process.once('SIGTERM', () => void shutdown('SIGTERM'));
    process.once('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    logger.error({ error }, 'Failed to start checkout service');
    process.exit(1);
  }
}

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ reason }, 'Unhandled rejection');
  process.exit(1);
});

void startService();
