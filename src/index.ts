import { config, validateConfig } from './config/index.js';
import { connectDatabase, closeDatabase } from './config/database.js';
import { connectRedis, disconnectRedis } from './config/redis.js';
import { logger } from './utils/logger.js';
import { arkhamClient, coinGeckoClient } from './services/external/index.js';
import { startApi, stopApi } from './api/health.js';

async function bootstrap(): Promise<void> {
  logger.info('Starting holder concentration and price impact service...', {
    nodeEnv: config.nodeEnv,
  });

  // Validate configuration
  validateConfig();

  try {
    await connectDatabase();
    await connectRedis();

    logger.info('All connections established successfully');

    logger.info('External service status', {
      arkham: arkhamClient.isConfigured(),
      coingecko: coinGeckoClient.isConfigured(),
      pancakeswap: true, // Explorer API doesn't require a key
    });

    logger.info('Analysis defaults', {
      topNs: config.analysis.topNs,
      whaleThreshold: config.analysis.whaleThreshold,
      exchangeEntityTypes: config.analysis.exchangeEntityTypes,
    });

    await startApi();

    logger.info(`Server running in ${config.nodeEnv} mode`);
  } catch (error) {
    logger.error('Failed to start application', { error: (error as Error).message });
    await shutdown();
    process.exit(1);
  }
}

async function shutdown(): Promise<void> {
  logger.info('Shutting down...');

  try {
    await stopApi();

    // Disconnect from databases
    await disconnectRedis();
    await closeDatabase();

    logger.info('Graceful shutdown completed');
  } catch (error) {
    logger.error('Error during shutdown', { error: (error as Error).message });
  }
}

// Graceful shutdown handlers
process.on('SIGINT', async () => {
  logger.info('Received SIGINT signal');
  await shutdown();
  process.exit(0);
});

process.on('SIGTERM', async () => {
  logger.info('Received SIGTERM signal');
  await shutdown();
  process.exit(0);
});

process.on('uncaughtException', async (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  await shutdown();
  process.exit(1);
});

process.on('unhandledRejection', async (reason) => {
  logger.error('Unhandled rejection', { reason });
  await shutdown();
  process.exit(1);
});

// Start the application
void bootstrap();
