import { config } from '../src/config/index.js';
import { getPool, closeDatabase } from '../src/config/database.js';
import { applySchema } from '../src/config/migrations.js';
import { logger } from '../src/utils/logger.js';

async function migrate(): Promise<void> {
  logger.info('Starting database migration...');
  logger.info(`Database URL: ${config.database.url.replace(/:[^:@]+@/, ':****@')}`);

  try {
    const tables = await applySchema(getPool());

    logger.info('Migration completed successfully');

    // Show created tables
    logger.info('Created tables:');
    tables.forEach((table) => {
      logger.info(`  - ${table}`);
    });
  } catch (error) {
    logger.error('Migration failed', { error: (error as Error).message });
    throw error;
  } finally {
    await closeDatabase();
  }
}

migrate().catch((error) => {
  logger.error('Migration script failed', error);
  process.exit(1);
});
