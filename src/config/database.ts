import pg from 'pg';
import { config } from './index.js';
import { logger } from '../utils/logger.js';

const { Pool } = pg;

let pool: pg.Pool | null = null;

export function getPool(): pg.Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: config.database.url,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
      logger.error('Unexpected error on idle PostgreSQL client', err);
    });

    pool.on('connect', () => {
      logger.debug('New PostgreSQL client connected');
    });
  }
  return pool;
}

export async function connectDatabase(): Promise<void> {
  const pool = getPool();

  try {
    const result = await pool.query<{ now: Date }>('SELECT NOW()');
    logger.info(`PostgreSQL connected: ${result.rows[0]?.now}`);
  } catch (error) {
    logger.error('Failed to connect to PostgreSQL', { error: (error as Error).message });
    throw error;
  }
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('PostgreSQL connection pool closed');
  }
}

export async function query<T extends pg.QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<T>> {
  const start = Date.now();
  const result = await getPool().query<T>(text, params);
  const duration = Date.now() - start;

  logger.debug('Executed query', { text: text.substring(0, 100), duration, rows: result.rowCount });

  return result;
}

/**
 * Readiness check; never throws
 */
export async function checkDatabase(): Promise<boolean> {
  try {
    await getPool().query('SELECT 1');
    return true;
  } catch (error) {
    logger.warn('PostgreSQL health check failed', { error: (error as Error).message });
    return false;
  }
}
