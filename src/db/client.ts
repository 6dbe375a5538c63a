import pg from 'pg';
import { logger } from '../config/logger.js';

const { Pool } = pg;

let pool: pg.Pool | null = null;

/**
 * Create the shared pool. Entry points call this once with the validated DATABASE_URL.
 */
export function initPool(connectionString: string): pg.Pool {
  if (pool) {
    return pool;
  }

  pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database error', { error: err.message, stack: err.stack });
  });

  pool.on('connect', () => {
    logger.debug('New database client connected');
  });

  return pool;
}

export function getPool(): pg.Pool {
  if (!pool) {
    throw new Error('Database pool not initialized - call initPool() first');
  }
  return pool;
}

export type QueryFn = <T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[]
) => Promise<pg.QueryResult<T>>;

export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<T>> {
  const start = Date.now();
  try {
    const result = await getPool().query<T>(text, params);
    const duration = Date.now() - start;
    logger.debug('Executed query', { text, duration, rows: result.rowCount });
    return result;
  } catch (error) {
    logger.error('Query error', {
      text,
      params,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}

export async function disconnect() {
  if (!pool) {
    return;
  }
  await pool.end();
  pool = null;
  logger.info('Database pool closed');
}
