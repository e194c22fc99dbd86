import pg from 'pg';
import type { Logger } from '../logger.js';

const { Pool } = pg;

export function createPool(connectionString: string, logger: Logger = console): pg.Pool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    logger.info('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database error:', err);
  });

  return pool;
}
