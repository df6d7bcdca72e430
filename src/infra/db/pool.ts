import pg from 'pg';
import type { Pool } from 'pg';
import type { DatabaseConfig } from '../../config/env.js';
import type { Logger } from '../logging/logger.js';

/**
 * Build the connection pool from explicit config. Connections are checked
 * out per operation, so nothing here opens a connection eagerly.
 */
export function createPool(config: DatabaseConfig, logger: Logger): Pool {
  const pool = new pg.Pool({
    connectionString: config.url,
    max: config.poolMax,
    idleTimeoutMillis: config.idleTimeoutMillis,
    connectionTimeoutMillis: config.connectionTimeoutMillis,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database error');
  });

  return pool;
}
