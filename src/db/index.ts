/**
 * PostgreSQL Database Connection
 */

import { Pool } from 'pg';
import { SCHEMA } from './schema.js';
import { logger } from '../utils/logger.js';

/**
 * The subset of a pg pool the stores need
 */
export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

let pool: Pool | null = null;

/**
 * Get the database pool
 */
export function getPool(): Pool {
  if (!pool) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return pool;
}

/**
 * Initialize database connection pool and schema
 */
export async function initDatabase(connectionString: string): Promise<void> {
  if (pool) {
    logger.debug('Database pool already initialized');
    return;
  }

  const created = new Pool({
    connectionString,
    max: 2,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  try {
    const client = await created.connect();
    logger.info('Database connection established');
    client.release();
    await created.query(SCHEMA);
    logger.info('Database schema initialized');
  } catch (error) {
    logger.fatal({ error }, 'Failed to initialize database');
    await created.end();
    throw error;
  }

  pool = created;
}

/**
 * Query helper bound to the current pool
 */
export function getSqlClient(): SqlClient {
  return {
    query: async (text, params) => {
      const result = await getPool().query(text, params);
      return { rows: result.rows };
    },
  };
}

/**
 * Close database connection pool
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('Database connection pool closed');
  }
}
