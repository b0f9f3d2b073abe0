/**
 * Database Client Module
 *
 * Creates and exports a PostgreSQL connection pool.
 * Handles connection events and errors for monitoring.
 */

import pg from 'pg';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { DatabaseError, toError } from '../errors/index.js';

// DATE columns stay as 'YYYY-MM-DD' strings instead of local-midnight Date objects
const DATE_OID = 1082;
pg.types.setTypeParser(DATE_OID, (value: string) => value);

/**
 * PostgreSQL connection pool
 */
export const db = new pg.Pool({
  host: cfg.database.host,
  port: cfg.database.port,
  user: cfg.database.user,
  password: cfg.database.password,
  database: cfg.database.database,
  ssl: cfg.database.ssl,
  max: cfg.database.max,
  idleTimeoutMillis: cfg.database.idleTimeoutMillis,
  connectionTimeoutMillis: cfg.database.connectionTimeoutMillis
});

db.on('connect', () => {
  logger.debug('Database client connected');
});

db.on('error', (err: Error) => {
  logger.error({ err }, 'Database pool error');
});

/**
 * Logs a driver failure and wraps it for callers
 */
export function databaseError(operation: string, err: unknown, context: Record<string, unknown> = {}): DatabaseError {
  const error = toError(err);
  logger.error({ err: error, operation, ...context }, 'Database operation failed');
  return new DatabaseError(`Failed to ${operation}: ${error.message}`, operation, error);
}

/**
 * Runs `work` inside a transaction on a dedicated client
 */
export async function withTransaction<T>(work: (client: pg.PoolClient) => Promise<T>): Promise<T> {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
      logger.error({ err: rollbackErr }, 'Rollback failed');
    });
    throw err;
  } finally {
    client.release();
  }
}

/**
 * Gracefully closes all database connections
 */
export async function closeDatabase(): Promise<void> {
  await db.end();
  logger.info('Database connections closed');
}
