// src/config/database.ts
import { Pool, QueryResultRow } from 'pg';
import { logger } from '../utils/logger';
import { env } from './environment';

/**
 * Local contacts database. Disabled (null) when DB_HOST is not configured.
 */
export const pool: Pool | null = env.DB_HOST
  ? new Pool({
      host: env.DB_HOST,
      port: env.DB_PORT,
      database: env.DB_NAME,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
      statement_timeout: env.COLLABORATOR_TIMEOUT_MS
    })
  : null;

pool?.on('error', (err) => {
  logger.error('Unexpected database error:', err);
});

export async function query<T extends QueryResultRow>(text: string, params: unknown[] = []): Promise<T[]> {
  if (!pool) {
    throw new Error('Database is not configured');
  }
  const start = Date.now();
  try {
    const res = await pool.query<T>(text, params);
    logger.debug('Executed query', { duration: Date.now() - start, rows: res.rowCount });
    return res.rows;
  } catch (error) {
    logger.error('Database query error:', error);
    throw error;
  }
}

export async function testConnection(): Promise<boolean> {
  if (!pool) return false;
  try {
    await pool.query('SELECT NOW()');
    logger.info('Database connection test successful');
    return true;
  } catch (error) {
    logger.error('Database connection test failed:', error);
    return false;
  }
}
