import { Pool, PoolClient, types } from 'pg';
import { logger } from '../utils/logger';

const DATE_OID = 1082;

// Calendar dates stay 'YYYY-MM-DD' strings instead of local-midnight Date objects
types.setTypeParser(DATE_OID, (value: string) => value);

let pool: Pool | null = null;

export interface PoolOptions {
  databaseUrl: string;
  ssl: boolean;
}

export function getPool(options: PoolOptions): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: options.databaseUrl,
      ssl: options.ssl ? { rejectUnauthorized: false } : false,
      // A single local process needs only a handful of connections
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    pool.on('error', (err) => {
      logger.error('Unexpected error on idle database client', err);
    });
  }

  return pool;
}

export async function withTransaction<T>(
  source: Pool,
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await source.connect();
  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
