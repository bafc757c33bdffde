import { Pool, type PoolClient } from 'pg';
import { config } from '../config.js';

let pool: Pool | null = null;

export function createPool(connectionString: string): Pool {
  const created = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });

  created.on('error', (err) => {
    console.error('[DB] Unexpected pool error:', err);
  });
  return created;
}

/** Process-wide pool built from DATABASE_URL. */
export function getPool(): Pool {
  if (!pool) pool = createPool(config.DATABASE_URL);
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Run `fn` inside BEGIN / COMMIT on a dedicated client. Any throw rolls the
 * whole unit back and is rethrown unchanged.
 */
export async function withTransaction<T>(db: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}
