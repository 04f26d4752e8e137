import { Pool, type PoolConfig, type PoolClient } from 'pg';
import { createLogger } from '@faretrack/shared';

const logger = createLogger({ name: 'db' });

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) throw new Error('Database pool not initialized. Call initPool first.');
  return pool;
}

export function initPool(config: PoolConfig): Pool {
  if (pool) return pool;
  const options: PoolConfig = { max: 10, idleTimeoutMillis: 30_000, ...config };
  pool = new Pool(options);
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Idle database client failed');
  });
  logger.info({ max: options.max }, 'Database pool initialized');
  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const closing = pool;
  pool = null;
  await closing.end();
  logger.info({}, 'Database pool closed');
}

/** Runs `fn` inside BEGIN/COMMIT on one pooled client; any rejection rolls back and is rethrown. */
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    logger.debug({ err: err instanceof Error ? err.message : String(err) }, 'Transaction rolled back');
    throw err;
  } finally {
    client.release();
  }
}
