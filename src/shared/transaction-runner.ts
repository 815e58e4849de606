import type { PoolClient } from 'pg';
import { logger } from '../config/logger.config';

/**
 * Anything that can hand out a client (a Pool, or a fake in tests)
 */
export interface PoolLike {
  connect(): Promise<PoolClient>;
}

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client.
 * On failure the transaction is rolled back and the original error rethrown;
 * a failing ROLLBACK is logged and does not replace it.
 *
 * @example
 * const saved = await runInTransaction(pool, async (client) => {
 *   await client.query('INSERT INTO player_stats (...) VALUES (...)', values);
 *   return values.length;
 * });
 */
export async function runInTransaction<T>(
  pool: PoolLike,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error('Rollback failed', {
        error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
      });
    }
    throw error;
  } finally {
    client.release();
  }
}
