import { getPool } from './client';

/** Throws when the database is unreachable or the schema has not been migrated. */
export async function checkDatabase(): Promise<void> {
  const pool = getPool();
  await pool.query('SELECT 1');

  const result = await pool.query(`SELECT to_regclass('public.users') AS users_table`);
  if (!result.rows[0] || result.rows[0].users_table === null) {
    throw new Error('users table does not exist');
  }
}
