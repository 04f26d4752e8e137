import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Pool } from 'pg';
import { createLogger, loadConfig, DatabaseConfigSchema } from '@faretrack/shared';

const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

const logger = createLogger({ name: 'db:migrate' });

async function migrate() {
  const { DATABASE_URL } = loadConfig(DatabaseConfigSchema);

  const pool = new Pool({ connectionString: DATABASE_URL });
  const client = await pool.connect();

  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        name VARCHAR(255) PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    const applied = await client.query<{ name: string }>('SELECT name FROM _migrations ORDER BY name');
    const appliedSet = new Set(applied.rows.map((r) => r.name));

    const pending = (await readdir(MIGRATIONS_DIR))
      .filter((f) => f.endsWith('.sql') && !appliedSet.has(f))
      .sort();

    for (const file of pending) {
      const sql = await readFile(join(MIGRATIONS_DIR, file), 'utf-8');

      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
        logger.info({ migration: file }, 'Migration applied');
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
    }

    logger.info({ applied: pending.length }, 'Database schema up to date');
  } finally {
    client.release();
    await pool.end();
  }
}

migrate().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Migration failed');
  process.exit(1);
});
