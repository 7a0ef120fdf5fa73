import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger } from '@cad/shared';
import { type Queryable } from './client';

const logger = createLogger({ name: 'db:migrations' });

export const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

/** Applies every .sql file in `dir` not yet recorded in _migrations, in name order. */
export async function applyMigrations(client: Queryable, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name VARCHAR(255) PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const applied = await client.query<{ name: string }>('SELECT name FROM _migrations ORDER BY name');
  const appliedSet = new Set(applied.rows.map((r) => r.name));

  const files = (await readdir(dir))
    .filter((f) => f.endsWith('.sql'))
    .sort();

  const newlyApplied: string[] = [];
  for (const file of files) {
    if (appliedSet.has(file)) continue;

    const sql = await readFile(join(dir, file), 'utf-8');

    await client.query('BEGIN');
    try {
      await client.query(sql);
      await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
      await client.query('COMMIT');
      logger.info({ file }, 'Applied migration');
      newlyApplied.push(file);
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
  }

  return newlyApplied;
}
