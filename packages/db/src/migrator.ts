import { Pool } from 'pg';
import { DatabaseConfigSchema, createLogger, loadConfig } from '@cad/shared';
import { applyMigrations } from './migrations';

const logger = createLogger({ name: 'db:migrator' });

async function migrate() {
  const config = loadConfig(DatabaseConfigSchema);

  const pool = new Pool({ connectionString: config.DATABASE_URL });
  const client = await pool.connect();

  try {
    const applied = await applyMigrations(client);
    logger.info({ count: applied.length }, 'All migrations applied');
  } finally {
    client.release();
    await pool.end();
  }
}

migrate().catch((err: unknown) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Migration failed');
  process.exit(1);
});
