import 'dotenv/config';
import { Pool } from 'pg';
import { runMigrations } from '../data/migrations';
import { logger } from '../utils';

async function main(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    logger.error('Migrations', 'DATABASE_URL not set');
    process.exit(1);
  }

  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: process.env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : undefined,
  });

  try {
    await runMigrations(pool);
  } finally {
    await pool.end();
  }
}

main()
  .then(() => {
    process.exit(0);
  })
  .catch((err: unknown) => {
    logger.error('Migrations', 'Migration failed', { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  });
