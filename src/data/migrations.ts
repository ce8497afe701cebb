import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import type { Pool } from 'pg';
import { logger } from '../utils';

// <repo>/migrations, from both src/data and dist/data
export const DEFAULT_MIGRATIONS_DIR = join(__dirname, '..', '..', 'migrations');

export async function runMigrations(pool: Pool, migrationsDir: string = DEFAULT_MIGRATIONS_DIR): Promise<string[]> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      filename VARCHAR(255) NOT NULL UNIQUE,
      executed_at TIMESTAMPTZ DEFAULT NOW()
    )
  `);

  const result = await pool.query<{ filename: string }>('SELECT filename FROM schema_migrations');
  const executed = new Set(result.rows.map((r) => r.filename));

  const files = readdirSync(migrationsDir).filter((f) => f.endsWith('.sql')).sort();
  logger.info('Migrations', `Found ${files.length} migration files`, { dir: migrationsDir });

  const applied: string[] = [];
  for (const file of files) {
    if (executed.has(file)) {
      logger.debug('Migrations', `Skipping ${file} (already executed)`);
      continue;
    }

    logger.info('Migrations', `Running: ${file}`);
    const sql = readFileSync(join(migrationsDir, file), 'utf-8');

    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [file]);
      await client.query('COMMIT');
      applied.push(file);
      logger.info('Migrations', `Completed: ${file}`);
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  logger.info('Migrations', 'All migrations completed', { applied: applied.length });
  return applied;
}
