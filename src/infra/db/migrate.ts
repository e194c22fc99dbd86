import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { Pool } from 'pg';
import { loadConfig, requireDatabaseUrl } from '../config.js';
import type { Logger } from '../logger.js';
import { createPool } from './pool.js';

// SQL files stay in the source tree (tsc does not copy them to dist), so
// resolve from the project root for both `tsx` and the built script.
export const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

export interface Migration {
  filename: string;
  version: number;
}

export async function listMigrations(dir: string = MIGRATIONS_DIR): Promise<Migration[]> {
  const files = await readdir(dir);
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return { filename, version: parseInt(match[1], 10) };
    })
    .sort((a, b) => a.version - b.version);
}

/**
 * Apply every pending `NNN_name.sql` file in `dir`, each in its own
 * transaction. Returns the versions applied.
 */
export async function runMigrations(
  pool: Pick<Pool, 'query' | 'connect'>,
  logger: Logger = console,
  dir: string = MIGRATIONS_DIR
): Promise<number[]> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const applied = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  const appliedVersions = new Set(applied.rows.map((row) => row.version));
  const pending = (await listMigrations(dir)).filter((m) => !appliedVersions.has(m.version));

  if (pending.length === 0) {
    logger.info('No pending migrations.');
    return [];
  }

  for (const migration of pending) {
    const sql = await readFile(join(dir, migration.filename), 'utf-8');
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
        migration.version,
      ]);
      await client.query('COMMIT');
      logger.info(`Applied migration ${migration.version}: ${migration.filename}`);
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  return pending.map((m) => m.version);
}

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(requireDatabaseUrl(config));
  try {
    await runMigrations(pool);
  } finally {
    await pool.end();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error('Migration failed:', error);
    process.exit(1);
  });
}
