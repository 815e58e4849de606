import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { logger } from '../config/logger.config';

const MIGRATIONS_TABLE = 'migrations';

// Run from src/db under ts-node and jest, from dist/src/db once compiled
const MIGRATIONS_DIR_CANDIDATES = [
  path.join(__dirname, '..', '..', 'migrations'),
  path.join(__dirname, '..', '..', '..', 'migrations'),
];

export const DEFAULT_MIGRATIONS_DIR =
  MIGRATIONS_DIR_CANDIDATES.find((dir) => fs.existsSync(dir)) ?? MIGRATIONS_DIR_CANDIDATES[0];

async function ensureMigrationsTable(db: Pool): Promise<void> {
  const createTableSql = `
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      run_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `;
  await db.query(createTableSql);
}

async function getAppliedMigrations(db: Pool): Promise<Set<string>> {
  const res = await db.query<{ name: string }>(`SELECT name FROM ${MIGRATIONS_TABLE};`);
  return new Set(res.rows.map((row) => row.name));
}

export function loadMigrationFiles(migrationsDir: string): string[] {
  if (!fs.existsSync(migrationsDir)) {
    throw new Error(`Migrations directory not found: ${migrationsDir}`);
  }

  return fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql') && /^\d+_/.test(file))
    .sort();
}

async function runMigrationFile(db: Pool, migrationsDir: string, fileName: string): Promise<void> {
  const sql = fs.readFileSync(path.join(migrationsDir, fileName), 'utf8');
  logger.info(`Running migration: ${fileName}`);

  const client = await db.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query(
      `INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1) ON CONFLICT (name) DO NOTHING;`,
      [fileName]
    );
    await client.query('COMMIT');
    logger.info(`Migration completed: ${fileName}`);
  } catch (err) {
    await client.query('ROLLBACK');
    logger.error(`Migration failed: ${fileName}`, {
      error: err instanceof Error ? err.message : String(err),
    });
    throw err;
  } finally {
    client.release();
  }
}

/**
 * Apply pending migrations in file-name order.
 * @returns Names of the migrations applied by this call
 */
export async function runMigrations(
  db: Pool,
  migrationsDir: string = DEFAULT_MIGRATIONS_DIR
): Promise<string[]> {
  await ensureMigrationsTable(db);

  const applied = await getAppliedMigrations(db);
  const files = loadMigrationFiles(migrationsDir);
  const pending = files.filter((file) => !applied.has(file));

  logger.info(`Found ${files.length} migration(s), ${pending.length} pending`);

  for (const file of pending) {
    await runMigrationFile(db, migrationsDir, file);
  }

  return pending;
}
