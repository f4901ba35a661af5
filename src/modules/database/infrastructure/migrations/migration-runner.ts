import { Logger } from '@nestjs/common';
import type { Pool } from 'pg';
import { migrations as defaultMigrations } from './index';
import type { Migration } from './migration.interface';

const logger = new Logger('Migrations');

interface AppliedMigration {
  name: string;
  applied_at: Date;
}

async function ensureMigrationsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      applied_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
    )
  `);
}

async function getAppliedMigrations(pool: Pool): Promise<AppliedMigration[]> {
  const result = await pool.query(
    'SELECT name, applied_at FROM _migrations ORDER BY applied_at ASC, id ASC',
  );
  return result.rows;
}

export async function runMigrations(
  pool: Pool,
  direction: 'up' | 'down' = 'up',
  migrations: Migration[] = defaultMigrations,
): Promise<{ applied: string[]; skipped: string[] }> {
  await ensureMigrationsTable(pool);

  const applied = await getAppliedMigrations(pool);
  const appliedNames = new Set(applied.map((m) => m.name));

  const result: { applied: string[]; skipped: string[] } = { applied: [], skipped: [] };

  if (direction === 'up') {
    for (const migration of migrations) {
      if (appliedNames.has(migration.name)) {
        result.skipped.push(migration.name);
        continue;
      }

      logger.log(`Running migration: ${migration.name}`);
      await migration.up(pool);
      await pool.query('INSERT INTO _migrations (name) VALUES ($1)', [migration.name]);
      result.applied.push(migration.name);
    }
    return result;
  }

  const lastApplied = applied[applied.length - 1];
  if (!lastApplied) {
    logger.log('No migrations to rollback');
    return result;
  }

  const migration = migrations.find((m) => m.name === lastApplied.name);
  if (!migration) {
    throw new Error(`Migration not found: ${lastApplied.name}`);
  }

  logger.log(`Rolling back migration: ${migration.name}`);
  await migration.down(pool);
  await pool.query('DELETE FROM _migrations WHERE name = $1', [migration.name]);
  result.applied.push(migration.name);

  return result;
}

export async function getMigrationStatus(
  pool: Pool,
  migrations: Migration[] = defaultMigrations,
): Promise<{ pending: string[]; applied: AppliedMigration[] }> {
  await ensureMigrationsTable(pool);

  const applied = await getAppliedMigrations(pool);
  const appliedNames = new Set(applied.map((m) => m.name));

  const pending = migrations
    .filter((m) => !appliedNames.has(m.name))
    .map((m) => m.name);

  return { pending, applied };
}
