import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import type { SqlClient } from './sqlClient.js';

const MIGRATIONS_ROOT = join(process.cwd(), 'src/infra/db/migrations');

interface Migration {
  filename: string;
  version: number;
}

async function getMigrations(dir: string): Promise<Migration[]> {
  const files = await readdir(dir);
  const sqlFiles = files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);

  return sqlFiles;
}

async function ensureMigrationsTable(client: SqlClient): Promise<void> {
  const appliedAt =
    client.dialect === 'postgres'
      ? 'TIMESTAMPTZ NOT NULL DEFAULT NOW()'
      : 'TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP';

  await client.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at ${appliedAt}
    )
  `);
}

async function getAppliedMigrations(client: SqlClient): Promise<number[]> {
  const result = await client.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => Number(row.version));
}

/**
 * Apply pending migrations for the client's dialect, each in its own
 * transaction. Returns the versions applied by this call.
 */
export async function runMigrations(
  client: SqlClient,
  migrationsRoot: string = MIGRATIONS_ROOT
): Promise<number[]> {
  const dir = join(migrationsRoot, client.dialect);

  await ensureMigrationsTable(client);
  const migrations = await getMigrations(dir);
  const applied = await getAppliedMigrations(client);

  const pending = migrations.filter((m) => !applied.includes(m.version));
  if (pending.length === 0) {
    return [];
  }

  for (const migration of pending) {
    const sql = await readFile(join(dir, migration.filename), 'utf-8');
    await client.transaction(async (tx) => {
      await tx.exec(sql);
      await tx.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
        migration.version,
      ]);
    });
    console.log(`✓ Applied migration ${migration.version}: ${migration.filename}`);
  }

  return pending.map((m) => m.version);
}
