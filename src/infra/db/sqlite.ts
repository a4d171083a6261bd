import Database from 'better-sqlite3';
import type { QueryResultRow } from 'pg';
import type { SqlClient, SqlExecutor, SqlResult } from './sqlClient.js';

/**
 * Rewrite `$n` placeholders to positional `?` and reorder the parameters to
 * match, so repositories can share PostgreSQL-style SQL.
 */
export function toPositional(
  sql: string,
  params: readonly unknown[]
): { sql: string; params: unknown[] } {
  const ordered: unknown[] = [];
  const rewritten = sql.replace(/\$(\d+)/g, (_match, index: string) => {
    const position = Number(index) - 1;
    if (position < 0 || position >= params.length) {
      throw new Error(`Missing value for placeholder $${index}`);
    }
    ordered.push(params[position]);
    return '?';
  });
  return { sql: rewritten, params: ordered };
}

/**
 * Embedded single-file store. better-sqlite3 is synchronous; each call
 * completes before the returned promise settles.
 */
export class SqliteSqlClient implements SqlClient {
  readonly dialect = 'sqlite' as const;
  private readonly db: Database.Database;

  constructor(filename: string) {
    this.db = new Database(filename);
    this.db.pragma('foreign_keys = ON');
    if (filename !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
  }

  async query<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params: readonly unknown[] = []
  ): Promise<SqlResult<T>> {
    const positional = toPositional(sql, params);
    const statement = this.db.prepare<unknown[], T>(positional.sql);

    if (statement.reader) {
      const rows = statement.all(...positional.params);
      return { rows, rowCount: rows.length };
    }

    const info = statement.run(...positional.params);
    return { rows: [], rowCount: info.changes };
  }

  async exec(sql: string): Promise<void> {
    this.db.exec(sql);
  }

  async transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    this.db.exec('BEGIN');
    try {
      const result = await fn(this);
      this.db.exec('COMMIT');
      return result;
    } catch (error) {
      this.db.exec('ROLLBACK');
      throw error;
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
