import type { QueryResultRow } from 'pg';

export type SqlDialect = 'postgres' | 'sqlite';

export interface SqlResult<T> {
  rows: T[];
  rowCount: number;
}

/**
 * Minimal query surface shared by PostgreSQL and the embedded SQLite store.
 * Statements use `$1, $2, …` placeholders in both dialects.
 */
export interface SqlExecutor {
  query<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params?: readonly unknown[]
  ): Promise<SqlResult<T>>;

  /** Run a script of one or more statements without parameters. */
  exec(sql: string): Promise<void>;
}

export interface SqlClient extends SqlExecutor {
  readonly dialect: SqlDialect;

  /** Run `fn` inside BEGIN/COMMIT; any thrown error rolls back. */
  transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}

export type DatabaseTarget =
  | { dialect: 'postgres'; connectionString: string }
  | { dialect: 'sqlite'; filename: string };

export const DEFAULT_SQLITE_FILE = 'finance.db';

/**
 * Interpret DATABASE_URL. Unset or empty means the embedded single-file store.
 *
 * - `postgres://…` / `postgresql://…` → PostgreSQL
 * - `sqlite:finance.db`, `sqlite:///finance.db`, `sqlite::memory:` → SQLite
 */
export function resolveDatabaseTarget(url: string | undefined): DatabaseTarget {
  const value = url?.trim() ?? '';
  if (value === '') {
    return { dialect: 'sqlite', filename: DEFAULT_SQLITE_FILE };
  }

  if (value.startsWith('postgres://') || value.startsWith('postgresql://')) {
    return { dialect: 'postgres', connectionString: value };
  }

  if (value.startsWith('sqlite:')) {
    let filename = value.slice('sqlite:'.length);
    if (filename.startsWith('///')) {
      filename = filename.slice(3);
    }
    return { dialect: 'sqlite', filename: filename === '' ? DEFAULT_SQLITE_FILE : filename };
  }

  throw new Error(`Unsupported DATABASE_URL scheme: ${value.split(':')[0]}`);
}
