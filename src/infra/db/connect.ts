import { PgSqlClient } from './pool.js';
import { SqliteSqlClient } from './sqlite.js';
import { resolveDatabaseTarget, type SqlClient } from './sqlClient.js';

/**
 * Open the store named by DATABASE_URL (see resolveDatabaseTarget).
 */
export function createSqlClient(databaseUrl: string | undefined): SqlClient {
  const target = resolveDatabaseTarget(databaseUrl);
  if (target.dialect === 'postgres') {
    return new PgSqlClient(target.connectionString);
  }
  return new SqliteSqlClient(target.filename);
}
