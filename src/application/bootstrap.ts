import { SqlClient } from '../infra/db/sqlClient.js';
import { runMigrations } from '../infra/db/migrate.js';
import { CredentialStore } from './auth/credentialStore.js';
import { ConfigurationError } from './errors.js';

export interface BootstrapOptions {
  adminUsername: string;
  adminPassword?: string;
  migrationsRoot?: string;
}

export type BootstrapResult =
  | { status: 'initialized'; username: string; appliedMigrations: number[] }
  | { status: 'already-initialized'; username: string; appliedMigrations: number[] };

/**
 * Create the schema and seed one admin user. Idempotent: when the admin
 * already exists no user row is written.
 */
export async function bootstrap(
  client: SqlClient,
  credentials: CredentialStore,
  options: BootstrapOptions
): Promise<BootstrapResult> {
  const appliedMigrations = await runMigrations(client, options.migrationsRoot);

  if (await credentials.hasUser(options.adminUsername)) {
    return { status: 'already-initialized', username: options.adminUsername, appliedMigrations };
  }

  if (!options.adminPassword) {
    throw new ConfigurationError('ADMIN_PASSWORD is required to create the admin user');
  }

  await credentials.createUser(options.adminUsername, options.adminPassword);
  return { status: 'initialized', username: options.adminUsername, appliedMigrations };
}
