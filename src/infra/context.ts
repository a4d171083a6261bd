import { AppConfig } from './config.js';
import { createSqlClient } from './db/connect.js';
import { SqlClient } from './db/sqlClient.js';
import { UserRepo } from './db/userRepo.js';
import { TransactionRepo } from './db/transactionRepo.js';
import { SessionRepo } from './db/sessionRepo.js';
import { CredentialStore } from '../application/auth/credentialStore.js';
import { SessionAuthenticator } from '../application/auth/sessionAuthenticator.js';
import { AddTransactionUseCase } from '../application/ledger/addTransaction.js';
import { LedgerQueries } from '../application/ledger/queries.js';
import { ReportingService } from '../application/reporting/reports.js';

/**
 * Everything a request handler needs, built once at startup and passed down
 * explicitly.
 */
export interface AppContext {
  config: AppConfig;
  db: SqlClient;
  credentials: CredentialStore;
  sessions: SessionAuthenticator;
  addTransaction: AddTransactionUseCase;
  queries: LedgerQueries;
  reports: ReportingService;
}

/**
 * Wire the store first, then repositories, then services. `db` may be
 * supplied (tests pass an in-memory store); otherwise DATABASE_URL is used.
 */
export function createAppContext(config: AppConfig, db?: SqlClient): AppContext {
  const client = db ?? createSqlClient(config.databaseUrl);

  const userRepo = new UserRepo(client);
  const transactionRepo = new TransactionRepo(client);
  const sessionRepo = new SessionRepo(client);

  const credentials = new CredentialStore(userRepo);
  const queries = new LedgerQueries(transactionRepo);

  return {
    config,
    db: client,
    credentials,
    sessions: new SessionAuthenticator(credentials, sessionRepo, {
      secret: config.secretKey,
      ttlSeconds: config.sessionTtlSeconds,
    }),
    addTransaction: new AddTransactionUseCase(transactionRepo),
    queries,
    reports: new ReportingService(queries, config.exportFilePrefix),
  };
}
