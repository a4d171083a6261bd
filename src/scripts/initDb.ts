import { loadConfig } from '../infra/config.js';
import { createAppContext } from '../infra/context.js';
import { bootstrap } from '../application/bootstrap.js';

/**
 * Create the schema and the admin user. Safe to run repeatedly.
 */
async function initDb(): Promise<void> {
  const config = loadConfig();
  const ctx = createAppContext(config);

  try {
    const result = await bootstrap(ctx.db, ctx.credentials, {
      adminUsername: config.adminUsername,
      adminPassword: config.adminPassword,
    });

    if (result.status === 'initialized') {
      console.log(`Database initialized and user '${result.username}' created.`);
    } else {
      console.log(`Database already initialized and '${result.username}' user exists.`);
    }
  } finally {
    await ctx.db.close();
  }
}

initDb().catch((error: unknown) => {
  console.error('Initialization failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
