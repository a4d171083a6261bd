import { loadConfig } from '../infra/config.js';
import { createAppContext } from '../infra/context.js';
import { runMigrations } from '../infra/db/migrate.js';
import { DuplicateResourceError } from '../application/errors.js';

/**
 * Usage: npm run user:create -- <username> <password>
 */
async function createUser(args: string[]): Promise<number> {
  const [username, password] = args;
  if (!username || !password) {
    console.error('Usage: npm run user:create -- <username> <password>');
    return 1;
  }

  const ctx = createAppContext(loadConfig());
  try {
    await runMigrations(ctx.db);
    const user = await ctx.credentials.createUser(username, password);
    console.log(`User '${user.username}' created (id ${user.id}).`);
    return 0;
  } catch (error) {
    if (error instanceof DuplicateResourceError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  } finally {
    await ctx.db.close();
  }
}

createUser(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('Failed to create user:', error);
    process.exit(1);
  }
);
