import { loadConfig } from '../config.js';
import { createAppContext } from '../context.js';
import { runMigrations } from '../db/migrate.js';
import { createApp } from './app.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const ctx = createAppContext(config);

  // Schema must exist before the first request.
  await runMigrations(ctx.db);

  const app = createApp(ctx);
  const server = app.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}`);
    console.log(`Health check: http://localhost:${config.port}/healthz`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      ctx.db.close().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('Failed to close database:', error);
          process.exit(1);
        }
      );
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
