import express from 'express';
import cookieParser from 'cookie-parser';
import { AppContext } from '../context.js';
import { createAuthRoutes } from './routes/auth.js';
import { createLedgerRoutes } from './routes/ledger.js';
import { createReportRoutes } from './routes/reports.js';
import { createHealthRoutes } from './routes/health.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';

export interface CreateAppOptions {
  /** Serve /docs. Off in tests to skip scanning the route files. */
  docs?: boolean;
}

/**
 * Build the Express app over an already-initialised context.
 */
export function createApp(ctx: AppContext, options: CreateAppOptions = {}): express.Application {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.urlencoded({ extended: false }));
  app.use(cookieParser());

  // Unauthenticated
  app.use(createHealthRoutes(ctx.db));
  if (options.docs ?? true) {
    app.use(createSwaggerRoutes());
  }
  app.use(createAuthRoutes(ctx));

  // Protected
  app.use(createReportRoutes(ctx));
  app.use(createLedgerRoutes(ctx));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
