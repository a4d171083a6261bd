import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ValidationError } from '../../../domain/ledger/errors.js';
import { AuthenticationError, AuthorizationError } from '../../../application/errors.js';
import { errorPage, loginPage } from '../views/pages.js';
import { layout } from '../views/html.js';
import { LOGIN_PATH } from './auth.js';

/**
 * Last-resort mapping for errors a route did not handle itself. Nothing
 * technical reaches the browser: unknown failures become a generic page.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof AuthorizationError) {
    res.redirect(LOGIN_PATH);
    return;
  }

  if (err instanceof AuthenticationError) {
    res.status(401).type('html').send(loginPage({ level: 'danger', message: err.message }));
    return;
  }

  if (err instanceof ValidationError || err instanceof ZodError) {
    const message =
      err instanceof ValidationError ? err.message : 'Invalid data provided. Please check your inputs.';
    res
      .status(400)
      .type('html')
      .send(
        layout(
          { title: 'Invalid request', username: req.identity?.username, notice: { level: 'warning', message } },
          '<p><a href="/">Back to the dashboard</a></p>'
        )
      );
    return;
  }

  console.error('Error:', err);
  res.status(500).type('html').send(errorPage());
}
