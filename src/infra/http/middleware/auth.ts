import type { CookieOptions, NextFunction, Request, RequestHandler, Response } from 'express';
import { UserIdentity } from '../../../domain/auth/user.js';
import { SessionAuthenticator } from '../../../application/auth/sessionAuthenticator.js';
import { AuthorizationError } from '../../../application/errors.js';
import { asyncHandler } from './asyncHandler.js';

declare global {
  namespace Express {
    interface Request {
      identity?: UserIdentity;
    }
  }
}

export const SESSION_COOKIE = 'session';
export const LOGIN_PATH = '/login';

export function sessionCookieOptions(ttlSeconds: number, secure: boolean): CookieOptions {
  return {
    httpOnly: true,
    sameSite: 'lax',
    secure,
    maxAge: ttlSeconds * 1000,
    path: '/',
  };
}

export function readSessionToken(req: Request): string | undefined {
  const value: unknown = req.cookies?.[SESSION_COOKIE];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Gate a route on a live session. Anything short of one sends the browser
 * to the login page.
 */
export function requireSession(sessions: SessionAuthenticator): RequestHandler {
  return asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
    try {
      req.identity = await sessions.requireSession(readSessionToken(req));
    } catch (error) {
      if (error instanceof AuthorizationError) {
        res.clearCookie(SESSION_COOKIE, { path: '/' });
        res.redirect(LOGIN_PATH);
        return;
      }
      throw error;
    }
    next();
  });
}

/**
 * Identity set by requireSession.
 */
export function currentUser(req: Request): UserIdentity {
  if (!req.identity) {
    throw new AuthorizationError();
  }
  return req.identity;
}
