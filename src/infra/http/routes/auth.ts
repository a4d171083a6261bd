import { Router } from 'express';
import { z } from 'zod';
import { AppContext } from '../../context.js';
import { AuthenticationError } from '../../../application/errors.js';
import { createLoginRateLimiter } from '../middleware/rateLimit.js';
import { validateForm } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import {
  LOGIN_PATH,
  SESSION_COOKIE,
  readSessionToken,
  requireSession,
  sessionCookieOptions,
} from '../middleware/auth.js';
import { loginPage } from '../views/pages.js';

/**
 * @openapi
 * /login:
 *   get:
 *     tags: [Auth]
 *     summary: Login form
 *     responses:
 *       200:
 *         description: HTML login form
 *         content: { text/html: {} }
 *       302:
 *         description: Already logged in, redirect to the dashboard
 *   post:
 *     tags: [Auth]
 *     summary: Log in and start a session
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             type: object
 *             required: [username, password]
 *             properties:
 *               username: { type: string }
 *               password: { type: string }
 *     responses:
 *       303:
 *         description: Logged in; session cookie set, redirect to the dashboard
 *       400:
 *         description: Missing fields, form shown again
 *       401:
 *         description: Invalid credentials, form shown again with a generic message
 *       429:
 *         description: Too many login attempts
 *
 * /logout:
 *   get:
 *     tags: [Auth]
 *     summary: End the session
 *     security: [{ sessionCookie: [] }]
 *     responses:
 *       302:
 *         description: Redirect to the login form
 */

const loginFormSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

export function createAuthRoutes(ctx: AppContext) {
  const router = Router();
  const { sessions, config } = ctx;

  router.get(
    '/login',
    asyncHandler(async (req, res) => {
      if (await sessions.findSession(readSessionToken(req))) {
        res.redirect('/');
        return;
      }
      res.type('html').send(loginPage());
    })
  );

  router.post(
    '/login',
    createLoginRateLimiter(config.loginRateLimit),
    validateForm(loginFormSchema, (req, res) => {
      res
        .status(400)
        .type('html')
        .send(loginPage({ level: 'warning', message: 'Please enter your username and password.' }));
    }),
    asyncHandler(async (req, res) => {
      const body = loginFormSchema.parse(req.body);
      try {
        const result = await sessions.login(body.username, body.password);
        res.cookie(
          SESSION_COOKIE,
          result.token,
          sessionCookieOptions(config.sessionTtlSeconds, config.secureCookies)
        );
        res.redirect(303, '/');
      } catch (error) {
        if (error instanceof AuthenticationError) {
          res
            .status(401)
            .type('html')
            .send(loginPage({ level: 'danger', message: error.message }, body.username));
          return;
        }
        throw error;
      }
    })
  );

  router.get(
    '/logout',
    requireSession(sessions),
    asyncHandler(async (req, res) => {
      await sessions.logout(readSessionToken(req));
      res.clearCookie(SESSION_COOKIE, { path: '/' });
      res.redirect(LOGIN_PATH);
    })
  );

  return router;
}
