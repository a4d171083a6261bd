import rateLimit from 'express-rate-limit';
import { loginPage } from '../views/pages.js';

/**
 * Login attempts per IP per minute. Each app gets its own in-memory store
 * (resets on server restart).
 */
export function createLoginRateLimiter(max: number) {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => {
      res
        .status(429)
        .type('html')
        .send(
          loginPage({
            level: 'danger',
            message: 'Too many login attempts, please try again later.',
          })
        );
    },
  });
}
