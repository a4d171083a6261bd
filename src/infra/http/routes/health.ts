import { Router } from 'express';
import { SqlClient } from '../../db/sqlClient.js';

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * @openapi
 * /healthz:
 *   get:
 *     tags: [Health]
 *     summary: Store connectivity probe (no auth required)
 *     responses:
 *       200: { description: OK }
 *       500:
 *         description: Store unreachable
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */
export function createHealthRoutes(db: SqlClient) {
  const router = Router();

  router.get('/healthz', (_req, res, next) => {
    withTimeout(db.query('SELECT 1'), 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  return router;
}
