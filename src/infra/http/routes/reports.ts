import { Router } from 'express';
import { AppContext } from '../../context.js';
import { requireSession } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /download/csv:
 *   get:
 *     tags: [Reports]
 *     summary: Download every transaction as CSV
 *     security: [{ sessionCookie: [] }]
 *     responses:
 *       200:
 *         description: "Attachment named <prefix>_transactions_<YYYY-MM-DD>.csv"
 *         content:
 *           text/csv:
 *             example: "Date,Type,Category,Description,Amount\n2024-01-10,Expense,Groceries,Weekly,50.25\n"
 *       302:
 *         description: Not logged in, redirect to /login
 */
export function createReportRoutes(ctx: AppContext) {
  const router = Router();
  const { sessions, reports } = ctx;

  router.get(
    '/download/csv',
    requireSession(sessions),
    asyncHandler(async (_req, res) => {
      const csv = await reports.exportCsv();
      res.attachment(reports.exportFilename());
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.send(csv);
    })
  );

  return router;
}
