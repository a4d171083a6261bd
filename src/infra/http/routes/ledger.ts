import { Router } from 'express';
import { z } from 'zod';
import { AppContext } from '../../context.js';
import { ValidationError } from '../../../domain/ledger/errors.js';
import { requireSession, currentUser } from '../middleware/auth.js';
import { validateForm } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { addTransactionPage, dashboardPage, transactionsPage } from '../views/pages.js';

/**
 * @openapi
 * /:
 *   get:
 *     tags: [Ledger]
 *     summary: Dashboard with income, expense, balance and the 10 most recent transactions
 *     security: [{ sessionCookie: [] }]
 *     parameters:
 *       - in: query
 *         name: added
 *         schema: { type: string, enum: ['1'] }
 *         description: Show the "transaction added" notice
 *     responses:
 *       200:
 *         description: HTML dashboard
 *         content: { text/html: {} }
 *       302:
 *         description: Not logged in, redirect to /login
 *
 * /transactions:
 *   get:
 *     tags: [Ledger]
 *     summary: Every transaction, most recent first
 *     security: [{ sessionCookie: [] }]
 *     responses:
 *       200:
 *         description: HTML table
 *         content: { text/html: {} }
 *       302:
 *         description: Not logged in, redirect to /login
 *
 * /add:
 *   get:
 *     tags: [Ledger]
 *     summary: New transaction form
 *     security: [{ sessionCookie: [] }]
 *     responses:
 *       200:
 *         description: HTML form
 *         content: { text/html: {} }
 *   post:
 *     tags: [Ledger]
 *     summary: Record an income or expense
 *     security: [{ sessionCookie: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/x-www-form-urlencoded:
 *           schema:
 *             type: object
 *             required: [date, type, category, amount]
 *             properties:
 *               date: { type: string, format: date, example: '2024-01-05' }
 *               type: { type: string, enum: [Income, Expense] }
 *               category: { type: string, example: Groceries }
 *               description: { type: string }
 *               amount: { type: string, example: '50.25' }
 *     responses:
 *       303:
 *         description: Stored, redirect to the dashboard
 *       400:
 *         description: Invalid input, form shown again with a notice; nothing stored
 */

const RECENT_LIMIT = 10;

const addTransactionFormSchema = z.object({
  date: z.string(),
  type: z.string(),
  category: z.string(),
  description: z.string().optional(),
  amount: z.string(),
});

const dashboardQuerySchema = z.object({
  added: z.literal('1').optional(),
});

export function createLedgerRoutes(ctx: AppContext) {
  const router = Router();
  const { sessions, queries, reports, addTransaction } = ctx;

  // All routes require a session
  router.use(requireSession(sessions));

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const user = currentUser(req);
      const query = dashboardQuerySchema.safeParse(req.query);
      const [summary, recent] = await Promise.all([
        reports.computeSummary(),
        queries.listRecent(RECENT_LIMIT),
      ]);

      const notice =
        query.success && query.data.added
          ? { level: 'success' as const, message: 'Transaction added successfully!' }
          : undefined;
      res.type('html').send(dashboardPage(user.username, summary, recent, notice));
    })
  );

  router.get(
    '/transactions',
    asyncHandler(async (req, res) => {
      const user = currentUser(req);
      const transactions = await queries.listAll();
      res.type('html').send(transactionsPage(user.username, transactions));
    })
  );

  router.get('/add', (req, res) => {
    res.type('html').send(addTransactionPage(currentUser(req).username));
  });

  router.post(
    '/add',
    validateForm(addTransactionFormSchema, (req, res) => {
      res
        .status(400)
        .type('html')
        .send(
          addTransactionPage(currentUser(req).username, {}, {
            level: 'danger',
            message: 'Invalid data provided. Please check your inputs.',
          })
        );
    }),
    asyncHandler(async (req, res) => {
      const user = currentUser(req);
      const form = addTransactionFormSchema.parse(req.body);

      try {
        await addTransaction.execute({ ...form, ownerId: user.userId });
      } catch (error) {
        if (error instanceof ValidationError) {
          res
            .status(400)
            .type('html')
            .send(addTransactionPage(user.username, form, { level: 'warning', message: error.message }));
          return;
        }
        throw error;
      }

      res.redirect(303, '/?added=1');
    })
  );

  return router;
}
