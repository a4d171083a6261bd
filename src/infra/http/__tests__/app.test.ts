import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type { Application } from 'express';
import { createApp } from '../app.js';
import { AppContext } from '../../context.js';
import { createTestContext } from '../../../testing/testContext.js';
import { formatCalendarDate } from '../../../domain/ledger/calendarDate.js';

const GENERIC_FAILURE_NOTICE =
  '<p class="notice notice-danger" role="alert">Invalid username or password. Please try again.</p>';

function sessionCookie(res: request.Response): string {
  const header: unknown = res.headers['set-cookie'];
  const cookies: unknown[] = Array.isArray(header) ? header : [];
  const match = cookies.find(
    (cookie): cookie is string => typeof cookie === 'string' && cookie.startsWith('session=')
  );
  if (!match) {
    throw new Error('No session cookie in response');
  }
  return match.split(';')[0];
}

describe('Finance tracker HTTP', () => {
  let ctx: AppContext;
  let app: Application;

  beforeEach(async () => {
    ctx = await createTestContext();
    await ctx.credentials.createUser('alice', 'correct-horse');
    app = createApp(ctx, { docs: false });
  });

  afterEach(async () => {
    await ctx.db.close();
  });

  async function loggedInAgent() {
    const agent = request.agent(app);
    const res = await agent
      .post('/login')
      .type('form')
      .send({ username: 'alice', password: 'correct-horse' });
    expect(res.status).toBe(303);
    return agent;
  }

  describe('without a session', () => {
    it.each(['/', '/transactions', '/add', '/download/csv', '/logout'])(
      'should redirect GET %s to /login',
      async (path) => {
        const res = await request(app).get(path);

        expect(res.status).toBe(302);
        expect(res.headers.location).toBe('/login');
      }
    );

    it('should redirect POST /add to /login without writing', async () => {
      const res = await request(app)
        .post('/add')
        .type('form')
        .send({ date: '2024-01-05', type: 'Income', category: 'Salary', amount: '10' });

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/login');
      expect(await ctx.queries.count()).toBe(0);
    });

    it('should redirect a revoked session cookie', async () => {
      const res = await request(app).get('/').set('Cookie', 'session=not-a-token');

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/login');
    });

    it('should serve the login form', async () => {
      const res = await request(app).get('/login');

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toContain('text/html');
      expect(res.text).toContain('<form method="post" action="/login">');
    });

    it('should answer the health check', async () => {
      const res = await request(app).get('/healthz');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'ok' });
    });
  });

  describe('login', () => {
    it('should set a session cookie and redirect to the dashboard', async () => {
      const res = await request(app)
        .post('/login')
        .type('form')
        .send({ username: 'alice', password: 'correct-horse' });

      expect(res.status).toBe(303);
      expect(res.headers.location).toBe('/');
      expect(sessionCookie(res)).toMatch(/^session=.+/);
    });

    it('should only mark the session cookie Secure when configured', async () => {
      const plain = await request(app)
        .post('/login')
        .type('form')
        .send({ username: 'alice', password: 'correct-horse' });

      const secureCtx = await createTestContext({ secureCookies: true });
      try {
        await secureCtx.credentials.createUser('alice', 'correct-horse');
        const secure = await request(createApp(secureCtx, { docs: false }))
          .post('/login')
          .type('form')
          .send({ username: 'alice', password: 'correct-horse' });

        expect(String(plain.headers['set-cookie'])).not.toMatch(/;\s*Secure/);
        expect(String(secure.headers['set-cookie'])).toMatch(/;\s*Secure/);
      } finally {
        await secureCtx.db.close();
      }
    });

    it('should show the same notice for a wrong password and an unknown user', async () => {
      const wrongPassword = await request(app)
        .post('/login')
        .type('form')
        .send({ username: 'alice', password: 'battery-staple' });
      const unknownUser = await request(app)
        .post('/login')
        .type('form')
        .send({ username: 'mallory', password: 'correct-horse' });

      expect(wrongPassword.status).toBe(401);
      expect(unknownUser.status).toBe(401);
      expect(wrongPassword.text).toContain(GENERIC_FAILURE_NOTICE);
      expect(unknownUser.text).toContain(GENERIC_FAILURE_NOTICE);
      expect(wrongPassword.headers['set-cookie']).toBeUndefined();
    });

    it('should ask for both fields when one is missing', async () => {
      const res = await request(app).post('/login').type('form').send({ username: 'alice' });

      expect(res.status).toBe(400);
      expect(res.text).toContain('Please enter your username and password.');
    });

    it('should send a logged-in user from /login to the dashboard', async () => {
      const agent = await loggedInAgent();
      const res = await agent.get('/login');

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/');
    });

    it('should rate limit repeated attempts', async () => {
      await ctx.db.close();
      ctx = await createTestContext({ loginRateLimit: 2 });
      app = createApp(ctx, { docs: false });

      const attempt = () =>
        request(app).post('/login').type('form').send({ username: 'x', password: 'y' });

      expect((await attempt()).status).toBe(401);
      expect((await attempt()).status).toBe(401);

      const limited = await attempt();
      expect(limited.status).toBe(429);
      expect(limited.text).toContain('Too many login attempts, please try again later.');
    });
  });

  describe('dashboard', () => {
    it('should show zero totals for an empty ledger', async () => {
      const agent = await loggedInAgent();
      const res = await agent.get('/');

      expect(res.status).toBe(200);
      expect(res.text).toContain('<p id="income">0.00</p>');
      expect(res.text).toContain('<p id="expense">0.00</p>');
      expect(res.text).toContain('<p id="balance">0.00</p>');
      expect(res.text).toContain('No transactions yet.');
    });

    it('should show at most the 10 most recent transactions', async () => {
      const agent = await loggedInAgent();
      for (let day = 1; day <= 11; day++) {
        await agent
          .post('/add')
          .type('form')
          .send({
            date: `2024-05-${String(day).padStart(2, '0')}`,
            type: 'Income',
            category: `Cat-${day}`,
            amount: '1',
          });
      }

      const res = await agent.get('/');
      expect(res.text).toContain('Cat-11');
      expect(res.text).toContain('Cat-2<');
      expect(res.text).not.toContain('Cat-1<');
      expect(res.text).toContain('<p id="income">11.00</p>');
    });
  });

  describe('adding transactions', () => {
    it('should serve the form', async () => {
      const agent = await loggedInAgent();
      const res = await agent.get('/add');

      expect(res.status).toBe(200);
      expect(res.text).toContain('<form method="post" action="/add">');
    });

    it('should store a valid transaction and redirect with a notice', async () => {
      const agent = await loggedInAgent();
      const res = await agent
        .post('/add')
        .type('form')
        .send({
          date: '2024-01-05',
          type: 'Income',
          category: 'Salary',
          description: '',
          amount: '1000.00',
        });

      expect(res.status).toBe(303);
      expect(res.headers.location).toBe('/?added=1');

      const dashboard = await agent.get('/?added=1');
      expect(dashboard.text).toContain('Transaction added successfully!');
      expect(dashboard.text).toContain('<p id="income">1000.00</p>');
      expect(dashboard.text).toContain('<p id="balance">1000.00</p>');

      const [stored] = await ctx.queries.listAll();
      const alice = await ctx.credentials.verify('alice', 'correct-horse');
      expect(stored.userId).toBe(alice?.id);
    });

    it('should store category and description as submitted', async () => {
      const agent = await loggedInAgent();
      const res = await agent
        .post('/add')
        .type('form')
        .send({ date: '2024-01-05', type: 'Income', category: ' Salary ', description: '', amount: '5' });

      expect(res.status).toBe(303);
      const [stored] = await ctx.queries.listAll();
      expect(stored.category).toBe(' Salary ');
      expect(stored.description).toBe('');
    });

    it.each([
      [{ amount: '0' }, 'Amount must be a positive number.'],
      [{ amount: '-4' }, 'Amount must be a positive number.'],
      [{ type: 'Gift' }, 'Type must be Income or Expense.'],
      [{ date: '2024-02-30' }, 'Date must be a valid calendar date (YYYY-MM-DD).'],
    ])('should redisplay the form for %o', async (override, message) => {
      const agent = await loggedInAgent();
      const res = await agent
        .post('/add')
        .type('form')
        .send({
          date: '2024-01-05',
          type: 'Expense',
          category: 'Groceries',
          amount: '12.50',
          ...override,
        });

      expect(res.status).toBe(400);
      expect(res.text).toContain(`<p class="notice notice-warning" role="alert">${message}</p>`);
      expect(res.text).toContain('<form method="post" action="/add">');
      expect(await ctx.queries.count()).toBe(0);
    });

    it('should treat a missing field as invalid data', async () => {
      const agent = await loggedInAgent();
      const res = await agent
        .post('/add')
        .type('form')
        .send({ date: '2024-01-05', type: 'Expense', category: 'Groceries' });

      expect(res.status).toBe(400);
      expect(res.text).toContain('Invalid data provided. Please check your inputs.');
      expect(await ctx.queries.count()).toBe(0);
    });

    it('should escape user text in pages', async () => {
      const agent = await loggedInAgent();
      await agent
        .post('/add')
        .type('form')
        .send({
          date: '2024-01-05',
          type: 'Expense',
          category: 'Misc',
          description: '<script>alert(1)</script>',
          amount: '1',
        });

      const res = await agent.get('/transactions');
      expect(res.text).toContain('&lt;script&gt;alert(1)&lt;/script&gt;');
      expect(res.text).not.toContain('<script>');
    });
  });

  describe('transaction list', () => {
    it('should list every transaction most recent first', async () => {
      const agent = await loggedInAgent();
      for (const date of ['2024-01-05', '2024-01-10', '2024-01-01']) {
        await agent
          .post('/add')
          .type('form')
          .send({ date, type: 'Expense', category: 'Misc', amount: '1' });
      }

      const res = await agent.get('/transactions');
      expect(res.status).toBe(200);

      const positions = ['2024-01-10', '2024-01-05', '2024-01-01'].map((d) => res.text.indexOf(d));
      expect(positions.every((p) => p >= 0)).toBe(true);
      expect([...positions].sort((a, b) => a - b)).toEqual(positions);
    });
  });

  describe('CSV export', () => {
    it('should download every transaction as an attachment', async () => {
      const agent = await loggedInAgent();
      await agent
        .post('/add')
        .type('form')
        .send({ date: '2024-01-05', type: 'Income', category: 'Salary', description: '', amount: '1000' });
      await agent
        .post('/add')
        .type('form')
        .send({ date: '2024-01-10', type: 'Expense', category: 'Groceries', description: 'Weekly', amount: '50.25' });

      const res = await agent.get('/download/csv');

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(res.headers['content-disposition']).toBe(
        `attachment; filename="test_transactions_${formatCalendarDate(new Date())}.csv"`
      );
      expect(res.text).toBe(
        'Date,Type,Category,Description,Amount\n' +
          '2024-01-10,Expense,Groceries,Weekly,50.25\n' +
          '2024-01-05,Income,Salary,,1000.00\n'
      );
    });
  });

  describe('logout', () => {
    it('should end the session so the old cookie stops working', async () => {
      const login = await request(app)
        .post('/login')
        .type('form')
        .send({ username: 'alice', password: 'correct-horse' });
      const cookie = sessionCookie(login);

      expect((await request(app).get('/').set('Cookie', cookie)).status).toBe(200);

      const logout = await request(app).get('/logout').set('Cookie', cookie);
      expect(logout.status).toBe(302);
      expect(logout.headers.location).toBe('/login');

      const after = await request(app).get('/').set('Cookie', cookie);
      expect(after.status).toBe(302);
      expect(after.headers.location).toBe('/login');
    });
  });
});
