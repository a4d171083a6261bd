import { Money } from '../../../domain/ledger/money.js';
import { Transaction, TRANSACTION_TYPES } from '../../../domain/ledger/transaction.js';
import { Summary } from '../../../application/reporting/reports.js';
import { escapeHtml, layout, Notice } from './html.js';

function renderTransactionTable(transactions: readonly Transaction[]): string {
  if (transactions.length === 0) {
    return '<p class="empty">No transactions yet.</p>';
  }

  const rows = transactions
    .map(
      (tx) => `<tr class="${tx.type === 'Income' ? 'income' : 'expense'}">
  <td>${escapeHtml(tx.date)}</td>
  <td>${escapeHtml(tx.type)}</td>
  <td>${escapeHtml(tx.category)}</td>
  <td>${escapeHtml(tx.description)}</td>
  <td class="amount">${escapeHtml(Money.fromCents(tx.amountCents).toString())}</td>
</tr>`
    )
    .join('\n');

  return `<table>
<thead><tr><th>Date</th><th>Type</th><th>Category</th><th>Description</th><th>Amount</th></tr></thead>
<tbody>
${rows}
</tbody>
</table>`;
}

export function dashboardPage(
  username: string,
  summary: Summary,
  recent: readonly Transaction[],
  notice?: Notice
): string {
  const body = `<section class="summary">
  <div><h2>Income</h2><p id="income">${escapeHtml(summary.income.toString())}</p></div>
  <div><h2>Expense</h2><p id="expense">${escapeHtml(summary.expense.toString())}</p></div>
  <div><h2>Balance</h2><p id="balance">${escapeHtml(summary.balance.toString())}</p></div>
</section>
<h2>Recent transactions</h2>
${renderTransactionTable(recent)}
<p><a href="/transactions">All transactions</a></p>`;

  return layout({ title: 'Dashboard', username, notice }, body);
}

export function transactionsPage(username: string, transactions: readonly Transaction[]): string {
  return layout({ title: 'Transactions', username }, renderTransactionTable(transactions));
}

export interface TransactionFormValues {
  date?: string;
  type?: string;
  category?: string;
  description?: string;
  amount?: string;
}

export function addTransactionPage(
  username: string,
  values: TransactionFormValues = {},
  notice?: Notice
): string {
  const options = TRANSACTION_TYPES.map(
    (type) =>
      `<option value="${type}"${values.type === type ? ' selected' : ''}>${type}</option>`
  ).join('');

  const body = `<form method="post" action="/add">
  <label>Date <input type="date" name="date" required value="${escapeHtml(values.date ?? '')}"></label>
  <label>Type <select name="type" required>${options}</select></label>
  <label>Category <input type="text" name="category" required value="${escapeHtml(values.category ?? '')}"></label>
  <label>Description <input type="text" name="description" value="${escapeHtml(values.description ?? '')}"></label>
  <label>Amount <input type="number" name="amount" step="0.01" min="0.01" required value="${escapeHtml(values.amount ?? '')}"></label>
  <button type="submit">Add transaction</button>
</form>`;

  return layout({ title: 'Add transaction', username, notice }, body);
}

export function loginPage(notice?: Notice, username = ''): string {
  const body = `<form method="post" action="/login">
  <label>Username <input type="text" name="username" autocomplete="username" required value="${escapeHtml(username)}"></label>
  <label>Password <input type="password" name="password" autocomplete="current-password" required></label>
  <button type="submit">Log in</button>
</form>`;

  return layout({ title: 'Log in', notice }, body);
}

export function errorPage(): string {
  return layout(
    { title: 'Something went wrong' },
    '<p>The request could not be completed. Please try again later.</p><p><a href="/">Back to the dashboard</a></p>'
  );
}
