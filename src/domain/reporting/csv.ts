import { Money } from '../ledger/money.js';
import { Transaction } from '../ledger/transaction.js';

export const CSV_HEADER = ['Date', 'Type', 'Category', 'Description', 'Amount'] as const;

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Quote a field only when it holds a comma, quote or line break; embedded
 * quotes are doubled.
 */
export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

export function toCsvRow(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(',');
}

/**
 * Render transactions as a CSV document. Rows keep the given order; every
 * line, the last included, ends with "\n".
 */
export function transactionsToCsv(transactions: readonly Transaction[]): string {
  const lines = [toCsvRow(CSV_HEADER)];
  for (const tx of transactions) {
    lines.push(
      toCsvRow([
        tx.date,
        tx.type,
        tx.category,
        tx.description,
        Money.fromCents(tx.amountCents).toString(),
      ])
    );
  }
  return lines.map((line) => `${line}\n`).join('');
}
