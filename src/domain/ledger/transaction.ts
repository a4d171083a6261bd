import { Money } from './money.js';
import { parseCalendarDate } from './calendarDate.js';
import { InvalidTypeError } from './errors.js';

export const TRANSACTION_TYPES = ['Income', 'Expense'] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

/**
 * A stored ledger entry. Write-once: there is no edit or delete.
 */
export interface Transaction {
  readonly id: number;
  readonly date: string; // YYYY-MM-DD
  readonly type: TransactionType;
  readonly category: string;
  readonly description: string;
  readonly amountCents: number;
  readonly userId: number;
}

/**
 * Validated values ready to be inserted.
 */
export type NewTransaction = Omit<Transaction, 'id'>;

/**
 * Raw form input as submitted by the user.
 */
export interface TransactionInput {
  date: string;
  type: string;
  category: string;
  description?: string;
  amount: string;
}

export function isTransactionType(value: string): value is TransactionType {
  return TRANSACTION_TYPES.some((type) => type === value);
}

export function parseTransactionType(value: string): TransactionType {
  if (!isTransactionType(value)) {
    throw new InvalidTypeError();
  }
  return value;
}

/**
 * Validate raw input into a NewTransaction owned by `userId`.
 * Checks run amount, then type, then date; the first failure is thrown.
 * Category and description are stored exactly as entered.
 */
export function createTransaction(input: TransactionInput, userId: number): NewTransaction {
  const amount = Money.parse(input.amount);
  const type = parseTransactionType(input.type);
  const date = parseCalendarDate(input.date);

  return {
    date,
    type,
    category: input.category,
    description: input.description ?? '',
    amountCents: amount.cents,
    userId,
  };
}
