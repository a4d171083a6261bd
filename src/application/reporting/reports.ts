import { formatCalendarDate } from '../../domain/ledger/calendarDate.js';
import { Money } from '../../domain/ledger/money.js';
import { transactionsToCsv } from '../../domain/reporting/csv.js';
import { LedgerQueries } from '../ledger/queries.js';

export interface Summary {
  income: Money;
  expense: Money;
  balance: Money;
}

export class ReportingService {
  constructor(
    private queries: LedgerQueries,
    private exportFilePrefix: string
  ) {}

  async computeSummary(): Promise<Summary> {
    const [incomeCents, expenseCents] = await Promise.all([
      this.queries.sumByType('Income'),
      this.queries.sumByType('Expense'),
    ]);

    const income = Money.fromCents(incomeCents);
    const expense = Money.fromCents(expenseCents);
    return {
      income,
      expense,
      balance: income.subtract(expense),
    };
  }

  /**
   * Every transaction as UTF-8 CSV, most recent first.
   */
  async exportCsv(): Promise<Buffer> {
    const transactions = await this.queries.listAll();
    return Buffer.from(transactionsToCsv(transactions), 'utf-8');
  }

  exportFilename(now: Date = new Date()): string {
    return `${this.exportFilePrefix}_transactions_${formatCalendarDate(now)}.csv`;
  }
}
