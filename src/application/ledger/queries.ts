import { Transaction, TransactionType } from '../../domain/ledger/transaction.js';
import { TransactionRepo } from '../../infra/db/transactionRepo.js';

/**
 * Read side of the ledger. Every list is most-recent-first with same-day
 * rows in insertion order. `ownerId` narrows to one user's transactions.
 */
export class LedgerQueries {
  constructor(private transactionRepo: TransactionRepo) {}

  async listAll(ownerId?: number): Promise<Transaction[]> {
    return this.transactionRepo.list({ ownerId });
  }

  async listRecent(n: number, ownerId?: number): Promise<Transaction[]> {
    if (!Number.isInteger(n) || n < 0) {
      throw new RangeError(`listRecent expects a non-negative integer, got ${n}`);
    }
    if (n === 0) {
      return [];
    }
    return this.transactionRepo.list({ ownerId, limit: n });
  }

  /** Sum in cents; 0 when nothing matches. */
  async sumByType(type: TransactionType, ownerId?: number): Promise<number> {
    return this.transactionRepo.sumByType(type, ownerId);
  }

  async count(ownerId?: number): Promise<number> {
    return this.transactionRepo.count(ownerId);
  }
}
