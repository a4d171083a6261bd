import { createTransaction, Transaction, TransactionInput } from '../../domain/ledger/transaction.js';
import { TransactionRepo } from '../../infra/db/transactionRepo.js';

export interface AddTransactionCommand extends TransactionInput {
  ownerId: number;
}

export class AddTransactionUseCase {
  constructor(private transactionRepo: TransactionRepo) {}

  /**
   * Validate and insert a single transaction. A ValidationError is thrown
   * before anything reaches the store.
   */
  async execute(command: AddTransactionCommand): Promise<Transaction> {
    const { ownerId, ...input } = command;
    const tx = createTransaction(input, ownerId);
    return this.transactionRepo.insert(tx);
  }
}
