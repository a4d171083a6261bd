import type { SqlExecutor } from './sqlClient.js';
import {
  NewTransaction,
  Transaction,
  TransactionType,
  parseTransactionType,
} from '../../domain/ledger/transaction.js';

type TransactionRow = {
  id: number;
  occurred_on: string;
  type: string;
  category: string;
  description: string;
  amount_cents: number | string; // BIGINT arrives as a string from pg
  user_id: number;
};

// CAST keeps DATE columns as 'YYYY-MM-DD' text instead of pg's JS Date parsing.
const SELECT_COLUMNS = `id, CAST(occurred_on AS TEXT) AS occurred_on, type, category,
       description, amount_cents, user_id`;

// Most recent first; same-day rows keep insertion order.
const ORDER_BY = 'ORDER BY occurred_on DESC, id ASC';

function toTransaction(row: TransactionRow): Transaction {
  return {
    id: Number(row.id),
    date: row.occurred_on,
    type: parseTransactionType(row.type),
    category: row.category,
    description: row.description,
    amountCents: Number(row.amount_cents),
    userId: Number(row.user_id),
  };
}

function ownerFilter(ownerId: number | undefined, nextParam: number): { clause: string; params: number[] } {
  if (ownerId === undefined) {
    return { clause: '', params: [] };
  }
  return { clause: `user_id = $${nextParam}`, params: [ownerId] };
}

export class TransactionRepo {
  constructor(private readonly db: SqlExecutor) {}

  async insert(tx: NewTransaction): Promise<Transaction> {
    const result = await this.db.query<TransactionRow>(
      `INSERT INTO transactions (occurred_on, type, category, description, amount_cents, user_id)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${SELECT_COLUMNS}`,
      [tx.date, tx.type, tx.category, tx.description, tx.amountCents, tx.userId]
    );

    return toTransaction(result.rows[0]);
  }

  async list(options: { ownerId?: number; limit?: number } = {}): Promise<Transaction[]> {
    const owner = ownerFilter(options.ownerId, 1);
    const params: number[] = [...owner.params];
    let sql = `SELECT ${SELECT_COLUMNS} FROM transactions`;
    if (owner.clause) {
      sql += ` WHERE ${owner.clause}`;
    }
    sql += ` ${ORDER_BY}`;
    if (options.limit !== undefined) {
      params.push(options.limit);
      sql += ` LIMIT $${params.length}`;
    }

    const result = await this.db.query<TransactionRow>(sql, params);
    return result.rows.map(toTransaction);
  }

  async sumByType(type: TransactionType, ownerId?: number): Promise<number> {
    const owner = ownerFilter(ownerId, 2);
    const result = await this.db.query<{ total: number | string | null }>(
      `SELECT COALESCE(SUM(amount_cents), 0) AS total
       FROM transactions
       WHERE type = $1${owner.clause ? ` AND ${owner.clause}` : ''}`,
      [type, ...owner.params]
    );

    return Number(result.rows[0]?.total ?? 0);
  }

  async count(ownerId?: number): Promise<number> {
    const owner = ownerFilter(ownerId, 1);
    const result = await this.db.query<{ count: number | string }>(
      `SELECT COUNT(*) AS count FROM transactions${owner.clause ? ` WHERE ${owner.clause}` : ''}`,
      owner.params
    );

    return Number(result.rows[0]?.count ?? 0);
  }
}
