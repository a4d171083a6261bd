import type { SqlExecutor } from './sqlClient.js';

export interface SessionRecord {
  id: string;
  userId: number;
  expiresAt: Date;
}

type SessionRow = {
  id: string;
  user_id: number;
  expires_at: number | string;
};

// expires_at is stored as epoch seconds
function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Server-side session rows. A signed token is only honoured while its row
 * exists and has not expired.
 */
export class SessionRepo {
  constructor(private readonly db: SqlExecutor) {}

  async create(id: string, userId: number, expiresAt: Date): Promise<SessionRecord> {
    await this.db.query('INSERT INTO sessions (id, user_id, expires_at) VALUES ($1, $2, $3)', [
      id,
      userId,
      toEpochSeconds(expiresAt),
    ]);
    return { id, userId, expiresAt: new Date(toEpochSeconds(expiresAt) * 1000) };
  }

  async findById(id: string, now: Date = new Date()): Promise<SessionRecord | null> {
    const result = await this.db.query<SessionRow>(
      'SELECT id, user_id, expires_at FROM sessions WHERE id = $1 AND expires_at > $2',
      [id, toEpochSeconds(now)]
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      id: row.id,
      userId: Number(row.user_id),
      expiresAt: new Date(Number(row.expires_at) * 1000),
    };
  }

  /** Returns true when a row was removed. */
  async delete(id: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM sessions WHERE id = $1', [id]);
    return result.rowCount > 0;
  }

  /** Remove every row whose expiry has passed. Returns the number removed. */
  async deleteExpired(now: Date = new Date()): Promise<number> {
    const result = await this.db.query('DELETE FROM sessions WHERE expires_at <= $1', [
      toEpochSeconds(now),
    ]);
    return result.rowCount;
  }
}
