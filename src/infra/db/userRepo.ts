import type { SqlExecutor } from './sqlClient.js';
import { User } from '../../domain/auth/user.js';

type UserRow = {
  id: number;
  username: string;
  password_hash: string;
};

function toUser(row: UserRow): User {
  return {
    id: Number(row.id),
    username: row.username,
    passwordHash: row.password_hash,
  };
}

export class UserRepo {
  constructor(private readonly db: SqlExecutor) {}

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      'SELECT id, username, password_hash FROM users WHERE username = $1',
      [username]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async create(username: string, passwordHash: string): Promise<User> {
    const result = await this.db.query<UserRow>(
      `INSERT INTO users (username, password_hash)
       VALUES ($1, $2)
       RETURNING id, username, password_hash`,
      [username, passwordHash]
    );

    return toUser(result.rows[0]);
  }
}
