import { type PoolClient } from 'pg';
import { type User, type UserRepository } from '@faretrack/domain';

const USER_COLUMNS = 'id, username, salt, hashed_password, created_at, updated_at';

export class PgUserRepository implements UserRepository {
  async create(
    tx: unknown,
    user: { username: string; salt: Uint8Array; hashedPassword: Uint8Array },
  ): Promise<User | null> {
    const client = tx as PoolClient;
    const result = await client.query(
      `INSERT INTO users (username, salt, hashed_password)
       VALUES ($1, $2, $3)
       ON CONFLICT (username) DO NOTHING
       RETURNING ${USER_COLUMNS}`,
      [user.username, Buffer.from(user.salt), Buffer.from(user.hashedPassword)],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findByUsername(tx: unknown, username: string): Promise<User | null> {
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT ${USER_COLUMNS}
       FROM users
       WHERE username = $1`,
      [username],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async updateCredentials(
    tx: unknown,
    id: string,
    credentials: { salt: Uint8Array; hashedPassword: Uint8Array },
  ): Promise<void> {
    const client = tx as PoolClient;
    await client.query(
      `UPDATE users
       SET salt = $2,
           hashed_password = $3,
           updated_at = NOW()
       WHERE id = $1`,
      [id, Buffer.from(credentials.salt), Buffer.from(credentials.hashedPassword)],
    );
  }
}

function mapUserRow(row: Record<string, unknown>): User {
  return {
    id: String(row.id),
    username: String(row.username),
    salt: toBytes(row.salt, 'salt'),
    hashedPassword: toBytes(row.hashed_password, 'hashed_password'),
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

function toBytes(value: unknown, column: string): Uint8Array {
  if (value instanceof Uint8Array) return value;
  throw new Error(`Column ${column} is not a bytea value`);
}

function toDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(String(value));
}
