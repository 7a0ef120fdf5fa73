import { type User, type UserRepository } from '@cad/domain';
import { asClient } from '../client';

type UserRow = {
  id: string;
  username: string;
  created_at: Date;
};

export class PgUserRepository implements UserRepository {
  async findById(tx: unknown, id: string): Promise<User | null> {
    const client = asClient(tx);
    const result = await client.query<UserRow>(
      `SELECT id, username, created_at
       FROM users
       WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }
}

function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    createdAt: row.created_at,
  };
}
