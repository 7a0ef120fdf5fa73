import { type MembershipRecord, type MembershipRepository } from '@cad/domain';
import { asClient } from '../client';

type MembershipRow = {
  id: string;
  user_id: string;
  community_id: string;
  status: string;
  created_at: Date;
  updated_at: Date;
};

export class PgMembershipRepository implements MembershipRepository {
  async listByUserId(tx: unknown, userId: string): Promise<MembershipRecord[]> {
    const client = asClient(tx);
    const result = await client.query<MembershipRow>(
      `SELECT id, user_id, community_id, status, created_at, updated_at
       FROM memberships
       WHERE user_id = $1
       ORDER BY created_at ASC`,
      [userId],
    );
    return result.rows.map(mapMembershipRow);
  }

  async create(
    tx: unknown,
    record: { id: string; userId: string; communityId: string; status: string },
  ): Promise<boolean> {
    const client = asClient(tx);
    const result = await client.query(
      `INSERT INTO memberships (id, user_id, community_id, status)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (user_id, community_id) DO NOTHING
       RETURNING id`,
      [record.id, record.userId, record.communityId, record.status],
    );
    return result.rows.length > 0;
  }

  async updateStatus(tx: unknown, id: string, status: string): Promise<void> {
    const client = asClient(tx);
    await client.query(
      `UPDATE memberships SET status = $2, updated_at = NOW() WHERE id = $1`,
      [id, status],
    );
  }

  async remove(tx: unknown, id: string): Promise<boolean> {
    const client = asClient(tx);
    const result = await client.query(`DELETE FROM memberships WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }
}

function mapMembershipRow(row: MembershipRow): MembershipRecord {
  return {
    id: row.id,
    userId: row.user_id,
    communityId: row.community_id,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
