import { type Community, type CommunityRepository } from '@cad/domain';
import { asClient } from '../client';

type CommunityRow = {
  id: string;
  name: string;
  owner_id: string;
  image_link: string | null;
  ban_list: string[];
  members_count: number;
  created_at: Date;
  updated_at: Date;
};

export class PgCommunityRepository implements CommunityRepository {
  async findById(tx: unknown, id: string): Promise<Community | null> {
    const client = asClient(tx);
    const result = await client.query<CommunityRow>(
      `SELECT id, name, owner_id, image_link, ban_list, members_count, created_at, updated_at
       FROM communities
       WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapCommunityRow(result.rows[0]) : null;
  }

  async incrementMembersCount(tx: unknown, id: string, delta: number): Promise<void> {
    const client = asClient(tx);
    await client.query(
      `UPDATE communities
       SET members_count = members_count + $2, updated_at = NOW()
       WHERE id = $1`,
      [id, delta],
    );
  }

  async addToBanList(tx: unknown, id: string, userId: string): Promise<void> {
    const client = asClient(tx);
    await client.query(
      `UPDATE communities
       SET ban_list = array_append(ban_list, $2), updated_at = NOW()
       WHERE id = $1 AND NOT ($2 = ANY(ban_list))`,
      [id, userId],
    );
  }

  async removeFromBanList(tx: unknown, id: string, userId: string): Promise<boolean> {
    const client = asClient(tx);
    const result = await client.query(
      `UPDATE communities
       SET ban_list = array_remove(ban_list, $2), updated_at = NOW()
       WHERE id = $1 AND $2 = ANY(ban_list)`,
      [id, userId],
    );
    return (result.rowCount ?? 0) > 0;
  }
}

function mapCommunityRow(row: CommunityRow): Community {
  return {
    id: row.id,
    name: row.name,
    ownerId: row.owner_id,
    imageLink: row.image_link,
    banList: row.ban_list,
    membersCount: row.members_count,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
