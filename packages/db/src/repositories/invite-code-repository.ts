import { type InviteCode, type InviteCodeRepository } from '@cad/domain';
import { asClient } from '../client';

type InviteCodeRow = {
  id: string;
  code: string;
  community_id: string;
  expires_at: Date | null;
  max_uses: number;
  remaining_uses: number;
  uses: number;
  created_by: string;
  created_at: Date;
};

const INVITE_COLUMNS =
  'id, code, community_id, expires_at, max_uses, remaining_uses, uses, created_by, created_at';

export class PgInviteCodeRepository implements InviteCodeRepository {
  async create(
    tx: unknown,
    invite: {
      id: string;
      code: string;
      communityId: string;
      expiresAt: Date | null;
      maxUses: number;
      remainingUses: number;
      createdBy: string;
    },
  ): Promise<InviteCode | null> {
    const client = asClient(tx);
    const result = await client.query<InviteCodeRow>(
      `INSERT INTO invite_codes (id, code, community_id, expires_at, max_uses, remaining_uses, created_by)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (code) DO NOTHING
       RETURNING ${INVITE_COLUMNS}`,
      [
        invite.id,
        invite.code,
        invite.communityId,
        invite.expiresAt,
        invite.maxUses,
        invite.remainingUses,
        invite.createdBy,
      ],
    );
    return result.rows[0] ? mapInviteRow(result.rows[0]) : null;
  }

  async findById(tx: unknown, id: string): Promise<InviteCode | null> {
    const client = asClient(tx);
    const result = await client.query<InviteCodeRow>(
      `SELECT ${INVITE_COLUMNS} FROM invite_codes WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapInviteRow(result.rows[0]) : null;
  }

  async findByCode(tx: unknown, code: string): Promise<InviteCode | null> {
    const client = asClient(tx);
    const result = await client.query<InviteCodeRow>(
      `SELECT ${INVITE_COLUMNS} FROM invite_codes WHERE code = $1`,
      [code],
    );
    return result.rows[0] ? mapInviteRow(result.rows[0]) : null;
  }

  async consume(tx: unknown, code: string): Promise<InviteCode | null> {
    const client = asClient(tx);
    // -1 is the unlimited sentinel and must survive the decrement.
    const result = await client.query<InviteCodeRow>(
      `UPDATE invite_codes
       SET remaining_uses = CASE WHEN remaining_uses = -1 THEN -1 ELSE remaining_uses - 1 END,
           uses = uses + 1
       WHERE code = $1 AND (remaining_uses >= 1 OR remaining_uses = -1)
       RETURNING ${INVITE_COLUMNS}`,
      [code],
    );
    return result.rows[0] ? mapInviteRow(result.rows[0]) : null;
  }

  async listByCommunityId(tx: unknown, communityId: string): Promise<InviteCode[]> {
    const client = asClient(tx);
    const result = await client.query<InviteCodeRow>(
      `SELECT ${INVITE_COLUMNS}
       FROM invite_codes
       WHERE community_id = $1
       ORDER BY created_at DESC`,
      [communityId],
    );
    return result.rows.map(mapInviteRow);
  }

  async delete(tx: unknown, id: string): Promise<void> {
    const client = asClient(tx);
    await client.query(`DELETE FROM invite_codes WHERE id = $1`, [id]);
  }
}

function mapInviteRow(row: InviteCodeRow): InviteCode {
  return {
    id: row.id,
    code: row.code,
    communityId: row.community_id,
    expiresAt: row.expires_at,
    maxUses: row.max_uses,
    remainingUses: row.remaining_uses,
    uses: row.uses,
    createdBy: row.created_by,
    createdAt: row.created_at,
  };
}
