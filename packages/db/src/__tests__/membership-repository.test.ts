import { describe, it, expect } from 'vitest';
import { PgMembershipRepository } from '../repositories/membership-repository';
import { PgUserRepository } from '../repositories/user-repository';
import { createFakeClient } from './helpers/fake-client';

describe('PgMembershipRepository', () => {
  const repo = new PgMembershipRepository();
  const record = { id: 'rec-1', userId: 'user-1', communityId: 'com-1', status: 'approved' };

  it('creates a record and reports the insert', async () => {
    const { client, calls } = createFakeClient(() => ({ rows: [{ id: 'rec-1' }] }));

    expect(await repo.create(client, record)).toBe(true);
    expect(calls[0].sql).toBe(
      'INSERT INTO memberships (id, user_id, community_id, status) VALUES ($1, $2, $3, $4) ' +
        'ON CONFLICT (user_id, community_id) DO NOTHING RETURNING id',
    );
    expect(calls[0].params).toEqual(['rec-1', 'user-1', 'com-1', 'approved']);
  });

  it('reports a lost race on the unique index as false', async () => {
    const { client } = createFakeClient(() => ({ rows: [] }));

    expect(await repo.create(client, record)).toBe(false);
  });

  it('lists and maps the records of a user', async () => {
    const at = new Date('2026-01-02T00:00:00Z');
    const { client, calls } = createFakeClient(() => ({
      rows: [{ id: 'rec-1', user_id: 'user-1', community_id: 'com-1', status: 'pending', created_at: at, updated_at: at }],
    }));

    const records = await repo.listByUserId(client, 'user-1');

    expect(calls[0].params).toEqual(['user-1']);
    expect(records).toEqual([
      { id: 'rec-1', userId: 'user-1', communityId: 'com-1', status: 'pending', createdAt: at, updatedAt: at },
    ]);
  });

  it('updates status in place', async () => {
    const { client, calls } = createFakeClient();

    await repo.updateStatus(client, 'rec-1', 'banned');

    expect(calls[0].sql).toBe('UPDATE memberships SET status = $2, updated_at = NOW() WHERE id = $1');
    expect(calls[0].params).toEqual(['rec-1', 'banned']);
  });

  it('reports whether a record was removed', async () => {
    expect(await repo.remove(createFakeClient(() => ({ rowCount: 1 })).client, 'rec-1')).toBe(true);
    expect(await repo.remove(createFakeClient(() => ({ rowCount: 0 })).client, 'rec-1')).toBe(false);
  });
});

describe('PgUserRepository', () => {
  it('returns null for an unknown user', async () => {
    const { client, calls } = createFakeClient(() => ({ rows: [] }));

    expect(await new PgUserRepository().findById(client, 'ghost')).toBeNull();
    expect(calls[0].params).toEqual(['ghost']);
  });
});
