import { describe, it, expect } from 'vitest';
import { PgCommunityRepository } from '../repositories/community-repository';
import { createFakeClient } from './helpers/fake-client';

describe('PgCommunityRepository', () => {
  const repo = new PgCommunityRepository();

  it('maps a community row', async () => {
    const createdAt = new Date('2026-01-01T00:00:00Z');
    const { client } = createFakeClient(() => ({
      rows: [
        {
          id: 'com-1',
          name: 'County Dispatch',
          owner_id: 'owner-1',
          image_link: 'https://img.test/logo.png',
          ban_list: ['user-9'],
          members_count: 4,
          created_at: createdAt,
          updated_at: createdAt,
        },
      ],
    }));

    expect(await repo.findById(client, 'com-1')).toEqual({
      id: 'com-1',
      name: 'County Dispatch',
      ownerId: 'owner-1',
      imageLink: 'https://img.test/logo.png',
      banList: ['user-9'],
      membersCount: 4,
      createdAt,
      updatedAt: createdAt,
    });
  });

  it('adjusts the counter with in-statement arithmetic', async () => {
    const { client, calls } = createFakeClient();

    await repo.incrementMembersCount(client, 'com-1', -1);

    expect(calls[0].sql).toBe(
      'UPDATE communities SET members_count = members_count + $2, updated_at = NOW() WHERE id = $1',
    );
    expect(calls[0].params).toEqual(['com-1', -1]);
  });

  it('only appends to the ban list when the user is not already on it', async () => {
    const { client, calls } = createFakeClient();

    await repo.addToBanList(client, 'com-1', 'user-2');

    expect(calls[0].sql).toContain('array_append(ban_list, $2)');
    expect(calls[0].sql).toContain('NOT ($2 = ANY(ban_list))');
    expect(calls[0].params).toEqual(['com-1', 'user-2']);
  });

  it('reports whether a ban was removed', async () => {
    const removed = createFakeClient(() => ({ rowCount: 1 }));
    const missing = createFakeClient(() => ({ rowCount: 0 }));

    expect(await repo.removeFromBanList(removed.client, 'com-1', 'user-2')).toBe(true);
    expect(await repo.removeFromBanList(missing.client, 'com-1', 'user-2')).toBe(false);
    expect(removed.calls[0].sql).toContain('array_remove(ban_list, $2)');
  });
});
