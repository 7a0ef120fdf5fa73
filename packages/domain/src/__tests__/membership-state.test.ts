import { describe, it, expect } from 'vitest';
import {
  classifyStatus,
  resolveMembershipState,
  transitionMembership,
  type MembershipState,
} from '../membership-state';
import { type MembershipRecord } from '../community';

function makeRecord(overrides: Partial<MembershipRecord> = {}): MembershipRecord {
  return {
    id: 'rec-1',
    userId: 'user-1',
    communityId: 'com-1',
    status: 'pending',
    createdAt: new Date('2026-01-01'),
    updatedAt: new Date('2026-01-01'),
    ...overrides,
  };
}

const absent: MembershipState = { kind: 'absent' };
const pending: MembershipState = { kind: 'pending', record: makeRecord({ status: 'pending' }) };
const declined: MembershipState = { kind: 'pending', record: makeRecord({ status: 'declined' }) };
const blocked: MembershipState = { kind: 'pending', record: makeRecord({ status: 'blocked' }) };
const approved: MembershipState = { kind: 'approved', record: makeRecord({ status: 'approved' }) };
const banned: MembershipState = { kind: 'banned', record: makeRecord({ status: 'banned' }) };

describe('classifyStatus', () => {
  it('treats approved and banned specially', () => {
    expect(classifyStatus('approved')).toBe('approved');
    expect(classifyStatus('banned')).toBe('banned');
  });

  it('treats every other status as pending', () => {
    expect(classifyStatus('pending')).toBe('pending');
    expect(classifyStatus('declined')).toBe('pending');
    expect(classifyStatus('blocked')).toBe('pending');
    expect(classifyStatus('')).toBe('pending');
  });
});

describe('resolveMembershipState', () => {
  it('is absent when no record matches the community', () => {
    const records = [makeRecord({ communityId: 'com-2' })];
    expect(resolveMembershipState(records, 'com-1')).toEqual({ kind: 'absent' });
  });

  it('picks the record for the community', () => {
    const record = makeRecord({ id: 'rec-9', communityId: 'com-1', status: 'approved' });
    const state = resolveMembershipState([makeRecord({ communityId: 'com-2' }), record], 'com-1');
    expect(state).toEqual({ kind: 'approved', record });
  });
});

describe('transitionMembership: redeem_invite', () => {
  it('creates an approved record and increments the counter from absent', () => {
    expect(transitionMembership(absent, { type: 'redeem_invite', banListed: false })).toEqual({
      ok: true,
      next: 'approved',
      effects: [
        { type: 'create_membership', status: 'approved' },
        { type: 'adjust_members_count', delta: 1 },
      ],
    });
  });

  it('rejects a ban-listed user with no record', () => {
    expect(transitionMembership(absent, { type: 'redeem_invite', banListed: true })).toEqual({
      ok: false,
      reason: 'BANNED',
    });
  });

  it('approves a pending record in place without touching the counter', () => {
    expect(transitionMembership(pending, { type: 'redeem_invite', banListed: false })).toEqual({
      ok: true,
      next: 'approved',
      effects: [{ type: 'set_status', recordId: 'rec-1', status: 'approved' }],
    });
  });

  it('approves a declined record in place', () => {
    const result = transitionMembership(declined, { type: 'redeem_invite', banListed: false });
    expect(result).toEqual({
      ok: true,
      next: 'approved',
      effects: [{ type: 'set_status', recordId: 'rec-1', status: 'approved' }],
    });
  });

  it('rejects a ban-listed user with a pending record', () => {
    expect(transitionMembership(pending, { type: 'redeem_invite', banListed: true })).toEqual({
      ok: false,
      reason: 'BANNED',
    });
  });

  it('is a no-op for an approved member', () => {
    expect(transitionMembership(approved, { type: 'redeem_invite', banListed: false })).toEqual({
      ok: true,
      next: 'approved',
      effects: [],
    });
  });

  it('rejects a banned record', () => {
    expect(transitionMembership(banned, { type: 'redeem_invite', banListed: false })).toEqual({
      ok: false,
      reason: 'BANNED',
    });
  });
});

describe('transitionMembership: request_to_join', () => {
  it('creates a pending record from absent without counting it', () => {
    expect(transitionMembership(absent, { type: 'request_to_join', banListed: false })).toEqual({
      ok: true,
      next: 'pending',
      effects: [{ type: 'create_membership', status: 'pending' }],
    });
  });

  it('rejects a duplicate pending request', () => {
    expect(transitionMembership(pending, { type: 'request_to_join', banListed: false })).toEqual({
      ok: false,
      reason: 'ALREADY_PENDING',
    });
  });

  it('moves a declined record back to pending', () => {
    expect(transitionMembership(declined, { type: 'request_to_join', banListed: false })).toEqual({
      ok: true,
      next: 'pending',
      effects: [{ type: 'set_status', recordId: 'rec-1', status: 'pending' }],
    });
  });

  it('accepts a request from a blocked record without changing it', () => {
    expect(transitionMembership(blocked, { type: 'request_to_join', banListed: false })).toEqual({
      ok: true,
      next: 'pending',
      effects: [],
    });
  });

  it('rejects approved members and banned users', () => {
    expect(transitionMembership(approved, { type: 'request_to_join', banListed: false })).toEqual({
      ok: false,
      reason: 'ALREADY_MEMBER',
    });
    expect(transitionMembership(banned, { type: 'request_to_join', banListed: true })).toEqual({
      ok: false,
      reason: 'BANNED',
    });
    expect(transitionMembership(absent, { type: 'request_to_join', banListed: true })).toEqual({
      ok: false,
      reason: 'BANNED',
    });
  });
});

describe('transitionMembership: assign_status', () => {
  it('creates a record with the given status and counts only approvals', () => {
    expect(
      transitionMembership(absent, { type: 'assign_status', status: 'pending', banListed: false }),
    ).toEqual({ ok: true, next: 'pending', effects: [{ type: 'create_membership', status: 'pending' }] });

    expect(
      transitionMembership(absent, { type: 'assign_status', status: 'approved', banListed: false }),
    ).toEqual({
      ok: true,
      next: 'approved',
      effects: [
        { type: 'create_membership', status: 'approved' },
        { type: 'adjust_members_count', delta: 1 },
      ],
    });
  });

  it('rejects an unchanged status', () => {
    expect(
      transitionMembership(approved, { type: 'assign_status', status: 'approved', banListed: false }),
    ).toEqual({ ok: false, reason: 'STATUS_UNCHANGED' });
  });

  it('increments when moving into approved and decrements when moving out', () => {
    expect(
      transitionMembership(pending, { type: 'assign_status', status: 'approved', banListed: false }),
    ).toEqual({
      ok: true,
      next: 'approved',
      effects: [
        { type: 'set_status', recordId: 'rec-1', status: 'approved' },
        { type: 'adjust_members_count', delta: 1 },
      ],
    });

    expect(
      transitionMembership(approved, { type: 'assign_status', status: 'declined', banListed: false }),
    ).toEqual({
      ok: true,
      next: 'pending',
      effects: [
        { type: 'set_status', recordId: 'rec-1', status: 'declined' },
        { type: 'adjust_members_count', delta: -1 },
      ],
    });
  });

  it('refuses to approve a ban-listed user', () => {
    expect(
      transitionMembership(pending, { type: 'assign_status', status: 'approved', banListed: true }),
    ).toEqual({ ok: false, reason: 'BANNED' });
  });
});

describe('transitionMembership: leave, ban, unban', () => {
  it('leaving removes the record and decrements only for approved members', () => {
    expect(transitionMembership(approved, { type: 'leave' })).toEqual({
      ok: true,
      next: 'absent',
      effects: [
        { type: 'remove_membership', recordId: 'rec-1' },
        { type: 'adjust_members_count', delta: -1 },
      ],
    });
    expect(transitionMembership(pending, { type: 'leave' })).toEqual({
      ok: true,
      next: 'absent',
      effects: [{ type: 'remove_membership', recordId: 'rec-1' }],
    });
  });

  it('leaving without a record is rejected', () => {
    expect(transitionMembership(absent, { type: 'leave' })).toEqual({ ok: false, reason: 'NOT_A_MEMBER' });
  });

  it('banning an approved member marks the record and decrements', () => {
    expect(transitionMembership(approved, { type: 'ban' })).toEqual({
      ok: true,
      next: 'banned',
      effects: [
        { type: 'set_status', recordId: 'rec-1', status: 'banned' },
        { type: 'adjust_members_count', delta: -1 },
      ],
    });
  });

  it('banning a pending record marks it without decrementing', () => {
    expect(transitionMembership(pending, { type: 'ban' })).toEqual({
      ok: true,
      next: 'banned',
      effects: [{ type: 'set_status', recordId: 'rec-1', status: 'banned' }],
    });
  });

  it('banning with no record or an already banned record changes nothing', () => {
    expect(transitionMembership(absent, { type: 'ban' })).toEqual({ ok: true, next: 'absent', effects: [] });
    expect(transitionMembership(banned, { type: 'ban' })).toEqual({ ok: true, next: 'banned', effects: [] });
  });

  it('unbanning removes a banned record', () => {
    expect(transitionMembership(banned, { type: 'unban' })).toEqual({
      ok: true,
      next: 'absent',
      effects: [{ type: 'remove_membership', recordId: 'rec-1' }],
    });
    expect(transitionMembership(approved, { type: 'unban' })).toEqual({
      ok: true,
      next: 'approved',
      effects: [],
    });
  });
});
