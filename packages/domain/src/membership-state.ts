import { MembershipStatus, type MembershipRecord } from './community';

export type MembershipStateKind = 'absent' | 'pending' | 'approved' | 'banned';

export type MembershipState =
  | { kind: 'absent' }
  | { kind: 'pending'; record: MembershipRecord }
  | { kind: 'approved'; record: MembershipRecord }
  | { kind: 'banned'; record: MembershipRecord };

export type MembershipEvent =
  | { type: 'redeem_invite'; banListed: boolean }
  | { type: 'request_to_join'; banListed: boolean }
  | { type: 'assign_status'; status: string; banListed: boolean }
  | { type: 'leave' }
  | { type: 'ban' }
  | { type: 'unban' };

export type MembershipEffect =
  | { type: 'create_membership'; status: string }
  | { type: 'set_status'; recordId: string; status: string }
  | { type: 'remove_membership'; recordId: string }
  | { type: 'adjust_members_count'; delta: 1 | -1 };

export type MembershipRejection =
  | 'BANNED'
  | 'ALREADY_PENDING'
  | 'ALREADY_MEMBER'
  | 'NOT_A_MEMBER'
  | 'STATUS_UNCHANGED';

export type MembershipTransition =
  | { ok: true; next: MembershipStateKind; effects: MembershipEffect[] }
  | { ok: false; reason: MembershipRejection };

export function classifyStatus(status: string): Exclude<MembershipStateKind, 'absent'> {
  if (status === MembershipStatus.APPROVED) return 'approved';
  if (status === MembershipStatus.BANNED) return 'banned';
  return 'pending';
}

export function resolveMembershipState(
  records: MembershipRecord[],
  communityId: string,
): MembershipState {
  const record = records.find((r) => r.communityId === communityId);
  if (!record) {
    return { kind: 'absent' };
  }
  const kind = classifyStatus(record.status);
  return { kind, record };
}

function reject(reason: MembershipRejection): MembershipTransition {
  return { ok: false, reason };
}

function stay(state: MembershipState): MembershipTransition {
  return { ok: true, next: state.kind, effects: [] };
}

export function transitionMembership(
  state: MembershipState,
  event: MembershipEvent,
): MembershipTransition {
  switch (event.type) {
    case 'redeem_invite':
      return redeemInvite(state, event.banListed);
    case 'request_to_join':
      return requestToJoin(state, event.banListed);
    case 'assign_status':
      return assignStatus(state, event.status, event.banListed);
    case 'leave':
      return leave(state);
    case 'ban':
      return ban(state);
    case 'unban':
      return unban(state);
  }
}

function redeemInvite(state: MembershipState, banListed: boolean): MembershipTransition {
  switch (state.kind) {
    case 'absent':
      if (banListed) return reject('BANNED');
      return {
        ok: true,
        next: 'approved',
        effects: [
          { type: 'create_membership', status: MembershipStatus.APPROVED },
          { type: 'adjust_members_count', delta: 1 },
        ],
      };
    case 'pending':
      if (banListed) return reject('BANNED');
      // Counter is left alone: the record already existed.
      return {
        ok: true,
        next: 'approved',
        effects: [{ type: 'set_status', recordId: state.record.id, status: MembershipStatus.APPROVED }],
      };
    case 'approved':
      return stay(state);
    case 'banned':
      return reject('BANNED');
  }
}

function requestToJoin(state: MembershipState, banListed: boolean): MembershipTransition {
  switch (state.kind) {
    case 'absent':
      if (banListed) return reject('BANNED');
      return {
        ok: true,
        next: 'pending',
        effects: [{ type: 'create_membership', status: MembershipStatus.PENDING }],
      };
    case 'pending':
      if (state.record.status === MembershipStatus.PENDING) return reject('ALREADY_PENDING');
      // A blocked request is accepted but leaves the block in place.
      if (state.record.status === MembershipStatus.BLOCKED) return stay(state);
      if (banListed) return reject('BANNED');
      return {
        ok: true,
        next: 'pending',
        effects: [{ type: 'set_status', recordId: state.record.id, status: MembershipStatus.PENDING }],
      };
    case 'approved':
      return reject('ALREADY_MEMBER');
    case 'banned':
      return reject('BANNED');
  }
}

function assignStatus(state: MembershipState, status: string, banListed: boolean): MembershipTransition {
  const target = classifyStatus(status);
  if (target === 'approved' && banListed) {
    return reject('BANNED');
  }

  if (state.kind === 'absent') {
    const effects: MembershipEffect[] = [{ type: 'create_membership', status }];
    if (target === 'approved') {
      effects.push({ type: 'adjust_members_count', delta: 1 });
    }
    return { ok: true, next: target, effects };
  }

  if (state.record.status === status) {
    return reject('STATUS_UNCHANGED');
  }

  const effects: MembershipEffect[] = [{ type: 'set_status', recordId: state.record.id, status }];
  if (target === 'approved' && state.kind !== 'approved') {
    effects.push({ type: 'adjust_members_count', delta: 1 });
  } else if (state.kind === 'approved' && target !== 'approved') {
    effects.push({ type: 'adjust_members_count', delta: -1 });
  }
  return { ok: true, next: target, effects };
}

function leave(state: MembershipState): MembershipTransition {
  if (state.kind === 'absent') {
    return reject('NOT_A_MEMBER');
  }
  const effects: MembershipEffect[] = [{ type: 'remove_membership', recordId: state.record.id }];
  if (state.kind === 'approved') {
    effects.push({ type: 'adjust_members_count', delta: -1 });
  }
  return { ok: true, next: 'absent', effects };
}

function ban(state: MembershipState): MembershipTransition {
  switch (state.kind) {
    case 'absent':
    case 'banned':
      return stay(state);
    case 'pending':
      return {
        ok: true,
        next: 'banned',
        effects: [{ type: 'set_status', recordId: state.record.id, status: MembershipStatus.BANNED }],
      };
    case 'approved':
      return {
        ok: true,
        next: 'banned',
        effects: [
          { type: 'set_status', recordId: state.record.id, status: MembershipStatus.BANNED },
          { type: 'adjust_members_count', delta: -1 },
        ],
      };
  }
}

function unban(state: MembershipState): MembershipTransition {
  if (state.kind !== 'banned') {
    return stay(state);
  }
  return {
    ok: true,
    next: 'absent',
    effects: [{ type: 'remove_membership', recordId: state.record.id }],
  };
}
