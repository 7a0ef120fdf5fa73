import { MembershipStatus, type Community, type InviteCode, type MembershipRecord } from './community';
import {
  type CommunityRepository,
  type InviteCodeRepository,
  type MembershipRepository,
  type UserRepository,
} from './ports';
import { InviteResolver } from './invite-resolver';
import { initialRemainingUses } from './invite-policy';
import {
  resolveMembershipState,
  transitionMembership,
  type MembershipEffect,
  type MembershipEvent,
  type MembershipRejection,
  type MembershipStateKind,
} from './membership-state';
import { canBanUser, canManageCommunity, isBanListed, isCommunityOwner } from './permissions';

const MAX_CODE_ATTEMPTS = 3;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface CommunityServiceDeps {
  communityRepo: CommunityRepository;
  userRepo: UserRepository;
  membershipRepo: MembershipRepository;
  inviteCodeRepo: InviteCodeRepository;
  generateId: () => string;
  generateInviteCode: () => string;
  withTransaction: <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;
}

export interface JoinCommunityResult {
  status: 'joined';
  communityId: string;
  community: { id: string; name: string; imageLink: string | null };
}

export interface MembershipChange {
  communityId: string;
  userId: string;
  status: MembershipStateKind;
}

const REJECTIONS: Record<MembershipRejection, { kind: CommunityError['kind']; message: string }> = {
  BANNED: { kind: 'FORBIDDEN', message: 'User is banned from this community' },
  ALREADY_PENDING: { kind: 'CONFLICT', message: 'Community request already exists' },
  ALREADY_MEMBER: { kind: 'CONFLICT', message: 'Already a member of this community' },
  NOT_A_MEMBER: { kind: 'NOT_FOUND', message: 'Not a member of this community' },
  STATUS_UNCHANGED: { kind: 'CONFLICT', message: 'Member already exists with this status' },
};

export class CommunityService {
  private readonly inviteResolver: InviteResolver;

  constructor(private readonly deps: CommunityServiceDeps) {
    this.inviteResolver = new InviteResolver({
      inviteCodeRepo: deps.inviteCodeRepo,
      withTransaction: deps.withTransaction,
    });
  }

  async joinCommunity(userId: string, inviteCode: string): Promise<JoinCommunityResult> {
    const invite = await this.inviteResolver.consume(inviteCode);

    return this.deps.withTransaction<JoinCommunityResult>(async (tx) => {
      const community = await this.requireCommunity(tx, invite.communityId);
      await this.requireUser(tx, userId);

      await this.applyEvent(tx, community, userId, {
        type: 'redeem_invite',
        banListed: isBanListed(community, userId),
      });

      return {
        status: 'joined',
        communityId: community.id,
        community: { id: community.id, name: community.name, imageLink: community.imageLink },
      };
    });
  }

  async createInviteCode(
    actorId: string,
    communityId: string,
    opts: { maxUses: number; expiresInDays?: number },
  ): Promise<InviteCode> {
    const { inviteCodeRepo, generateId, generateInviteCode } = this.deps;

    if (!Number.isInteger(opts.maxUses) || opts.maxUses < 0) {
      throw new CommunityError('VALIDATION', 'maxUses must be a non-negative integer');
    }

    return this.deps.withTransaction(async (tx) => {
      const community = await this.requireCommunity(tx, communityId);
      if (!canManageCommunity(community, actorId)) {
        throw new CommunityError('FORBIDDEN', 'Only the community owner can manage invite codes');
      }

      const expiresAt =
        opts.expiresInDays === undefined ? null : new Date(Date.now() + opts.expiresInDays * DAY_MS);

      for (let attempt = 0; attempt < MAX_CODE_ATTEMPTS; attempt++) {
        const created = await inviteCodeRepo.create(tx, {
          id: generateId(),
          code: generateInviteCode(),
          communityId,
          expiresAt,
          maxUses: opts.maxUses,
          remainingUses: initialRemainingUses(opts.maxUses),
          createdBy: actorId,
        });
        if (created) {
          return created;
        }
      }

      throw new CommunityError('CONFLICT', 'Could not generate a unique invite code');
    });
  }

  async getInviteCode(code: string): Promise<InviteCode> {
    return this.deps.withTransaction(async (tx) => {
      const invite = await this.deps.inviteCodeRepo.findByCode(tx, code.trim());
      if (!invite) {
        throw new CommunityError('NOT_FOUND', 'Invite code not found');
      }
      return invite;
    });
  }

  async listInviteCodes(actorId: string, communityId: string): Promise<InviteCode[]> {
    return this.deps.withTransaction(async (tx) => {
      const community = await this.requireCommunity(tx, communityId);
      if (!canManageCommunity(community, actorId)) {
        throw new CommunityError('FORBIDDEN', 'Only the community owner can manage invite codes');
      }
      return this.deps.inviteCodeRepo.listByCommunityId(tx, communityId);
    });
  }

  async deleteInviteCode(actorId: string, inviteCodeId: string): Promise<void> {
    const { inviteCodeRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const invite = await inviteCodeRepo.findById(tx, inviteCodeId);
      if (!invite) {
        throw new CommunityError('NOT_FOUND', 'Invite code not found');
      }
      const community = await this.requireCommunity(tx, invite.communityId);
      if (!canManageCommunity(community, actorId)) {
        throw new CommunityError('FORBIDDEN', 'Only the community owner can manage invite codes');
      }
      await inviteCodeRepo.delete(tx, invite.id);
    });
  }

  async addCommunityToUser(
    actorId: string,
    userId: string,
    communityId: string,
    status: string = MembershipStatus.PENDING,
  ): Promise<MembershipChange> {
    if (status === MembershipStatus.BANNED) {
      throw new CommunityError('VALIDATION', 'Use the ban operation to ban a user');
    }

    return this.deps.withTransaction(async (tx) => {
      const community = await this.requireCommunity(tx, communityId);
      if (!canManageCommunity(community, actorId)) {
        throw new CommunityError('FORBIDDEN', 'Only the community owner can add members');
      }
      await this.requireUser(tx, userId);

      const next = await this.applyEvent(tx, community, userId, {
        type: 'assign_status',
        status,
        banListed: isBanListed(community, userId),
      });
      return { communityId, userId, status: next };
    });
  }

  async requestToJoin(userId: string, communityId: string): Promise<MembershipChange> {
    return this.deps.withTransaction(async (tx) => {
      const community = await this.requireCommunity(tx, communityId);
      await this.requireUser(tx, userId);

      const next = await this.applyEvent(tx, community, userId, {
        type: 'request_to_join',
        banListed: isBanListed(community, userId),
      });
      return { communityId, userId, status: next };
    });
  }

  async leaveCommunity(userId: string, communityId: string): Promise<void> {
    return this.deps.withTransaction(async (tx) => {
      const community = await this.requireCommunity(tx, communityId);
      if (isCommunityOwner(community, userId)) {
        throw new CommunityError('VALIDATION', 'The community owner cannot leave the community');
      }
      await this.applyEvent(tx, community, userId, { type: 'leave' });
    });
  }

  async banUser(actorId: string, communityId: string, userId: string): Promise<void> {
    return this.deps.withTransaction(async (tx) => {
      const community = await this.requireCommunity(tx, communityId);
      if (!canManageCommunity(community, actorId)) {
        throw new CommunityError('FORBIDDEN', 'Only the community owner can ban users');
      }
      if (!canBanUser(community, actorId, userId)) {
        throw new CommunityError('VALIDATION', 'The community owner cannot be banned');
      }

      await this.deps.communityRepo.addToBanList(tx, communityId, userId);
      await this.applyEvent(tx, community, userId, { type: 'ban' });
    });
  }

  async unbanUser(actorId: string, communityId: string, userId: string): Promise<void> {
    return this.deps.withTransaction(async (tx) => {
      const community = await this.requireCommunity(tx, communityId);
      if (!canManageCommunity(community, actorId)) {
        throw new CommunityError('FORBIDDEN', 'Only the community owner can unban users');
      }

      await this.deps.communityRepo.removeFromBanList(tx, communityId, userId);
      await this.applyEvent(tx, community, userId, { type: 'unban' });
    });
  }

  async listUserCommunities(userId: string): Promise<MembershipRecord[]> {
    return this.deps.withTransaction(async (tx) => {
      return this.deps.membershipRepo.listByUserId(tx, userId);
    });
  }

  private async applyEvent(
    tx: unknown,
    community: Community,
    userId: string,
    event: MembershipEvent,
  ): Promise<MembershipStateKind> {
    const records = await this.deps.membershipRepo.listByUserId(tx, userId);
    const state = resolveMembershipState(records, community.id);
    const transition = transitionMembership(state, event);

    if (!transition.ok) {
      const { kind, message } = REJECTIONS[transition.reason];
      throw new CommunityError(kind, message);
    }

    await this.applyEffects(tx, community.id, userId, transition.effects);
    return transition.next;
  }

  private async applyEffects(
    tx: unknown,
    communityId: string,
    userId: string,
    effects: MembershipEffect[],
  ): Promise<void> {
    const { membershipRepo, communityRepo, generateId } = this.deps;
    // A create or remove that lost a race to a concurrent request must not move the counter.
    let recordWritten = true;

    for (const effect of effects) {
      switch (effect.type) {
        case 'create_membership':
          recordWritten = await membershipRepo.create(tx, {
            id: generateId(),
            userId,
            communityId,
            status: effect.status,
          });
          break;
        case 'set_status':
          await membershipRepo.updateStatus(tx, effect.recordId, effect.status);
          break;
        case 'remove_membership':
          recordWritten = await membershipRepo.remove(tx, effect.recordId);
          break;
        case 'adjust_members_count':
          if (recordWritten) {
            await communityRepo.incrementMembersCount(tx, communityId, effect.delta);
          }
          break;
      }
    }
  }

  private async requireCommunity(tx: unknown, communityId: string): Promise<Community> {
    const community = await this.deps.communityRepo.findById(tx, communityId);
    if (!community) {
      throw new CommunityError('NOT_FOUND', 'Community not found');
    }
    return community;
  }

  private async requireUser(tx: unknown, userId: string): Promise<void> {
    const user = await this.deps.userRepo.findById(tx, userId);
    if (!user) {
      throw new CommunityError('NOT_FOUND', 'User not found');
    }
  }
}

export class CommunityError extends Error {
  constructor(
    public readonly kind: 'VALIDATION' | 'NOT_FOUND' | 'FORBIDDEN' | 'CONFLICT',
    message: string,
  ) {
    super(message);
    this.name = 'CommunityError';
  }
}
