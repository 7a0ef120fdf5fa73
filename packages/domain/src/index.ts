export { MembershipStatus, type Community, type MembershipRecord, type InviteCode } from './community';
export type { User } from './user';
export type {
  UserRepository,
  CommunityRepository,
  MembershipRepository,
  InviteCodeRepository,
  TokenService,
} from './ports';
export {
  UNLIMITED_REMAINING_USES,
  initialRemainingUses,
  isUnlimited,
  hasRemainingUses,
  isInviteExpired,
  remainingUsesAfterConsume,
} from './invite-policy';
export {
  classifyStatus,
  resolveMembershipState,
  transitionMembership,
  type MembershipState,
  type MembershipStateKind,
  type MembershipEvent,
  type MembershipEffect,
  type MembershipRejection,
  type MembershipTransition,
} from './membership-state';
export { isCommunityOwner, canManageCommunity, canBanUser, isBanListed } from './permissions';
export { InviteResolver, InviteError, type InviteResolverDeps } from './invite-resolver';
export {
  CommunityService,
  CommunityError,
  type CommunityServiceDeps,
  type JoinCommunityResult,
  type MembershipChange,
} from './community-service';
