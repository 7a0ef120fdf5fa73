import { type Community } from './community';

export function isCommunityOwner(community: Pick<Community, 'ownerId'>, userId: string): boolean {
  return community.ownerId === userId;
}

export function canManageCommunity(community: Pick<Community, 'ownerId'>, actorId: string): boolean {
  return isCommunityOwner(community, actorId);
}

export function canBanUser(
  community: Pick<Community, 'ownerId'>,
  actorId: string,
  targetUserId: string,
): boolean {
  return canManageCommunity(community, actorId) && !isCommunityOwner(community, targetUserId);
}

export function isBanListed(community: Pick<Community, 'banList'>, userId: string): boolean {
  return community.banList.includes(userId);
}
