import { type InviteCode } from './community';

export const UNLIMITED_REMAINING_USES = -1;

export function initialRemainingUses(maxUses: number): number {
  return maxUses === 0 ? UNLIMITED_REMAINING_USES : maxUses;
}

export function isUnlimited(invite: Pick<InviteCode, 'remainingUses'>): boolean {
  return invite.remainingUses === UNLIMITED_REMAINING_USES;
}

export function hasRemainingUses(invite: Pick<InviteCode, 'remainingUses'>): boolean {
  return isUnlimited(invite) || invite.remainingUses >= 1;
}

export function isInviteExpired(invite: Pick<InviteCode, 'expiresAt'>, now: number = Date.now()): boolean {
  return invite.expiresAt !== null && invite.expiresAt.getTime() <= now;
}

/** The value `remainingUses` takes after one successful consume. */
export function remainingUsesAfterConsume(remainingUses: number): number {
  return remainingUses === UNLIMITED_REMAINING_USES ? UNLIMITED_REMAINING_USES : remainingUses - 1;
}
