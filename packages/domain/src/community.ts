export const MembershipStatus = {
  APPROVED: 'approved',
  BANNED: 'banned',
  PENDING: 'pending',
  DECLINED: 'declined',
  BLOCKED: 'blocked',
} as const;

export interface Community {
  id: string;
  name: string;
  ownerId: string;
  imageLink: string | null;
  banList: string[];
  membersCount: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * A user's relationship to one community. `status` is free-form: only
 * `approved` and `banned` carry meaning, anything else counts as pending.
 */
export interface MembershipRecord {
  id: string;
  userId: string;
  communityId: string;
  status: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface InviteCode {
  id: string;
  code: string;
  communityId: string;
  expiresAt: Date | null;
  /** 0 means unlimited. */
  maxUses: number;
  /** -1 means unlimited; otherwise a countdown that stops at 0. */
  remainingUses: number;
  uses: number;
  createdBy: string;
  createdAt: Date;
}
