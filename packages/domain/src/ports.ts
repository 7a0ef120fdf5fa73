import { type Community, type InviteCode, type MembershipRecord } from './community';
import { type User } from './user';

export interface UserRepository {
  findById(tx: unknown, id: string): Promise<User | null>;
}

export interface CommunityRepository {
  findById(tx: unknown, id: string): Promise<Community | null>;
  incrementMembersCount(tx: unknown, id: string, delta: number): Promise<void>;
  addToBanList(tx: unknown, id: string, userId: string): Promise<void>;
  removeFromBanList(tx: unknown, id: string, userId: string): Promise<boolean>;
}

export interface MembershipRepository {
  listByUserId(tx: unknown, userId: string): Promise<MembershipRecord[]>;
  /** Returns false when a record for the same user and community already exists. */
  create(
    tx: unknown,
    record: { id: string; userId: string; communityId: string; status: string },
  ): Promise<boolean>;
  updateStatus(tx: unknown, id: string, status: string): Promise<void>;
  remove(tx: unknown, id: string): Promise<boolean>;
}

export interface InviteCodeRepository {
  /** Returns null when the code is already taken. */
  create(
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
  ): Promise<InviteCode | null>;
  findById(tx: unknown, id: string): Promise<InviteCode | null>;
  findByCode(tx: unknown, code: string): Promise<InviteCode | null>;
  /**
   * Atomically takes one use from a code that still has uses left
   * (or is unlimited) and returns the updated code, or null if none matched.
   */
  consume(tx: unknown, code: string): Promise<InviteCode | null>;
  listByCommunityId(tx: unknown, communityId: string): Promise<InviteCode[]>;
  delete(tx: unknown, id: string): Promise<void>;
}

export interface TokenService {
  signAccessToken(userId: string): Promise<string>;
  verifyAccessToken(token: string): Promise<{ userId: string }>;
}
