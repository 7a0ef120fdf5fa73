import { type z } from 'zod';
import { AppError, ErrorCode } from '@cad/shared';
import { CommunityError, InviteError, type InviteCode, type MembershipRecord } from '@cad/domain';
import { type InviteCodeResponse, type MembershipResponse } from '@cad/proto';

const INVITE_ERROR_CODES: Record<InviteError['kind'], ErrorCode> = {
  VALIDATION: ErrorCode.VALIDATION,
  INVALID_INVITE: ErrorCode.INVALID_INVITE,
  EXPIRED_INVITE: ErrorCode.EXPIRED_INVITE,
};

const COMMUNITY_ERROR_CODES: Record<CommunityError['kind'], ErrorCode> = {
  VALIDATION: ErrorCode.VALIDATION,
  NOT_FOUND: ErrorCode.NOT_FOUND,
  FORBIDDEN: ErrorCode.FORBIDDEN,
  CONFLICT: ErrorCode.CONFLICT,
};

export function mapDomainError(err: unknown): never {
  if (err instanceof InviteError) {
    throw new AppError(INVITE_ERROR_CODES[err.kind], err.message);
  }
  if (err instanceof CommunityError) {
    throw new AppError(COMMUNITY_ERROR_CODES[err.kind], err.message);
  }
  throw err;
}

export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, message: string): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new AppError(ErrorCode.VALIDATION, message, {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return parsed.data;
}

export function toInviteCodeResponse(invite: InviteCode): InviteCodeResponse {
  return {
    id: invite.id,
    code: invite.code,
    communityId: invite.communityId,
    expiresAt: invite.expiresAt ? invite.expiresAt.toISOString() : null,
    maxUses: invite.maxUses,
    remainingUses: invite.remainingUses,
    uses: invite.uses,
    createdBy: invite.createdBy,
    createdAt: invite.createdAt.toISOString(),
  };
}

export function toMembershipResponse(record: MembershipRecord): MembershipResponse {
  return {
    id: record.id,
    communityId: record.communityId,
    status: record.status,
    createdAt: record.createdAt.toISOString(),
    updatedAt: record.updatedAt.toISOString(),
  };
}
