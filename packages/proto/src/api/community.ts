import { z } from 'zod';

export const OBJECT_ID_PATTERN = /^[a-f0-9]{24}$/;
export const MAX_INVITE_USES = 1000;
export const MAX_INVITE_EXPIRY_DAYS = 365;

export const ObjectIdSchema = z.string().regex(OBJECT_ID_PATTERN, 'Must be a 24-character hex id');

export const MembershipStatusSchema = z.enum(['approved', 'pending', 'declined', 'blocked', 'banned']);

export const JoinCommunityRequestSchema = z.object({
  inviteCode: z.string().trim().min(1, 'Invite code is required').max(64),
});

export const CreateInviteCodeRequestSchema = z.object({
  // 0 means unlimited
  maxUses: z.number().int().min(0).max(MAX_INVITE_USES).default(0),
  expiresInDays: z.number().int().min(1).max(MAX_INVITE_EXPIRY_DAYS).optional(),
});

export const BanUserRequestSchema = z.object({
  userId: ObjectIdSchema,
});

export const AddMemberRequestSchema = z.object({
  userId: ObjectIdSchema,
  status: MembershipStatusSchema.exclude(['banned']).default('pending'),
});

export const CommunityParamsSchema = z.object({
  communityId: ObjectIdSchema,
});

export const JoinCommunityResponseSchema = z.object({
  status: z.literal('joined'),
  communityId: z.string(),
  community: z.object({
    id: z.string(),
    name: z.string(),
    imageLink: z.string().nullable(),
  }),
});

export const InviteCodeResponseSchema = z.object({
  id: z.string(),
  code: z.string(),
  communityId: z.string(),
  expiresAt: z.string().datetime().nullable(),
  maxUses: z.number(),
  remainingUses: z.number(),
  uses: z.number(),
  createdBy: z.string(),
  createdAt: z.string().datetime(),
});

export const MembershipResponseSchema = z.object({
  id: z.string(),
  communityId: z.string(),
  status: z.string(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export const MembershipChangeResponseSchema = z.object({
  communityId: z.string(),
  userId: z.string(),
  status: z.enum(['absent', 'pending', 'approved', 'banned']),
});

export type JoinCommunityRequest = z.infer<typeof JoinCommunityRequestSchema>;
export type CreateInviteCodeRequest = z.infer<typeof CreateInviteCodeRequestSchema>;
export type BanUserRequest = z.infer<typeof BanUserRequestSchema>;
export type AddMemberRequest = z.infer<typeof AddMemberRequestSchema>;
export type JoinCommunityResponse = z.infer<typeof JoinCommunityResponseSchema>;
export type InviteCodeResponse = z.infer<typeof InviteCodeResponseSchema>;
export type MembershipResponse = z.infer<typeof MembershipResponseSchema>;
export type MembershipChangeResponse = z.infer<typeof MembershipChangeResponseSchema>;
