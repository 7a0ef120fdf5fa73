import { type InviteCode } from './community';
import { type InviteCodeRepository } from './ports';
import { isInviteExpired } from './invite-policy';

export interface InviteResolverDeps {
  inviteCodeRepo: InviteCodeRepository;
  withTransaction: <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;
}

/**
 * Decides whether an invite code may be redeemed and takes one use from it.
 *
 * The take happens in its own committed transaction before expiry is
 * re-checked, so a code that expires between creation and redemption loses
 * the use even though the redemption is rejected.
 */
export class InviteResolver {
  constructor(private readonly deps: InviteResolverDeps) {}

  async consume(code: string): Promise<InviteCode> {
    const { inviteCodeRepo, withTransaction } = this.deps;

    const normalized = code.trim();
    if (!normalized) {
      throw new InviteError('VALIDATION', 'Invite code is required');
    }

    const consumed = await withTransaction((tx) => inviteCodeRepo.consume(tx, normalized));

    if (!consumed) {
      const existing = await withTransaction((tx) => inviteCodeRepo.findByCode(tx, normalized));
      if (!existing) {
        throw new InviteError('INVALID_INVITE', 'Invalid or expired invite code');
      }
      if (isInviteExpired(existing)) {
        throw new InviteError('EXPIRED_INVITE', 'Invite code has expired');
      }
      throw new InviteError('INVALID_INVITE', 'Invite code has no remaining uses');
    }

    if (isInviteExpired(consumed)) {
      throw new InviteError('EXPIRED_INVITE', 'Invite code has expired');
    }

    return consumed;
  }
}

export class InviteError extends Error {
  constructor(
    public readonly kind: 'VALIDATION' | 'INVALID_INVITE' | 'EXPIRED_INVITE',
    message: string,
  ) {
    super(message);
    this.name = 'InviteError';
  }
}
