import { randomInt } from 'node:crypto';

// No 0/O or 1/I/L: codes are read aloud and typed by hand.
export const INVITE_CODE_ALPHABET = 'ABCDEFGHJKMNPQRSTUVWXYZ23456789';
export const DEFAULT_INVITE_CODE_LENGTH = 8;

export function generateInviteCode(length: number = DEFAULT_INVITE_CODE_LENGTH): string {
  if (!Number.isInteger(length) || length < 4 || length > 32) {
    throw new Error('Invite code length must be an integer between 4 and 32');
  }
  let code = '';
  for (let i = 0; i < length; i++) {
    code += INVITE_CODE_ALPHABET[randomInt(INVITE_CODE_ALPHABET.length)];
  }
  return code;
}
