import { describe, it, expect } from 'vitest';
import { redact } from '../logger';

describe('redact', () => {
  it('redacts PII keys case-insensitively', () => {
    expect(redact({ inviteCode: 'ABCD2345', Authorization: 'Bearer x', userId: 'u1' })).toEqual({
      inviteCode: '[REDACTED]',
      Authorization: '[REDACTED]',
      userId: 'u1',
    });
  });

  it('redacts nested objects and arrays of objects', () => {
    expect(
      redact({
        request: { headers: { authorization: 'Bearer x' }, url: '/communities/join' },
        users: [{ email: 'a@example.com', id: 'u1' }, 'plain'],
      }),
    ).toEqual({
      request: { headers: { authorization: '[REDACTED]' }, url: '/communities/join' },
      users: [{ email: '[REDACTED]', id: 'u1' }, 'plain'],
    });
  });

  it('keeps dates and error codes intact', () => {
    const at = new Date('2026-01-01T00:00:00Z');
    expect(redact({ at, code: 'FORBIDDEN' })).toEqual({ at, code: 'FORBIDDEN' });
  });
});
