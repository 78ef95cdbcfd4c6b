import { describe, it, expect } from 'vitest';
import {
  inboundEventSchema,
  notificationRequestSchema,
  validatePayload,
} from '../../src/application/index.js';

describe('validatePayload', () => {
  it('accepts a complete payload', () => {
    expect(validatePayload('role_upgrade', { id: 'u1', email: 'a@b.com', first_name: 'A', new_role: 'ADMIN' })).toEqual([]);
  });

  it('lists the missing fields of a kind', () => {
    const issues = validatePayload('email_verification', { id: 'u1', email: 'a@b.com', first_name: 'A' });

    expect(issues).toEqual(['verification_token: Required']);
  });

  it('requires a boolean professional flag', () => {
    const issues = validatePayload('professional_status_upgrade', {
      id: 'u1',
      email: 'a@b.com',
      first_name: 'A',
      is_professional: 'yes',
    });

    expect(issues).toEqual(['is_professional: Expected boolean, received string']);
  });
});

describe('inboundEventSchema', () => {
  it('rejects unknown kinds', () => {
    expect(inboundEventSchema.safeParse({ kind: 'password_reset', payload: {} }).success).toBe(false);
  });

  it('rejects nested payload values', () => {
    expect(inboundEventSchema.safeParse({ kind: 'account_locked', payload: { user: { id: 'u1' } } }).success).toBe(false);
  });
});

describe('notificationRequestSchema', () => {
  it('turns numeric user ids into strings', () => {
    const parsed = notificationRequestSchema.parse({
      kind: 'account_locked',
      user: { id: 42, email: 'a@b.com', first_name: 'A' },
    });

    expect(parsed.user.id).toBe('42');
  });

  it('requires a known role for role upgrades', () => {
    const parsed = notificationRequestSchema.safeParse({
      kind: 'role_upgrade',
      user: { id: 'u1', email: 'a@b.com', first_name: 'A' },
      new_role: 'SUPERUSER',
    });

    expect(parsed.success).toBe(false);
  });
});
