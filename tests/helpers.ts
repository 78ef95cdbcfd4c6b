import { vi } from 'vitest';
import { ok, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import type { EventKind, EventPayloadMap, NotificationUser } from '../src/domain/index.js';
import type {
  EmailTransport,
  MailSettings,
  OutgoingEmail,
  RenderContext,
  RenderError,
  TemplateRenderer,
  TransportError,
  TransportReceipt,
} from '../src/application/index.js';

/** Minimal fake logger; `child()` returns the same fake. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

export const MAIL_SETTINGS: MailSettings = {
  serverBaseUrl: 'http://localhost:3000',
  supportEmail: 'support@example.com',
};

/** User factory with sensible defaults. */
export function makeUser(overrides: Partial<NotificationUser> = {}): NotificationUser {
  return {
    id: 'u1',
    email: 'a@b.com',
    first_name: 'A',
    verification_token: 'tok',
    is_professional: false,
    ...overrides,
  };
}

/** One valid payload per kind. */
export const VALID_PAYLOADS: { [K in EventKind]: EventPayloadMap[K] } = {
  email_verification: { id: 'u1', email: 'a@b.com', first_name: 'A', verification_token: 'tok' },
  account_locked: { id: 'u1', email: 'a@b.com', first_name: 'A' },
  account_unlocked: { id: 'u1', email: 'a@b.com', first_name: 'A' },
  role_upgrade: { id: 'u1', email: 'a@b.com', first_name: 'A', new_role: 'MANAGER' },
  professional_status_upgrade: { id: 'u1', email: 'a@b.com', first_name: 'A', is_professional: true },
};

/**
 * Renderer that records the context and emits `<template>|key=value;…`
 * so tests can assert on what reached the transport.
 */
export function recordingRenderer() {
  const contexts: Array<{ name: string; context: RenderContext }> = [];
  const renderer: TemplateRenderer = {
    render(name: string, context: RenderContext): Result<string, RenderError> {
      contexts.push({ name, context });
      const body = Object.entries(context).map(([k, v]) => `${k}=${String(v)}`).join(';');
      return ok(`${name}|${body}`);
    },
  };
  return { renderer, contexts };
}

/** Transport whose `send` is a mock resolving to a fixed message id. */
export function fakeTransport() {
  const send = vi.fn(
    async (_email: OutgoingEmail): Promise<Result<TransportReceipt, TransportError>> => ok({ messageId: 'msg-1' }),
  );
  const transport: EmailTransport = { send };
  return { transport, send };
}
