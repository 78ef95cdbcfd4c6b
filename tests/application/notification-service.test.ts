import { describe, it, expect, vi, beforeEach } from 'vitest';
import { err, ok, type Result } from 'neverthrow';
import type { EventKind } from '../../src/domain/index.js';
import {
  AvailabilityGate,
  CaptureBuffer,
  CaptureEventSink,
  DEFAULT_FALLBACK_POLICY,
  GatedEventSink,
  NotificationMailer,
  NotificationService,
} from '../../src/application/index.js';
import type { EventSink, PublishError, PublishReceipt } from '../../src/application/index.js';
import { MAIL_SETTINGS, fakeLogger, fakeTransport, makeUser, recordingRenderer } from '../helpers.js';

/** Broker sink that fails every publish, as when the broker is down. */
function failingSink() {
  const publish = vi.fn(
    async (kind: EventKind): Promise<Result<PublishReceipt, PublishError>> =>
      err({ type: 'BROKER_ERROR', kind, message: 'connection refused' }),
  );
  const sink: EventSink = { publish };
  return { sink, publish };
}

describe('NotificationService', () => {
  let renderer: ReturnType<typeof recordingRenderer>;
  let transport: ReturnType<typeof fakeTransport>;
  let mailer: NotificationMailer;

  beforeEach(() => {
    renderer = recordingRenderer();
    transport = fakeTransport();
    mailer = new NotificationMailer(renderer.renderer, transport.transport, MAIL_SETTINGS, fakeLogger());
  });

  describe('when the broker fails', () => {
    it('sends the verification email directly, exactly once, with the user id and token in the link', async () => {
      const broker = failingSink();
      const service = new NotificationService({ sink: broker.sink, mailer, log: fakeLogger() });

      const outcome = await service.sendVerificationEmail(
        makeUser({ id: 'u1', email: 'a@b.com', first_name: 'A', verification_token: 'tok' }),
      );

      expect(outcome).toEqual({
        kind: 'email_verification',
        status: 'fallback_sent',
        error: 'BROKER_ERROR: connection refused',
      });
      expect(broker.publish).toHaveBeenCalledTimes(1);
      expect(transport.send).toHaveBeenCalledTimes(1);

      const url = renderer.contexts[0]?.context['verification_url'];
      expect(url).toBe('http://localhost:3000/verify-email/u1/tok');
      expect(transport.send).toHaveBeenCalledWith({
        subject: 'Verify Your Account',
        to: 'a@b.com',
        html: 'email_verification|name=A;email=a@b.com;verification_url=http://localhost:3000/verify-email/u1/tok',
      });
    });

    it('sends account locked emails directly', async () => {
      const service = new NotificationService({ sink: failingSink().sink, mailer, log: fakeLogger() });

      const outcome = await service.sendAccountLockedNotification(makeUser());

      expect(outcome.status).toBe('fallback_sent');
      expect(transport.send).toHaveBeenCalledWith(expect.objectContaining({ subject: 'Account Locked Notification' }));
    });

    it.each([
      ['account_unlocked', (s: NotificationService) => s.sendAccountUnlockedNotification(makeUser())],
      ['role_upgrade', (s: NotificationService) => s.sendRoleUpgradeNotification(makeUser(), 'ADMIN')],
      ['professional_status_upgrade', (s: NotificationService) => s.sendProfessionalStatusNotification(makeUser())],
    ] as const)('only logs a failed %s event under the default policy', async (kind, send) => {
      const log = fakeLogger();
      const service = new NotificationService({ sink: failingSink().sink, mailer, log });

      const outcome = await send(service);

      expect(outcome).toEqual({ kind, status: 'dropped', error: 'BROKER_ERROR: connection refused' });
      expect(transport.send).not.toHaveBeenCalled();
      expect(log.error).toHaveBeenCalledTimes(1);
    });

    it('follows a configured policy for kinds that default to log', async () => {
      const service = new NotificationService({
        sink: failingSink().sink,
        mailer,
        log: fakeLogger(),
        fallbackPolicy: { ...DEFAULT_FALLBACK_POLICY, role_upgrade: 'direct' },
      });

      const outcome = await service.sendRoleUpgradeNotification(makeUser(), 'MANAGER');

      expect(outcome.status).toBe('fallback_sent');
      expect(renderer.contexts[0]?.context['role_description']).toBe('manager with additional privileges');
    });

    it('reports fallback_failed when the direct send fails too', async () => {
      transport.send.mockResolvedValueOnce(err({ type: 'SEND_FAILED', message: 'smtp down' }));
      const service = new NotificationService({ sink: failingSink().sink, mailer, log: fakeLogger() });

      const outcome = await service.sendVerificationEmail(makeUser());

      expect(outcome).toEqual({ kind: 'email_verification', status: 'fallback_failed', error: 'smtp down' });
    });

    it('resolves even when the sink throws', async () => {
      const sink: EventSink = {
        publish: vi.fn().mockRejectedValue(new Error('boom')),
      };
      const service = new NotificationService({ sink, mailer, log: fakeLogger() });

      const outcome = await service.sendAccountLockedNotification(makeUser());

      expect(outcome).toEqual({ kind: 'account_locked', status: 'fallback_sent', error: 'boom' });
    });

    it('resolves even when the fallback mailer throws', async () => {
      const throwing = { deliver: vi.fn().mockRejectedValue(new Error('renderer crashed')) };
      const service = new NotificationService({ sink: failingSink().sink, mailer: throwing, log: fakeLogger() });

      const outcome = await service.sendVerificationEmail(makeUser());

      expect(outcome).toEqual({ kind: 'email_verification', status: 'fallback_failed', error: 'renderer crashed' });
    });
  });

  describe('when publishing succeeds', () => {
    it('captures the payload while the gate is bypassed and sends nothing', async () => {
      const gate = new AvailabilityGate({ forcedUnavailable: true });
      const buffer = new CaptureBuffer();
      const broker = failingSink();
      const sink = new GatedEventSink(gate, broker.sink, new CaptureEventSink(buffer, fakeLogger()));
      const service = new NotificationService({ sink, mailer, log: fakeLogger() });

      const outcome = await service.sendRoleUpgradeNotification(makeUser(), 'MANAGER');

      expect(outcome).toEqual({ kind: 'role_upgrade', status: 'published', route: 'capture' });
      expect(buffer.last()).toEqual({
        kind: 'role_upgrade',
        payload: { id: 'u1', email: 'a@b.com', first_name: 'A', new_role: 'MANAGER' },
      });
      expect(broker.publish).not.toHaveBeenCalled();
      expect(transport.send).not.toHaveBeenCalled();
    });

    it('publishes is_professional=false when the user has no flag', async () => {
      const publish = vi.fn(
        async (kind: EventKind): Promise<Result<PublishReceipt, PublishError>> =>
          ok({ kind, route: 'broker', payload: {} }),
      );
      const service = new NotificationService({ sink: { publish }, mailer, log: fakeLogger() });

      await service.sendProfessionalStatusNotification({ id: 'u9', email: 'p@b.com', first_name: 'P' });

      expect(publish).toHaveBeenCalledWith('professional_status_upgrade', {
        id: 'u9',
        email: 'p@b.com',
        first_name: 'P',
        is_professional: false,
      });
    });
  });

  it('drops a verification request for a user without a token', async () => {
    const broker = failingSink();
    const service = new NotificationService({ sink: broker.sink, mailer, log: fakeLogger() });

    const outcome = await service.sendVerificationEmail(makeUser({ verification_token: null }));

    expect(outcome).toEqual({ kind: 'email_verification', status: 'dropped', error: 'User u1 has no verification token' });
    expect(broker.publish).not.toHaveBeenCalled();
    expect(transport.send).not.toHaveBeenCalled();
  });
});
