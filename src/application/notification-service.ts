import type { Logger } from 'pino';
import {
  EventKind,
  type EventPayload,
  type EventPayloadMap,
  type NotificationUser,
  type UserRole,
} from '../domain/index.js';
import { describeError, type EventSink, type PublishRoute } from './event-sink.js';
import { DEFAULT_FALLBACK_POLICY, type FallbackPolicy } from './fallback-policy.js';
import type { NotificationMailer } from './notification-mailer.js';

export type NotificationStatus = 'published' | 'fallback_sent' | 'fallback_failed' | 'dropped';

export interface NotificationOutcome {
  kind: EventKind;
  status: NotificationStatus;
  route?: PublishRoute;
  error?: string;
}

export interface NotificationServiceDeps {
  sink: EventSink;
  mailer: Pick<NotificationMailer, 'deliver'>;
  log: Logger;
  fallbackPolicy?: FallbackPolicy;
}

/**
 * Turns account lifecycle actions into published notification events.
 *
 * Every operation resolves, never rejects: the business action that
 * triggered it (registration, lock-out, role change) must complete whatever
 * happens to the email. When publishing fails, the per-kind fallback policy
 * decides between a synchronous direct send and a log entry.
 */
export class NotificationService {
  private readonly sink: EventSink;
  private readonly mailer: Pick<NotificationMailer, 'deliver'>;
  private readonly log: Logger;
  private readonly fallbackPolicy: FallbackPolicy;

  constructor(deps: NotificationServiceDeps) {
    this.sink = deps.sink;
    this.mailer = deps.mailer;
    this.log = deps.log;
    this.fallbackPolicy = deps.fallbackPolicy ?? DEFAULT_FALLBACK_POLICY;
  }

  sendVerificationEmail(user: NotificationUser): Promise<NotificationOutcome> {
    return this.notify(EventKind.EmailVerification, user, () => {
      if (!user.verification_token) {
        throw new Error(`User ${user.id} has no verification token`);
      }
      return { ...userFields(user), verification_token: user.verification_token };
    });
  }

  sendAccountLockedNotification(user: NotificationUser): Promise<NotificationOutcome> {
    return this.notify(EventKind.AccountLocked, user, () => userFields(user));
  }

  sendAccountUnlockedNotification(user: NotificationUser): Promise<NotificationOutcome> {
    return this.notify(EventKind.AccountUnlocked, user, () => userFields(user));
  }

  sendRoleUpgradeNotification(user: NotificationUser, newRole: UserRole): Promise<NotificationOutcome> {
    return this.notify(EventKind.RoleUpgrade, user, () => ({ ...userFields(user), new_role: newRole }));
  }

  sendProfessionalStatusNotification(user: NotificationUser): Promise<NotificationOutcome> {
    return this.notify(EventKind.ProfessionalStatusUpgrade, user, () => ({
      ...userFields(user),
      is_professional: user.is_professional ?? false,
    }));
  }

  private async notify<K extends EventKind>(
    kind: K,
    user: NotificationUser,
    buildPayload: () => EventPayloadMap[K],
  ): Promise<NotificationOutcome> {
    let payload: EventPayloadMap[K];
    try {
      payload = buildPayload();
    } catch (error: unknown) {
      this.log.error({ err: error, kind, userId: user.id }, 'Failed to build notification payload');
      return { kind, status: 'dropped', error: describeError(error) };
    }

    let failure: string;
    try {
      const published = await this.sink.publish(kind, payload);
      if (published.isOk()) {
        this.log.info({ kind, email: user.email, route: published.value.route }, 'Notification event published');
        return { kind, status: 'published', route: published.value.route };
      }
      failure = `${published.error.type}: ${published.error.message}`;
    } catch (error: unknown) {
      failure = describeError(error);
    }

    this.log.error({ kind, email: user.email, error: failure }, 'Failed to publish notification event');
    return this.fallback(kind, payload, failure);
  }

  private async fallback(kind: EventKind, payload: EventPayload, failure: string): Promise<NotificationOutcome> {
    if (this.fallbackPolicy[kind] !== 'direct') {
      return { kind, status: 'dropped', error: failure };
    }

    try {
      const delivered = await this.mailer.deliver(kind, payload);
      if (delivered.isOk()) {
        this.log.info({ kind, to: delivered.value.to }, 'Fallback email sent directly');
        return { kind, status: 'fallback_sent', error: failure };
      }
      this.log.error({ kind, error: delivered.error }, 'Fallback direct send failed');
      return { kind, status: 'fallback_failed', error: delivered.error.message };
    } catch (error: unknown) {
      this.log.error({ err: error, kind }, 'Fallback direct send failed');
      return { kind, status: 'fallback_failed', error: describeError(error) };
    }
  }
}

function userFields(user: NotificationUser): EventPayloadMap['account_locked'] {
  return { id: String(user.id), email: user.email, first_name: user.first_name };
}
