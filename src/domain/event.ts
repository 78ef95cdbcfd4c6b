/**
 * Event catalog for the account notification pipeline.
 *
 * Each kind maps to one broker stream (the stream key is the kind itself),
 * one email template and one executor task. The types here carry no
 * framework dependencies.
 */

export const EVENT_KINDS = [
  'email_verification',
  'account_locked',
  'account_unlocked',
  'role_upgrade',
  'professional_status_upgrade',
] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

/** Named access to the kinds, e.g. `EventKind.RoleUpgrade`. */
export const EventKind = {
  EmailVerification: 'email_verification',
  AccountLocked: 'account_locked',
  AccountUnlocked: 'account_unlocked',
  RoleUpgrade: 'role_upgrade',
  ProfessionalStatusUpgrade: 'professional_status_upgrade',
} as const satisfies Record<string, EventKind>;

export const EVENT_DESCRIPTIONS: Readonly<Record<EventKind, string>> = {
  email_verification: 'Email verification notification',
  account_locked: 'Account locking notification',
  account_unlocked: 'Account unlocking notification',
  role_upgrade: 'Role upgrade notification',
  professional_status_upgrade: 'Professional status upgrade notification',
};

export function isEventKind(value: string): value is EventKind {
  return (EVENT_KINDS as readonly string[]).includes(value);
}

/** Broker topic (Redis stream key) for a kind. */
export function topicFor(kind: EventKind): string {
  return kind;
}

/** Values allowed inside an event payload. */
export type PayloadValue = string | number | boolean | null;

/** Free-form payload as it travels over the broker. */
export type EventPayload = Record<string, PayloadValue>;

type UserFields = {
  id: string;
  email: string;
  first_name: string;
};

/** Required payload fields per kind. */
export type EventPayloadMap = {
  email_verification: UserFields & { verification_token: string };
  account_locked: UserFields;
  account_unlocked: UserFields;
  role_upgrade: UserFields & { new_role: string };
  professional_status_upgrade: UserFields & { is_professional: boolean };
};

/** An event as read back from the broker by the worker. */
export interface NotificationEvent {
  /** Broker-assigned entry id. */
  readonly event_id: string;
  readonly kind: EventKind;
  readonly payload: EventPayload;
}
