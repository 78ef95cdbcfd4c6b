import type { EventKind, EventPayload } from '../domain/index.js';
import type { RenderContext, TemplateName } from './ports.js';

export interface MailSettings {
  /** Public base URL used for verification links. */
  serverBaseUrl: string;
  supportEmail: string;
}

export const DEFAULT_GREETING_NAME = 'User';

export const ROLE_DESCRIPTIONS: Readonly<Record<string, string>> = {
  AUTHENTICATED: 'regular authenticated user',
  MANAGER: 'manager with additional privileges',
  ADMIN: 'administrator with full system access',
};

export const GENERIC_ROLE_DESCRIPTION = 'user with updated permissions';

export const PROFESSIONAL_STATUS_TEXT = {
  upgraded: 'upgraded to professional status',
  changed: 'changed from professional status',
} as const;

export function describeRole(role: string): string {
  return ROLE_DESCRIPTIONS[role] ?? GENERIC_ROLE_DESCRIPTION;
}

export function describeProfessionalStatus(isProfessional: boolean): string {
  return isProfessional ? PROFESSIONAL_STATUS_TEXT.upgraded : PROFESSIONAL_STATUS_TEXT.changed;
}

export function buildVerificationUrl(baseUrl: string, userId: string, token: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/verify-email/${userId}/${token}`;
}

function readString(payload: EventPayload, key: string): string | undefined {
  const value = payload[key];
  if (value === undefined || value === null) return undefined;
  return String(value);
}

function readBoolean(payload: EventPayload, key: string): boolean {
  const value = payload[key];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return value.toLowerCase() === 'true';
  return false;
}

/** Everything needed to turn one event into one email. */
export interface MessageDefinition {
  templateName: TemplateName;
  subject: string;
  /** Used in task result messages, e.g. "Verification email sent to …". */
  label: string;
  buildContext(payload: EventPayload, settings: MailSettings): RenderContext;
}

function baseContext(payload: EventPayload): RenderContext {
  return {
    name: readString(payload, 'first_name') || DEFAULT_GREETING_NAME,
    email: readString(payload, 'email') ?? '',
  };
}

/**
 * Template, subject and context mapping per event kind. Adding a kind
 * means adding an entry here and a template file.
 */
export const MESSAGE_DEFINITIONS: Readonly<Record<EventKind, MessageDefinition>> = {
  email_verification: {
    templateName: 'email_verification',
    subject: 'Verify Your Account',
    label: 'Verification email',
    buildContext: (payload, settings) => ({
      ...baseContext(payload),
      verification_url: buildVerificationUrl(
        settings.serverBaseUrl,
        readString(payload, 'id') ?? '',
        readString(payload, 'verification_token') ?? '',
      ),
    }),
  },
  account_locked: {
    templateName: 'account_locked',
    subject: 'Account Locked Notification',
    label: 'Account locked email',
    buildContext: (payload, settings) => ({
      ...baseContext(payload),
      support_email: settings.supportEmail,
    }),
  },
  account_unlocked: {
    templateName: 'account_unlocked',
    subject: 'Account Unlocked Notification',
    label: 'Account unlocked email',
    buildContext: (payload) => baseContext(payload),
  },
  role_upgrade: {
    templateName: 'role_upgrade',
    subject: 'Role Update Notification',
    label: 'Role upgrade email',
    buildContext: (payload) => {
      const newRole = readString(payload, 'new_role') ?? '';
      return {
        ...baseContext(payload),
        new_role: newRole,
        role_description: describeRole(newRole),
      };
    },
  },
  professional_status_upgrade: {
    templateName: 'professional_status_upgrade',
    subject: 'Professional Status Update',
    label: 'Professional status email',
    buildContext: (payload) => {
      const isProfessional = readBoolean(payload, 'is_professional');
      return {
        ...baseContext(payload),
        is_professional: isProfessional,
        status_text: describeProfessionalStatus(isProfessional),
      };
    },
  },
};

export function buildRenderContext(
  kind: EventKind,
  payload: EventPayload,
  settings: MailSettings,
): RenderContext {
  return MESSAGE_DEFINITIONS[kind].buildContext(payload, settings);
}
