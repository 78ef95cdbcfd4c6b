/**
 * The slice of the user entity the notification pipeline reads.
 * Everything else about users belongs to the host application.
 */

export const USER_ROLES = ['ANONYMOUS', 'AUTHENTICATED', 'MANAGER', 'ADMIN'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export interface NotificationUser {
  readonly id: string;
  readonly email: string;
  readonly first_name: string;
  readonly verification_token?: string | null;
  readonly is_professional?: boolean;
}
