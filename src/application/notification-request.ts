import { z } from 'zod';
import { USER_ROLES } from '../domain/index.js';
import type { NotificationOutcome, NotificationService } from './notification-service.js';

const userSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform(String),
  email: z.string().email(),
  first_name: z.string().default(''),
  verification_token: z.string().nullable().optional(),
  is_professional: z.boolean().optional(),
});

/** Body of an operator request to trigger one notification. */
export const notificationRequestSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('email_verification'), user: userSchema }),
  z.object({ kind: z.literal('account_locked'), user: userSchema }),
  z.object({ kind: z.literal('account_unlocked'), user: userSchema }),
  z.object({ kind: z.literal('role_upgrade'), user: userSchema, new_role: z.enum(USER_ROLES) }),
  z.object({ kind: z.literal('professional_status_upgrade'), user: userSchema }),
]);

export type NotificationRequest = z.infer<typeof notificationRequestSchema>;

/** Runs the service operation matching the request's kind. */
export function sendNotification(
  service: NotificationService,
  request: NotificationRequest,
): Promise<NotificationOutcome> {
  switch (request.kind) {
    case 'email_verification':
      return service.sendVerificationEmail(request.user);
    case 'account_locked':
      return service.sendAccountLockedNotification(request.user);
    case 'account_unlocked':
      return service.sendAccountUnlockedNotification(request.user);
    case 'role_upgrade':
      return service.sendRoleUpgradeNotification(request.user, request.new_role);
    case 'professional_status_upgrade':
      return service.sendProfessionalStatusNotification(request.user);
  }
}
