import { z } from 'zod';
import { EVENT_KINDS } from '../domain/index.js';
import type { EventKind, EventPayloadMap } from '../domain/index.js';

/**
 * Zod schemas for event payloads.
 *
 * The publish side checks the required fields of each kind before anything
 * reaches the broker. The consume side is looser: executors default the
 * optional bits (e.g. `first_name`) so a thin payload still produces an email.
 */

const userFields = {
  id: z.string().min(1),
  email: z.string().email(),
  first_name: z.string(),
};

export const payloadSchemas = {
  email_verification: z.object({ ...userFields, verification_token: z.string().min(1) }),
  account_locked: z.object(userFields),
  account_unlocked: z.object(userFields),
  role_upgrade: z.object({ ...userFields, new_role: z.string().min(1) }),
  professional_status_upgrade: z.object({ ...userFields, is_professional: z.boolean() }),
} satisfies { [K in EventKind]: z.ZodType<EventPayloadMap[K]> };

export const payloadValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/** Shape of an event body as read back from a broker stream entry. */
export const inboundEventSchema = z.object({
  kind: z.enum(EVENT_KINDS),
  payload: z.record(z.string(), payloadValueSchema),
});

export type InboundEvent = z.infer<typeof inboundEventSchema>;

/**
 * Validates a payload against its kind's required fields.
 * Returns the list of issues, empty when the payload is valid.
 */
export function validatePayload(kind: EventKind, payload: unknown): string[] {
  const parsed = payloadSchemas[kind].safeParse(payload);
  if (parsed.success) return [];
  return parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
