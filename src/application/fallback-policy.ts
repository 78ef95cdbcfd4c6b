import type { EventKind } from '../domain/index.js';

/**
 * What the notification service does when an event cannot be published.
 *
 * - `direct`: render and send the email synchronously, skipping the pipeline.
 * - `log`: record the failure; no email goes out.
 */
export type FallbackMode = 'direct' | 'log';

export type FallbackPolicy = Readonly<Record<EventKind, FallbackMode>>;

export const FALLBACK_MODES: readonly FallbackMode[] = ['direct', 'log'];

export const DEFAULT_FALLBACK_POLICY: FallbackPolicy = {
  email_verification: 'direct',
  account_locked: 'direct',
  account_unlocked: 'log',
  role_upgrade: 'log',
  professional_status_upgrade: 'log',
};

export function isFallbackMode(value: unknown): value is FallbackMode {
  return value === 'direct' || value === 'log';
}
