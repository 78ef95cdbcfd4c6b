import type { EventKind, EventPayload } from './event.js';

/**
 * Lifecycle of one notification task:
 *
 *   pending → executing → succeeded
 *                       → retrying → executing …
 *                       → failed (attempts exhausted, terminal)
 */
export type TaskState = 'pending' | 'executing' | 'succeeded' | 'retrying' | 'failed';

export interface NotificationTask {
  readonly eventKind: EventKind;
  readonly payload: EventPayload;
  /** 0-based index of the attempt being run. */
  readonly attempt: number;
  /** Total attempts allowed, first run included. */
  readonly maxAttempts: number;
  readonly retryDelayMs: number;
}

export type FailureTransition =
  | { state: 'retrying'; nextAttempt: number; notBefore: Date; reason: string }
  | { state: 'failed'; attempts: number; reason: string };

/**
 * Decides what happens to a task whose current attempt failed.
 *
 * `notBefore` is the earliest time the next attempt may run; the queue
 * is free to start it later.
 */
export function resolveFailure(task: NotificationTask, reason: string, now: Date = new Date()): FailureTransition {
  const nextAttempt = task.attempt + 1;
  if (nextAttempt < task.maxAttempts) {
    return {
      state: 'retrying',
      nextAttempt,
      notBefore: new Date(now.getTime() + task.retryDelayMs),
      reason,
    };
  }

  return { state: 'failed', attempts: nextAttempt, reason };
}
