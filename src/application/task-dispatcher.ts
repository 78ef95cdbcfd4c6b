import { ok, err, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import type { EventKind, NotificationEvent } from '../domain/index.js';
import { describeError } from './event-sink.js';
import type { TaskQueue } from './ports.js';

/** Executor task registered for each event kind. */
export const TASK_NAMES: Readonly<Record<EventKind, string>> = {
  email_verification: 'send_verification_email',
  account_locked: 'send_account_locked_email',
  account_unlocked: 'send_account_unlocked_email',
  role_upgrade: 'send_role_upgrade_email',
  professional_status_upgrade: 'send_professional_status_upgrade_email',
};

export interface RetryPolicy {
  maxAttempts: number;
  retryDelayMs: number;
}

export interface DispatchReceipt {
  taskId: string;
  taskName: string;
}

export interface DispatchError {
  type: 'ENQUEUE_FAILED';
  kind: EventKind;
  message: string;
}

/**
 * Hands each consumed event to the executor task for its kind.
 *
 * Dispatch resolves as soon as the queue holds the task; the email itself
 * is sent later and its outcome is read from the task status. The task id
 * is derived from the broker entry id, so an entry delivered twice maps
 * to a single task.
 */
export class TaskDispatcher {
  constructor(
    private readonly queue: TaskQueue,
    private readonly policy: RetryPolicy,
    private readonly log: Logger,
  ) {}

  static taskIdFor(event: Pick<NotificationEvent, 'kind' | 'event_id'>): string {
    return `${event.kind}-${event.event_id}`;
  }

  async dispatch(event: NotificationEvent): Promise<Result<DispatchReceipt, DispatchError>> {
    const taskName = TASK_NAMES[event.kind];
    const taskId = TaskDispatcher.taskIdFor(event);

    this.log.info({ kind: event.kind, event_id: event.event_id, email: event.payload['email'] }, 'Notification event received');

    try {
      const id = await this.queue.enqueue({
        taskName,
        taskId,
        data: { kind: event.kind, payload: event.payload, eventId: event.event_id },
        maxAttempts: this.policy.maxAttempts,
        retryDelayMs: this.policy.retryDelayMs,
      });
      this.log.debug({ taskId: id, taskName }, 'Notification task enqueued');
      return ok({ taskId: id, taskName });
    } catch (error: unknown) {
      this.log.error({ err: error, kind: event.kind, event_id: event.event_id }, 'Failed to enqueue notification task');
      return err({ type: 'ENQUEUE_FAILED', kind: event.kind, message: describeError(error) });
    }
  }
}
