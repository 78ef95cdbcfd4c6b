import { ok, err, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import type { NotificationTask } from '../domain/index.js';
import { MESSAGE_DEFINITIONS } from './render-context.js';
import type { NotificationMailer } from './notification-mailer.js';

export interface TaskSuccess {
  status: 'success';
  message: string;
}

export interface TaskFailure {
  status: 'failure';
  type: 'RENDER' | 'TRANSPORT';
  message: string;
}

/**
 * Runs one attempt of a notification task: render the kind's template and
 * send it to the payload's address.
 *
 * An attempt has no side effect besides the email itself, so running the
 * same payload again after a failure is safe; at worst the user receives a
 * duplicate.
 */
export class NotificationExecutor {
  constructor(
    private readonly mailer: Pick<NotificationMailer, 'deliver'>,
    private readonly log: Logger,
  ) {}

  async execute(task: NotificationTask): Promise<Result<TaskSuccess, TaskFailure>> {
    const { eventKind, payload, attempt, maxAttempts } = task;
    const label = MESSAGE_DEFINITIONS[eventKind].label;

    this.log.info(
      { kind: eventKind, email: payload['email'], attempt: attempt + 1, maxAttempts },
      `Processing ${label.toLowerCase()}`,
    );

    const delivered = await this.mailer.deliver(eventKind, payload);
    if (delivered.isErr()) {
      this.log.error(
        { kind: eventKind, attempt: attempt + 1, error: delivered.error },
        `Failed to send ${label.toLowerCase()}`,
      );
      return err({ status: 'failure', type: delivered.error.type, message: delivered.error.message });
    }

    const message = `${label} sent to ${delivered.value.to}`;
    this.log.info({ kind: eventKind, messageId: delivered.value.messageId }, message);
    return ok({ status: 'success', message });
  }
}
