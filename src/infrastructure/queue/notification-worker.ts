import { UnrecoverableError, type Job, type Worker } from 'bullmq';
import type { Logger } from 'pino';
import { resolveFailure } from '../../domain/index.js';
import type { NotificationTask } from '../../domain/index.js';
import type {
  FailureReporter,
  NotificationExecutor,
  NotificationJobData,
  TaskSuccess,
} from '../../application/index.js';
import { QUEUE_NAMES, type QueueClient } from './client.js';

/** The job fields the processor reads. */
export type NotificationJob = Pick<Job<NotificationJobData, TaskSuccess>, 'id' | 'name' | 'data' | 'attemptsMade' | 'opts'>;

export interface NotificationProcessorDeps {
  executor: Pick<NotificationExecutor, 'execute'>;
  reporter: FailureReporter;
  retryDelayMs: number;
  log: Logger;
}

/** Thrown to let BullMQ schedule the next attempt. */
export class RetryableTaskError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RetryableTaskError';
  }
}

export function toNotificationTask(job: NotificationJob, retryDelayMs: number): NotificationTask {
  return {
    eventKind: job.data.kind,
    payload: job.data.payload,
    attempt: job.attemptsMade,
    maxAttempts: job.opts.attempts ?? 1,
    retryDelayMs,
  };
}

/**
 * Builds the BullMQ processor for notification jobs.
 *
 * One call runs one attempt. On failure the attempt outcome decides:
 * - retrying → throw, BullMQ re-runs the job after the fixed backoff;
 * - failed (exhausted) → report to the dead-letter queue, then throw an
 *   UnrecoverableError so BullMQ fails the job for good.
 */
export function createNotificationProcessor(deps: NotificationProcessorDeps) {
  const { executor, reporter, retryDelayMs, log } = deps;

  return async (job: NotificationJob): Promise<TaskSuccess> => {
    const task = toNotificationTask(job, retryDelayMs);
    const result = await executor.execute(task);

    if (result.isOk()) {
      return result.value;
    }

    const transition = resolveFailure(task, result.error.message);

    if (transition.state === 'retrying') {
      log.warn(
        {
          jobId: job.id,
          kind: task.eventKind,
          attempt: task.attempt + 1,
          maxAttempts: task.maxAttempts,
          notBefore: transition.notBefore.toISOString(),
          reason: transition.reason,
        },
        'Notification attempt failed, retry scheduled',
      );
      throw new RetryableTaskError(transition.reason);
    }

    try {
      await reporter.report(task, transition.reason);
    } catch (error: unknown) {
      log.error({ err: error, jobId: job.id, kind: task.eventKind }, 'Failed to record exhausted task');
    }
    log.error(
      { jobId: job.id, kind: task.eventKind, attempts: transition.attempts, reason: transition.reason },
      'Notification task failed after final attempt',
    );
    throw new UnrecoverableError(`${task.eventKind} failed after ${transition.attempts} attempts: ${transition.reason}`);
  };
}

export interface NotificationWorkerDeps extends NotificationProcessorDeps {
  queueClient: QueueClient;
  concurrency: number;
}

export function createNotificationWorker(deps: NotificationWorkerDeps): Worker<NotificationJobData, TaskSuccess> {
  return deps.queueClient.createWorker<NotificationJobData, TaskSuccess>({
    name: QUEUE_NAMES.NOTIFICATIONS,
    processor: createNotificationProcessor(deps),
    options: { concurrency: deps.concurrency },
  });
}
