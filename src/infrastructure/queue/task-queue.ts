import type { Job, JobState, Queue } from 'bullmq';
import type { Logger } from 'pino';
import type { NotificationTask, TaskState } from '../../domain/index.js';
import type {
  EnqueueRequest,
  FailureReporter,
  NotificationJobData,
  TaskQueue,
  TaskStatus,
  TaskStatusReader,
} from '../../application/index.js';

/** Completed jobs are kept for a day so their status can still be read. */
const COMPLETED_RETENTION_SECONDS = 24 * 60 * 60;

/**
 * {@link TaskQueue} on a BullMQ queue.
 *
 * Retries are BullMQ's: `attempts` total runs with a fixed backoff of
 * `retryDelayMs` between them. Failed jobs are kept as the terminal
 * record of an exhausted task.
 */
export class BullMqTaskQueue implements TaskQueue {
  constructor(private readonly queue: Pick<Queue<NotificationJobData>, 'add'>) {}

  async enqueue(request: EnqueueRequest): Promise<string> {
    const job = await this.queue.add(request.taskName, request.data, {
      jobId: request.taskId,
      attempts: request.maxAttempts,
      backoff: { type: 'fixed', delay: request.retryDelayMs },
      removeOnComplete: { age: COMPLETED_RETENTION_SECONDS },
      removeOnFail: false,
    });
    return job.id ?? request.taskId;
  }
}

export function toTaskState(state: JobState | 'unknown', attemptsMade: number): TaskState | null {
  switch (state) {
    case 'completed':
      return 'succeeded';
    case 'failed':
      return 'failed';
    case 'active':
      return 'executing';
    case 'delayed':
      return attemptsMade > 0 ? 'retrying' : 'pending';
    case 'waiting':
    case 'waiting-children':
    case 'prioritized':
      return 'pending';
    default:
      return null;
  }
}

type StatusJob = Pick<Job<NotificationJobData>, 'id' | 'name' | 'attemptsMade' | 'failedReason' | 'returnvalue' | 'getState'>;

/** Reads task status back from the BullMQ result store. */
export class BullMqTaskStatusReader implements TaskStatusReader {
  constructor(private readonly queue: { getJob(id: string): Promise<StatusJob | undefined> }) {}

  async getStatus(taskId: string): Promise<TaskStatus | null> {
    const job = await this.queue.getJob(taskId);
    if (job === undefined) return null;

    const state = toTaskState(await job.getState(), job.attemptsMade);
    if (state === null) return null;

    return {
      id: job.id ?? taskId,
      name: job.name,
      state,
      attemptsMade: job.attemptsMade,
      ...(job.failedReason ? { failedReason: job.failedReason } : {}),
      ...(state === 'succeeded' ? { result: job.returnvalue } : {}),
    };
  }
}

export interface DeadLetter {
  kind: NotificationTask['eventKind'];
  payload: NotificationTask['payload'];
  attempts: number;
  reason: string;
  failedAt: string;
}

/**
 * Records exhausted tasks on the dead-letter queue, where operators can
 * inspect or replay them.
 */
export class DeadLetterReporter implements FailureReporter {
  constructor(
    private readonly dlq: Pick<Queue<DeadLetter>, 'add'>,
    private readonly log: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async report(task: NotificationTask, reason: string): Promise<void> {
    const letter: DeadLetter = {
      kind: task.eventKind,
      payload: task.payload,
      attempts: task.attempt + 1,
      reason,
      failedAt: this.now().toISOString(),
    };
    await this.dlq.add(`${task.eventKind}-exhausted`, letter, { removeOnComplete: false, removeOnFail: false });
    this.log.error({ kind: task.eventKind, attempts: letter.attempts, reason }, 'Notification task exhausted, moved to dead-letter queue');
  }
}
