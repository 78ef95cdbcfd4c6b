import { Queue, Worker, type Job, type Processor, type WorkerOptions } from 'bullmq';
import type { Redis } from 'ioredis';
import type { Logger } from 'pino';

/**
 * BullMQ queue client.
 *
 * Queue keys are namespaced with BullMQ's own `prefix` option; the Redis
 * connection must not carry an ioredis `keyPrefix`.
 */

export const QUEUE_NAMES = {
  /** Notification executor tasks, one job name per event kind. */
  NOTIFICATIONS: 'notifications',
  /** Tasks that exhausted their attempts. */
  DLQ: 'notifications-dlq',
} as const;

export interface QueueClientConfig {
  redis: Redis;
  prefix: string;
  logger: Logger;
}

export interface CreateWorkerOptions<T, R> {
  name: string;
  processor: Processor<T, R>;
  options?: Partial<WorkerOptions>;
}

export interface QueueClient {
  getQueue<T = unknown>(name: string): Queue<T>;
  createWorker<T = unknown, R = unknown>(options: CreateWorkerOptions<T, R>): Worker<T, R>;
  close(): Promise<void>;
}

export const makeQueueClient = (config: QueueClientConfig): QueueClient => {
  const { redis, prefix, logger } = config;
  const log = logger.child({ component: 'QueueClient' });

  const queues = new Map<string, Queue>();
  const workers: Worker[] = [];
  let closing: Promise<void> | undefined;

  log.info({ prefix }, 'Initializing BullMQ queue client');

  return {
    getQueue<T = unknown>(name: string): Queue<T> {
      let queue = queues.get(name) as Queue<T> | undefined;
      if (queue === undefined) {
        log.debug({ name, prefix }, 'Creating queue');
        queue = new Queue<T>(name, { connection: redis, prefix });
        queues.set(name, queue as Queue);
      }
      return queue;
    },

    createWorker<T = unknown, R = unknown>(options: CreateWorkerOptions<T, R>): Worker<T, R> {
      const { name, processor, options: workerOptions = {} } = options;

      log.info({ name, prefix }, 'Creating worker');

      const worker = new Worker<T, R>(name, processor, {
        connection: redis,
        prefix,
        ...workerOptions,
      });

      worker.on('completed', (job: Job<T, R>) => {
        log.debug({ jobId: job.id, queue: name }, 'Job completed');
      });

      worker.on('failed', (job: Job<T, R> | undefined, error: Error) => {
        log.warn({ jobId: job?.id, queue: name, attemptsMade: job?.attemptsMade, error: error.message }, 'Job attempt failed');
      });

      worker.on('error', (error: Error) => {
        log.error({ queue: name, error: error.message }, 'Worker error');
      });

      workers.push(worker);
      return worker;
    },

    close(): Promise<void> {
      closing ??= (async () => {
        log.info('Closing queue client');

        // Workers first so no job starts against a closed queue
        await Promise.all(
          workers.map(async (worker) => {
            try {
              await worker.close();
            } catch (error: unknown) {
              log.error({ err: error }, 'Error closing worker');
            }
          }),
        );

        await Promise.all(
          [...queues.values()].map(async (queue) => {
            try {
              await queue.close();
            } catch (error: unknown) {
              log.error({ err: error }, 'Error closing queue');
            }
          }),
        );

        log.info('Queue client closed');
      })();
      return closing;
    },
  };
};
