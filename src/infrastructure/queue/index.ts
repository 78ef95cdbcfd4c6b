export { makeQueueClient, QUEUE_NAMES } from './client.js';
export type { QueueClient } from './client.js';
export {
  BullMqTaskQueue,
  BullMqTaskStatusReader,
  DeadLetterReporter,
  toTaskState,
} from './task-queue.js';
export type { DeadLetter } from './task-queue.js';
export {
  createNotificationProcessor,
  createNotificationWorker,
  toNotificationTask,
  RetryableTaskError,
} from './notification-worker.js';
export type { NotificationJob, NotificationProcessorDeps } from './notification-worker.js';
