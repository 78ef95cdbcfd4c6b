export { createLogger } from './logger.js';
export { loadConfig, envTestModeProbe, loadNotificationConfig } from './config/index.js';
export type { AppConfig, NotificationConfig } from './config/index.js';
export { notificationsPlugin } from './notifications/index.js';
export type { NotificationsPluginOptions, NotificationRuntime } from './notifications/index.js';
export { connectRedis, connectBroker, createRedis, onceCloser, RedisStreamEventSink } from './redis/index.js';
export {
  makeQueueClient,
  QUEUE_NAMES,
  BullMqTaskQueue,
  BullMqTaskStatusReader,
  DeadLetterReporter,
  createNotificationWorker,
} from './queue/index.js';
export { HandlebarsTemplateRenderer, SmtpEmailTransport, resolveTemplatesDir } from './email/index.js';
export { startStreamConsumer } from './worker/index.js';
