import { NotificationExecutor, NotificationMailer, TaskDispatcher } from './application/index.js';
import type { NotificationJobData } from './application/index.js';
import { createLogger, loadConfig } from './infrastructure/index.js';
import { HandlebarsTemplateRenderer, SmtpEmailTransport, resolveTemplatesDir } from './infrastructure/email/index.js';
import {
  BullMqTaskQueue,
  DeadLetterReporter,
  QUEUE_NAMES,
  createNotificationWorker,
  makeQueueClient,
} from './infrastructure/queue/index.js';
import type { DeadLetter } from './infrastructure/queue/index.js';
import { connectRedis, onceCloser } from './infrastructure/redis/index.js';
import { startStreamConsumer } from './infrastructure/worker/index.js';

/**
 * Standalone worker process.
 *
 * Runs the Task Dispatcher (Redis Streams consumer group → BullMQ) and the
 * Notification Executors (BullMQ worker → SMTP) side by side. Scale it
 * horizontally by launching instances with different WORKER_ID values.
 */
const config = loadConfig();
const log = createLogger('notification-worker', config.logLevel);

// Abort controller for graceful shutdown
const ac = new AbortController();

// Released in reverse acquisition order
const releasers: Array<() => Promise<void> | void> = [];

let stopping: Promise<void> | undefined;

function stop(): Promise<void> {
  stopping ??= (async () => {
    ac.abort();
    for (const release of releasers.reverse()) {
      try {
        await release();
      } catch (err: unknown) {
        log.error({ err }, 'Error releasing worker resource');
      }
    }
  })();
  return stopping;
}

async function main(): Promise<void> {
  const broker = await connectRedis(config.broker.url, log, `${config.worker.id}-dispatcher`);
  releasers.push(onceCloser(broker, log, 'dispatcher'));

  const store = await connectRedis(config.resultStore.url, log, `${config.worker.id}-executor`);
  releasers.push(onceCloser(store, log, 'executor'));

  const queueClient = makeQueueClient({ redis: store, prefix: config.resultStore.queuePrefix, logger: log });
  releasers.push(() => queueClient.close());

  const transport = SmtpEmailTransport.fromConfig(config.smtp, log.child({ component: 'SmtpTransport' }));
  releasers.push(() => transport.close());

  const mailer = new NotificationMailer(
    new HandlebarsTemplateRenderer(resolveTemplatesDir()),
    transport,
    config.mail,
    log.child({ component: 'Mailer' }),
  );

  createNotificationWorker({
    queueClient,
    concurrency: config.worker.concurrency,
    executor: new NotificationExecutor(mailer, log.child({ component: 'Executor' })),
    reporter: new DeadLetterReporter(queueClient.getQueue<DeadLetter>(QUEUE_NAMES.DLQ), log),
    retryDelayMs: config.tasks.retryDelayMs,
    log,
  });

  const dispatcher = new TaskDispatcher(
    new BullMqTaskQueue(queueClient.getQueue<NotificationJobData>(QUEUE_NAMES.NOTIFICATIONS)),
    config.tasks,
    log.child({ component: 'Dispatcher' }),
  );

  await startStreamConsumer(broker, dispatcher, log, ac.signal, { consumerName: config.worker.id });
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(signal: NodeJS.Signals): void {
  log.info({ signal }, 'Shutting down worker...');
  stop().then(
    () => process.exit(0),
    (err: unknown) => {
      log.error({ err }, 'Error during shutdown');
      process.exit(1);
    },
  );
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);

main().catch(async (err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  await stop();
  process.exit(1);
});
