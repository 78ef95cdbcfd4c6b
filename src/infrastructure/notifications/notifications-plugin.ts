import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import {
  AvailabilityGate,
  CaptureBuffer,
  CaptureEventSink,
  GatedEventSink,
  NotificationMailer,
  NotificationService,
} from '../../application/index.js';
import type { NotificationJobData, TaskStatusReader } from '../../application/index.js';
import { envTestModeProbe, loadNotificationConfig } from '../config/index.js';
import type { AppConfig } from '../config/index.js';
import { HandlebarsTemplateRenderer, SmtpEmailTransport, resolveTemplatesDir } from '../email/index.js';
import { BullMqTaskStatusReader, QUEUE_NAMES, makeQueueClient } from '../queue/index.js';
import { RedisStreamEventSink, connectBroker, createRedis, onceCloser } from '../redis/index.js';

export interface NotificationsPluginOptions {
  config: AppConfig;
  log: Logger;
}

/** Producer-side runtime shared by the notification routes. */
export interface NotificationRuntime {
  service: NotificationService;
  gate: AvailabilityGate;
  captureBuffer: CaptureBuffer;
  taskStatus: TaskStatusReader;
  /** Pings the broker; false when it is missing or does not answer. */
  checkBroker(): Promise<boolean>;
}

/**
 * Fastify plugin that owns the notification producer.
 *
 * - Connects the broker once on start; an unreachable broker leaves the
 *   producer degraded instead of failing startup.
 * - Decorates `fastify.notifications` for the routes.
 * - Releases every connection on close, once.
 */
async function notificationsPlugin(fastify: FastifyInstance, opts: NotificationsPluginOptions): Promise<void> {
  const { config, log } = opts;

  const broker = await connectBroker(config.broker.url, log);
  const gate = new AvailabilityGate({ testMode: envTestModeProbe() });
  const captureBuffer = new CaptureBuffer();

  const sink = new GatedEventSink(
    gate,
    new RedisStreamEventSink(broker, log.child({ component: 'EventSink' }), {
      ackTimeoutMs: config.broker.ackTimeoutMs,
      minReplicas: config.broker.minReplicas,
    }),
    new CaptureEventSink(captureBuffer, log.child({ component: 'CaptureSink' })),
  );

  const transport = SmtpEmailTransport.fromConfig(config.smtp, log.child({ component: 'SmtpTransport' }));
  const mailer = new NotificationMailer(
    new HandlebarsTemplateRenderer(resolveTemplatesDir()),
    transport,
    config.mail,
    log.child({ component: 'Mailer' }),
  );

  const notificationConfig = loadNotificationConfig(config.notificationsConfigPath);
  log.info({ fallback: notificationConfig.fallback }, 'Notification config loaded');

  const service = new NotificationService({
    sink,
    mailer,
    log: log.child({ component: 'NotificationService' }),
    fallbackPolicy: notificationConfig.fallback,
  });

  const store = createRedis(config.resultStore.url, log, 'notification-results');
  const queueClient = makeQueueClient({ redis: store, prefix: config.resultStore.queuePrefix, logger: log });
  const taskStatus = new BullMqTaskStatusReader(queueClient.getQueue<NotificationJobData>(QUEUE_NAMES.NOTIFICATIONS));

  const runtime: NotificationRuntime = {
    service,
    gate,
    captureBuffer,
    taskStatus,
    async checkBroker() {
      if (broker === null) return false;
      try {
        return (await broker.ping()) === 'PONG';
      } catch (err: unknown) {
        log.warn({ err }, 'Broker ping failed');
        return false;
      }
    },
  };

  fastify.decorate('notifications', runtime);

  const closeBroker = onceCloser(broker, log, 'notification-producer');
  const closeStore = onceCloser(store, log, 'notification-results');

  fastify.addHook('onClose', async () => {
    await queueClient.close();
    await closeStore();
    await closeBroker();
    transport.close();
  });
}

export default fp(notificationsPlugin, {
  name: 'notifications',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.notifications` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    notifications: NotificationRuntime;
  }
}
