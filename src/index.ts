import Fastify from 'fastify';
import { createLogger, loadConfig, notificationsPlugin } from './infrastructure/index.js';
import { notificationRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap the notification API server.
 *
 * Order:
 * 1) Configuration
 * 2) Notification plugin (broker, mailer, result store)
 * 3) HTTP routes
 * 4) Shutdown hooks
 * 5) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger('notification-api', config.logLevel);

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  // --------------------------------------------------
  // Shutdown (registered before anything can fail)
  // --------------------------------------------------

  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    closing ??= fastify.close();
    return closing;
  };

  const shutdown = (signal: NodeJS.Signals): void => {
    log.info({ signal }, 'Shutting down API server...');
    close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    // --------------------------------------------------
    // Infrastructure
    // --------------------------------------------------

    await fastify.register(notificationsPlugin, { config, log });

    // --------------------------------------------------
    // HTTP Interface
    // --------------------------------------------------

    await fastify.register(notificationRoutes);

    await fastify.listen({
      host: config.http.host,
      port: config.http.port,
    });
  } catch (err: unknown) {
    await close();
    throw err;
  }
}

main().catch((err: unknown) => {
  const log = createLogger('notification-api');
  log.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
