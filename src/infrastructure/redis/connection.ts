import { Redis } from 'ioredis';
import type { Logger } from 'pino';

function logErrors(redis: Redis, log: Logger, name: string): Redis {
  redis.on('error', (err: Error) => {
    log.warn({ err, connection: name }, 'Redis connection error');
  });
  return redis;
}

/**
 * Opens a Redis connection and waits for it to be ready.
 *
 * `maxRetriesPerRequest: null` keeps blocking stream reads and BullMQ
 * workers from failing while the connection recovers.
 */
export async function connectRedis(url: string, log: Logger, name: string): Promise<Redis> {
  const redis = logErrors(
    new Redis(url, {
      maxRetriesPerRequest: null,
      enableReadyCheck: true,
      lazyConnect: true,
      connectionName: name,
    }),
    log,
    name,
  );

  await redis.connect();
  log.info({ connection: name }, 'Redis connected');
  return redis;
}

/**
 * Creates a connection that reconnects in the background instead of
 * failing startup. Used for the producer's view of the result store,
 * which only serves task status lookups.
 *
 * Keeps ioredis's default per-request retry limit so lookups reject while
 * the store is down instead of queueing until it returns.
 */
export function createRedis(url: string, log: Logger, name: string): Redis {
  return logErrors(
    new Redis(url, {
      enableReadyCheck: true,
      connectionName: name,
    }),
    log,
    name,
  );
}

/**
 * Connects the producer's broker client.
 *
 * A broker that is unreachable at startup leaves the producer degraded
 * (`null`) until the process restarts; there is no background reconnect.
 */
export async function connectBroker(url: string, log: Logger): Promise<Redis | null> {
  const redis = logErrors(
    new Redis(url, {
      enableReadyCheck: true,
      lazyConnect: true,
      connectionName: 'notification-producer',
    }),
    log,
    'notification-producer',
  );

  try {
    await redis.connect();
    log.info('Broker connected');
    return redis;
  } catch (err: unknown) {
    log.error({ err }, 'Broker unavailable at startup, events will not be published');
    redis.disconnect();
    return null;
  }
}

/** Closes a connection once; later calls are no-ops. */
export function onceCloser(redis: Redis | null, log: Logger, name: string): () => Promise<void> {
  let closed = false;
  return async () => {
    if (closed || redis === null) return;
    closed = true;
    try {
      await redis.quit();
      log.info({ connection: name }, 'Redis disconnected');
    } catch (err: unknown) {
      log.warn({ err, connection: name }, 'Redis quit failed, forcing disconnect');
      redis.disconnect();
    }
  };
}
