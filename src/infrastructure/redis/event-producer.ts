import { ok, err, type Result } from 'neverthrow';
import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { topicFor } from '../../domain/index.js';
import type { EventKind, EventPayload, EventPayloadMap } from '../../domain/index.js';
import { describeError, validatePayload } from '../../application/index.js';
import type { EventSink, PublishError, PublishReceipt } from '../../application/index.js';

export const DEFAULT_ACK_TIMEOUT_MS = 10_000;

/** The broker commands the sink issues. */
export type StreamWriter = Pick<Redis, 'xadd' | 'wait'>;

export interface StreamSinkOptions {
  /** Upper bound for XADD (+ WAIT) before the publish counts as failed. */
  ackTimeoutMs?: number;
  /** Replicas that must confirm the write via WAIT. 0 skips the WAIT. */
  minReplicas?: number;
  now?: () => Date;
}

class AckTimeoutError extends Error {
  constructor(ms: number) {
    super(`Broker did not acknowledge within ${ms}ms`);
    this.name = 'AckTimeoutError';
  }
}

class ReplicationError extends Error {
  constructor(acked: number, required: number) {
    super(`Only ${acked} of ${required} replicas acknowledged the write`);
    this.name = 'ReplicationError';
  }
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new AckTimeoutError(ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Publishes events to Redis Streams, one stream per event kind.
 *
 * Each entry holds the kind and the JSON payload; the payload gets a
 * server-side `timestamp` (ISO-8601, UTC) on a copy, never on the
 * caller's object. With `minReplicas > 0` the write only counts once that
 * many replicas confirmed it.
 *
 * Delivery is at-least-once. A TIMEOUT abandons the XADD without
 * cancelling it: the entry can still land after the caller has given up,
 * so a late entry and the caller's direct-send fallback may both deliver
 * the same email.
 *
 * A sink built without a connection answers every publish with
 * BROKER_UNAVAILABLE.
 */
export class RedisStreamEventSink implements EventSink {
  private readonly ackTimeoutMs: number;
  private readonly minReplicas: number;
  private readonly now: () => Date;

  constructor(
    private readonly redis: StreamWriter | null,
    private readonly log: Logger,
    options: StreamSinkOptions = {},
  ) {
    this.ackTimeoutMs = options.ackTimeoutMs ?? DEFAULT_ACK_TIMEOUT_MS;
    this.minReplicas = options.minReplicas ?? 0;
    this.now = options.now ?? (() => new Date());
  }

  async publish<K extends EventKind>(
    kind: K,
    payload: EventPayloadMap[K],
  ): Promise<Result<PublishReceipt, PublishError>> {
    const stream = topicFor(kind);

    if (this.redis === null) {
      this.log.error({ kind, payload }, 'Cannot publish event: broker connection not initialized');
      return err({ type: 'BROKER_UNAVAILABLE', kind, message: 'Broker connection not initialized' });
    }

    const issues = validatePayload(kind, payload);
    if (issues.length > 0) {
      this.log.error({ kind, payload, issues }, 'Refusing to publish invalid payload');
      return err({ type: 'INVALID_PAYLOAD', kind, message: issues.join('; ') });
    }

    const published: EventPayload = { ...payload, timestamp: this.now().toISOString() };

    let body: string;
    try {
      body = JSON.stringify(published);
    } catch (error: unknown) {
      this.log.error({ err: error, kind, payload }, 'Failed to serialize event payload');
      return err({ type: 'SERIALIZATION', kind, message: describeError(error) });
    }

    try {
      const entryId = await withTimeout(this.append(this.redis, stream, kind, body), this.ackTimeoutMs);
      this.log.info({ kind, stream, entryId }, 'Event published');
      return ok({ kind, route: 'broker', payload: published, entryId });
    } catch (error: unknown) {
      const type = error instanceof AckTimeoutError
        ? 'TIMEOUT'
        : error instanceof ReplicationError ? 'REPLICATION' : 'BROKER_ERROR';
      this.log.error({ err: error, kind, stream, payload: published }, 'Failed to publish event');
      return err({ type, kind, message: describeError(error) });
    }
  }

  private async append(redis: StreamWriter, stream: string, kind: EventKind, body: string): Promise<string> {
    const entryId = await redis.xadd(stream, '*', 'kind', kind, 'payload', body);
    if (entryId === null) {
      throw new Error(`XADD to ${stream} returned no entry id`);
    }

    if (this.minReplicas > 0) {
      const acked = await redis.wait(this.minReplicas, this.ackTimeoutMs);
      if (acked < this.minReplicas) {
        throw new ReplicationError(acked, this.minReplicas);
      }
    }

    return entryId;
  }
}
