import { z } from 'zod';
import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { EVENT_KINDS, topicFor } from '../../domain/index.js';
import type { NotificationEvent } from '../../domain/index.js';
import { inboundEventSchema } from '../../application/index.js';
import type { TaskDispatcher } from '../../application/index.js';

export const GROUP_NAME = 'notification_dispatchers';
export const STREAM_KEYS: readonly string[] = EVENT_KINDS.map(topicFor);

// How long to block waiting for new messages (ms)
const BLOCK_MS = 5000;
// Max messages to read per stream per iteration
const BATCH_SIZE = 50;
// Minimum gap between pending-list rescans after a failed dispatch (ms)
const PENDING_RETRY_MS = 5000;

/**
 * XREADGROUP reply: [[stream, [[id, fields | null], …]], …].
 * Fields are null for pending entries whose stream entry was trimmed.
 */
const streamReplySchema = z
  .array(z.tuple([z.string(), z.array(z.tuple([z.string(), z.array(z.string()).nullable()]))]))
  .nullable();

export type StreamRead = z.infer<typeof streamReplySchema>;

export type StreamClient = Pick<Redis, 'xgroup' | 'xreadgroup' | 'xack'>;

export interface ConsumerOptions {
  consumerName: string;
  blockMs?: number;
  batchSize?: number;
  pendingRetryMs?: number;
}

/** Entries acknowledged vs. left pending by one pass. */
export interface BatchResult {
  handled: number;
  failed: number;
}

export interface ConsumerDeps {
  redis: StreamClient;
  dispatcher: Pick<TaskDispatcher, 'dispatch'>;
  log: Logger;
  consumerName: string;
  blockMs: number;
  batchSize: number;
  pendingRetryMs: number;
}

/**
 * Ensures the consumer group exists on every event stream.
 *
 * Start ID "0": the streams only carry notification events, so a first
 * boot picks up whatever producers published before any worker existed.
 * Uses MKSTREAM so the stream is created if it doesn't exist yet.
 * Ignores BUSYGROUP errors (group already exists).
 */
export async function ensureConsumerGroups(redis: StreamClient, log: Logger): Promise<void> {
  for (const stream of STREAM_KEYS) {
    try {
      await redis.xgroup('CREATE', stream, GROUP_NAME, '0', 'MKSTREAM');
      log.info({ group: GROUP_NAME, stream }, 'Consumer group created');
    } catch (err: unknown) {
      if (err instanceof Error && err.message.includes('BUSYGROUP')) {
        log.debug({ group: GROUP_NAME, stream }, 'Consumer group already exists');
        continue;
      }
      throw err;
    }
  }
}

/**
 * Parses a raw stream entry into a notification event.
 * Returns null when the entry does not hold a valid event.
 */
export function parseStreamEntry(entryId: string, fields: readonly string[]): NotificationEvent | null {
  const map = new Map<string, string>();
  for (let i = 0; i + 1 < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      map.set(key, value);
    }
  }

  let payload: unknown;
  try {
    payload = JSON.parse(map.get('payload') ?? 'null');
  } catch {
    return null;
  }

  const parsed = inboundEventSchema.safeParse({ kind: map.get('kind'), payload });
  if (!parsed.success) return null;

  return { event_id: entryId, kind: parsed.data.kind, payload: parsed.data.payload };
}

/**
 * Dispatcher loop.
 *
 * 1. XREADGROUP with BLOCK across all event streams.
 * 2. For each entry: parse → dispatch (enqueue executor task) → XACK.
 *
 * Never ACK before the task is enqueued: on enqueue failure the entry
 * stays pending, and the loop rescans this consumer's pending list (at
 * most once per `pendingRetryMs`) until every entry is dispatched
 * (at-least-once). Entries that do not parse are acknowledged and logged;
 * redelivering them cannot help.
 *
 * The loop runs until `signal` is aborted.
 */
export async function startStreamConsumer(
  redis: StreamClient,
  dispatcher: Pick<TaskDispatcher, 'dispatch'>,
  log: Logger,
  signal: AbortSignal,
  options: ConsumerOptions,
): Promise<void> {
  const deps: ConsumerDeps = {
    redis,
    dispatcher,
    log,
    consumerName: options.consumerName,
    blockMs: options.blockMs ?? BLOCK_MS,
    batchSize: options.batchSize ?? BATCH_SIZE,
    pendingRetryMs: options.pendingRetryMs ?? PENDING_RETRY_MS,
  };

  await ensureConsumerGroups(redis, log);

  log.info({ consumer: deps.consumerName, group: GROUP_NAME, streams: STREAM_KEYS }, 'Dispatcher started');

  // First, recover entries this consumer read but never acknowledged
  let pendingDue = (await processPending(deps)).failed > 0;
  let lastPendingScan = Date.now();

  while (!signal.aborted) {
    try {
      if (pendingDue && Date.now() - lastPendingScan >= deps.pendingRetryMs) {
        lastPendingScan = Date.now();
        pendingDue = (await processPending(deps)).failed > 0;
        if (signal.aborted) break;
      }

      const response = await readGroup(deps, STREAM_KEYS.map(() => '>'), true);
      if ((await processResponse(deps, response)).failed > 0) {
        pendingDue = true;
      }
    } catch (err: unknown) {
      if (signal.aborted) break;
      log.error({ err }, 'Dispatcher loop error, retrying in 1s');
      await sleep(1000);
    }
  }

  log.info('Dispatcher stopped');
}

async function readGroup(deps: ConsumerDeps, ids: readonly string[], block: boolean): Promise<StreamRead> {
  const reply: unknown = block
    ? await deps.redis.xreadgroup(
        'GROUP', GROUP_NAME, deps.consumerName,
        'COUNT', deps.batchSize,
        'BLOCK', deps.blockMs,
        'STREAMS', ...STREAM_KEYS, ...ids,
      )
    : await deps.redis.xreadgroup(
        'GROUP', GROUP_NAME, deps.consumerName,
        'COUNT', deps.batchSize,
        'STREAMS', ...STREAM_KEYS, ...ids,
      );
  return streamReplySchema.parse(reply);
}

/**
 * Processes pending (delivered but unacknowledged) entries of this
 * consumer, e.g. after a crash between dispatch and XACK or a failed
 * enqueue. Pages through the whole pending list, one cursor per stream.
 */
export async function processPending(deps: ConsumerDeps): Promise<BatchResult> {
  deps.log.info('Checking for pending entries...');
  const cursors = new Map<string, string>(STREAM_KEYS.map((stream) => [stream, '0']));
  const total: BatchResult = { handled: 0, failed: 0 };

  for (;;) {
    const response = await readGroup(deps, STREAM_KEYS.map((stream) => cursors.get(stream) ?? '0'), false);
    if (response === null) break;

    let seen = 0;
    for (const [stream, entries] of response) {
      const last = entries.at(-1);
      if (last !== undefined) cursors.set(stream, last[0]);
      seen += entries.length;
    }
    if (seen === 0) break;

    const page = await processResponse(deps, response);
    total.handled += page.handled;
    total.failed += page.failed;
  }

  if (total.handled > 0 || total.failed > 0) {
    deps.log.info(total, 'Recovered pending entries');
  }
  return total;
}

async function processResponse(deps: ConsumerDeps, response: StreamRead): Promise<BatchResult> {
  const result: BatchResult = { handled: 0, failed: 0 };
  if (response === null) return result;

  for (const [stream, entries] of response) {
    for (const [entryId, fields] of entries) {
      if (fields === null) {
        // Entry trimmed from the stream while pending: nothing to deliver
        await deps.redis.xack(stream, GROUP_NAME, entryId);
        continue;
      }
      if (await processEntry(deps, stream, entryId, fields)) {
        result.handled++;
      } else {
        result.failed++;
      }
    }
  }
  return result;
}

/**
 * Handles one stream entry: parse → dispatch → ACK.
 * Returns false on dispatch failure: no XACK, the entry stays pending
 * until the next pending-list rescan.
 */
export async function processEntry(
  deps: ConsumerDeps,
  stream: string,
  entryId: string,
  fields: readonly string[],
): Promise<boolean> {
  const event = parseStreamEntry(entryId, fields);

  if (event === null) {
    deps.log.warn({ stream, entryId, fields }, 'Malformed notification event, acknowledging without dispatch');
    await deps.redis.xack(stream, GROUP_NAME, entryId);
    return true;
  }

  const dispatched = await deps.dispatcher.dispatch(event);
  if (dispatched.isErr()) {
    deps.log.error({ stream, entryId, error: dispatched.error }, 'Dispatch failed, entry left pending');
    return false;
  }

  await deps.redis.xack(stream, GROUP_NAME, entryId);
  deps.log.debug({ stream, entryId, taskId: dispatched.value.taskId }, 'Event dispatched and acknowledged');
  return true;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
