import { ok, err, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import type { EventKind, EventPayload, EventPayloadMap } from '../domain/index.js';
import type { AvailabilityGate } from './availability-gate.js';
import type { CaptureBuffer } from './capture-buffer.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type PublishRoute = 'broker' | 'capture';

export interface PublishReceipt {
  kind: EventKind;
  route: PublishRoute;
  /** Payload as it left the sink (broker route adds `timestamp`). */
  payload: EventPayload;
  /** Broker entry id, broker route only. */
  entryId?: string;
}

export type PublishErrorType =
  | 'BROKER_UNAVAILABLE'
  | 'INVALID_PAYLOAD'
  | 'SERIALIZATION'
  | 'TIMEOUT'
  | 'REPLICATION'
  | 'BROKER_ERROR'
  | 'CAPTURE_FAILED';

export interface PublishError {
  type: PublishErrorType;
  kind: EventKind;
  message: string;
}

/**
 * Destination for domain events.
 *
 * `publish` never rejects: every failure comes back as a `PublishError`
 * and the caller picks the fallback.
 */
export interface EventSink {
  publish<K extends EventKind>(
    kind: K,
    payload: EventPayloadMap[K],
  ): Promise<Result<PublishReceipt, PublishError>>;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ─────────────────────────────────────────────────────────────────────────────
// Capture sink
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Records events in a {@link CaptureBuffer} instead of sending them.
 *
 * Captured payloads are stored exactly as given: no `timestamp` is added,
 * unlike the broker route. Tests asserting on captured events should not
 * expect one.
 */
export class CaptureEventSink implements EventSink {
  constructor(
    private readonly buffer: CaptureBuffer,
    private readonly log: Logger,
  ) {}

  async publish<K extends EventKind>(
    kind: K,
    payload: EventPayloadMap[K],
  ): Promise<Result<PublishReceipt, PublishError>> {
    try {
      this.buffer.append(kind, payload);
      this.log.debug({ kind, payload }, 'Event captured (broker bypassed)');
      return ok({ kind, route: 'capture', payload: { ...payload } });
    } catch (error: unknown) {
      this.log.error({ err: error, kind, payload }, 'Failed to capture event');
      return err({ type: 'CAPTURE_FAILED', kind, message: describeError(error) });
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Gated sink
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Routes each publish to the broker sink or the capture sink depending on
 * the availability gate at the time of the call. While bypass is active
 * the broker sink is never touched.
 */
export class GatedEventSink implements EventSink {
  constructor(
    private readonly gate: AvailabilityGate,
    private readonly broker: EventSink,
    private readonly capture: EventSink,
  ) {}

  publish<K extends EventKind>(
    kind: K,
    payload: EventPayloadMap[K],
  ): Promise<Result<PublishReceipt, PublishError>> {
    const target = this.gate.isBypassActive() ? this.capture : this.broker;
    return target.publish(kind, payload);
  }
}
