import type { EventKind, EventPayload } from '../domain/index.js';

export interface CapturedEvent {
  readonly kind: EventKind;
  readonly payload: Readonly<EventPayload>;
}

/**
 * Ordered in-memory log of events that skipped the broker.
 *
 * Used in capture mode and by tests. Entries are snapshots taken at append
 * time, so later changes to the caller's object do not leak in. Nothing is
 * persisted and nothing is evicted: clear it between test runs.
 */
export class CaptureBuffer {
  private readonly entries: CapturedEvent[] = [];

  /** Throws if the payload cannot be cloned. */
  append(kind: EventKind, payload: EventPayload): void {
    const snapshot = Object.freeze(structuredClone(payload));
    this.entries.push(Object.freeze({ kind, payload: snapshot }));
  }

  /** All entries in append order. */
  all(): readonly CapturedEvent[] {
    return [...this.entries];
  }

  last(): CapturedEvent | undefined {
    return this.entries.at(-1);
  }

  clear(): void {
    this.entries.length = 0;
  }

  get size(): number {
    return this.entries.length;
  }
}
