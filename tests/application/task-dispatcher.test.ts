import { describe, it, expect, vi } from 'vitest';
import { TASK_NAMES, TaskDispatcher } from '../../src/application/index.js';
import type { TaskQueue } from '../../src/application/index.js';
import type { NotificationEvent } from '../../src/domain/index.js';
import { VALID_PAYLOADS, fakeLogger } from '../helpers.js';

const POLICY = { maxAttempts: 4, retryDelayMs: 60_000 };

function makeEvent(overrides: Partial<NotificationEvent> = {}): NotificationEvent {
  return {
    event_id: '1700000000000-0',
    kind: 'account_locked',
    payload: VALID_PAYLOADS.account_locked,
    ...overrides,
  };
}

describe('TaskDispatcher', () => {
  it('maps every kind to its own task name', () => {
    expect(Object.values(TASK_NAMES)).toEqual([
      'send_verification_email',
      'send_account_locked_email',
      'send_account_unlocked_email',
      'send_role_upgrade_email',
      'send_professional_status_upgrade_email',
    ]);
  });

  it('enqueues the event under a task id derived from the entry id', async () => {
    const enqueue = vi.fn().mockResolvedValue('account_locked-1700000000000-0');
    const queue: TaskQueue = { enqueue };
    const dispatcher = new TaskDispatcher(queue, POLICY, fakeLogger());

    const result = await dispatcher.dispatch(makeEvent());

    expect(result._unsafeUnwrap()).toEqual({
      taskId: 'account_locked-1700000000000-0',
      taskName: 'send_account_locked_email',
    });
    expect(enqueue).toHaveBeenCalledWith({
      taskName: 'send_account_locked_email',
      taskId: 'account_locked-1700000000000-0',
      data: { kind: 'account_locked', payload: VALID_PAYLOADS.account_locked, eventId: '1700000000000-0' },
      maxAttempts: 4,
      retryDelayMs: 60_000,
    });
  });

  it('gives a redelivered entry the same task id', () => {
    const event = makeEvent({ kind: 'role_upgrade', event_id: '42-1' });

    expect(TaskDispatcher.taskIdFor(event)).toBe(TaskDispatcher.taskIdFor({ ...event }));
    expect(TaskDispatcher.taskIdFor(event)).toBe('role_upgrade-42-1');
  });

  it('returns ENQUEUE_FAILED when the queue rejects', async () => {
    const queue: TaskQueue = { enqueue: vi.fn().mockRejectedValue(new Error('READONLY')) };
    const log = fakeLogger();
    const dispatcher = new TaskDispatcher(queue, POLICY, log);

    const result = await dispatcher.dispatch(makeEvent());

    expect(result._unsafeUnwrapErr()).toEqual({ type: 'ENQUEUE_FAILED', kind: 'account_locked', message: 'READONLY' });
    expect(log.error).toHaveBeenCalledTimes(1);
  });
});
