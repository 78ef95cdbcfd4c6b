import { describe, it, expect, vi } from 'vitest';
import { UnrecoverableError } from 'bullmq';
import { err, ok } from 'neverthrow';
import type { NotificationJobData, FailureReporter } from '../../src/application/index.js';
import {
  RetryableTaskError,
  createNotificationProcessor,
  toNotificationTask,
} from '../../src/infrastructure/queue/index.js';
import type { NotificationJob } from '../../src/infrastructure/queue/index.js';
import { VALID_PAYLOADS, fakeLogger } from '../helpers.js';

const DATA: NotificationJobData = {
  kind: 'email_verification',
  payload: VALID_PAYLOADS.email_verification,
  eventId: '1-0',
};

function makeJob(attemptsMade: number, attempts = 4): NotificationJob {
  return {
    id: 'email_verification-1-0',
    name: 'send_verification_email',
    data: DATA,
    attemptsMade,
    opts: { attempts },
  };
}

function failingExecutor() {
  return {
    execute: vi.fn().mockResolvedValue(err({ status: 'failure', type: 'TRANSPORT', message: 'smtp down' })),
  };
}

function fakeReporter() {
  const report = vi.fn().mockResolvedValue(undefined);
  const reporter: FailureReporter = { report };
  return { reporter, report };
}

describe('toNotificationTask', () => {
  it('uses BullMQ attemptsMade as the 0-based attempt', () => {
    expect(toNotificationTask(makeJob(2), 60_000)).toEqual({
      eventKind: 'email_verification',
      payload: VALID_PAYLOADS.email_verification,
      attempt: 2,
      maxAttempts: 4,
      retryDelayMs: 60_000,
    });
  });
});

describe('notification processor', () => {
  it('returns the executor result on success', async () => {
    const executor = { execute: vi.fn().mockResolvedValue(ok({ status: 'success', message: 'Verification email sent to a@b.com' })) };
    const { reporter, report } = fakeReporter();
    const run = createNotificationProcessor({ executor, reporter, retryDelayMs: 60_000, log: fakeLogger() });

    await expect(run(makeJob(0))).resolves.toEqual({ status: 'success', message: 'Verification email sent to a@b.com' });
    expect(report).not.toHaveBeenCalled();
  });

  it('asks BullMQ for a retry while attempts remain', async () => {
    const { reporter, report } = fakeReporter();
    const log = fakeLogger();
    const run = createNotificationProcessor({ executor: failingExecutor(), reporter, retryDelayMs: 60_000, log });

    const attempt = run(makeJob(1));

    await expect(attempt).rejects.toBeInstanceOf(RetryableTaskError);
    await expect(attempt).rejects.toMatchObject({ message: 'smtp down' });
    expect(report).not.toHaveBeenCalled();
    expect(log.warn).toHaveBeenCalledTimes(1);
  });

  it('fails for good and reports once every attempt has failed', async () => {
    const executor = failingExecutor();
    const { reporter, report } = fakeReporter();
    const log = fakeLogger();
    const run = createNotificationProcessor({ executor, reporter, retryDelayMs: 60_000, log });

    for (const attemptsMade of [0, 1, 2]) {
      await expect(run(makeJob(attemptsMade))).rejects.toBeInstanceOf(RetryableTaskError);
    }
    const last = run(makeJob(3));

    await expect(last).rejects.toBeInstanceOf(UnrecoverableError);
    await expect(last).rejects.toThrow('email_verification failed after 4 attempts: smtp down');
    expect(executor.execute).toHaveBeenCalledTimes(4);
    expect(report).toHaveBeenCalledTimes(1);
    expect(report).toHaveBeenCalledWith(
      {
        eventKind: 'email_verification',
        payload: VALID_PAYLOADS.email_verification,
        attempt: 3,
        maxAttempts: 4,
        retryDelayMs: 60_000,
      },
      'smtp down',
    );
    expect(log.error).toHaveBeenCalledTimes(1);
  });

  it('still fails the job when the dead-letter write fails', async () => {
    const report = vi.fn().mockRejectedValue(new Error('dlq offline'));
    const log = fakeLogger();
    const run = createNotificationProcessor({
      executor: failingExecutor(),
      reporter: { report },
      retryDelayMs: 60_000,
      log,
    });

    await expect(run(makeJob(0, 1))).rejects.toBeInstanceOf(UnrecoverableError);
    expect(log.error).toHaveBeenCalledTimes(2);
  });
});
