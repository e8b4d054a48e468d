/**
 * @module FollowUpJob.test
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { FollowUpJob, type FollowUpRunOptions } from '@/domains/followups';
import { createAbortError } from '@/shared/utils/retry';
import { createTestLogger } from '../../../helpers/mockPinoFactory';

type Run = (now?: Date, options?: FollowUpRunOptions) => Promise<number>;

const MINUTE = 60_000;

describe('FollowUpJob', () => {
  let run: Mock<Run>;
  let logger: ReturnType<typeof createTestLogger>;
  let job: FollowUpJob | null;

  const createJob = (runOnStart: boolean) => {
    job = new FollowUpJob({ run }, { intervalMs: MINUTE, runOnStart }, {
      logger: logger.testLogger,
      now: () => new Date('2026-10-19T08:00:00Z'),
    });
    return job;
  };

  beforeEach(() => {
    run = vi.fn<Run>(async () => 0);
    logger = createTestLogger();
    job = null;
  });

  afterEach(async () => {
    await job?.stop();
    vi.useRealTimers();
  });

  it('rejects a non-positive interval', () => {
    expect(() => new FollowUpJob({ run }, { intervalMs: 0 })).toThrow('Follow-up interval must be positive, got 0ms');
  });

  it('runs once on start with the current time', async () => {
    const started = createJob(true);

    started.start();
    await started.tick();

    expect(started.isRunning).toBe(true);
    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0]?.[0]).toEqual(new Date('2026-10-19T08:00:00Z'));
  });

  it('runs on every interval', async () => {
    vi.useFakeTimers();
    const scheduled = createJob(false);

    scheduled.start();
    expect(run).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(run).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('skips a tick while a run is in progress', async () => {
    let finish: (created: number) => void = () => undefined;
    run.mockImplementationOnce(
      () =>
        new Promise<number>((resolve) => {
          finish = resolve;
        })
    );
    const overlapping = createJob(true);

    overlapping.start();
    const skipped = overlapping.tick();

    expect(overlapping.isProcessing).toBe(true);
    expect(run).toHaveBeenCalledTimes(1);

    finish(3);
    await skipped;
    expect(overlapping.isProcessing).toBe(false);
    expect(logger.logs.find((l) => l.msg === 'Follow-up run finished')).toMatchObject({ created: 3 });
  });

  it('cancels the current run on stop and waits for it', async () => {
    run.mockImplementationOnce(
      (_now, options) =>
        new Promise<number>((_resolve, reject) => {
          options?.signal?.addEventListener('abort', () => reject(createAbortError()));
        })
    );
    const stopping = createJob(true);

    stopping.start();
    await stopping.stop();

    expect(stopping.isRunning).toBe(false);
    expect(stopping.isProcessing).toBe(false);
    expect(logger.hasLogWithMessage('Follow-up run cancelled')).toBe(true);
  });

  it('logs a failed run and keeps the schedule', async () => {
    run.mockRejectedValueOnce(new Error('database unavailable'));
    const failing = createJob(true);

    failing.start();
    await failing.tick();

    expect(failing.isRunning).toBe(true);
    expect(logger.getLogsByLevel('error')[0]).toMatchObject({ msg: 'Follow-up run failed' });
  });
});
