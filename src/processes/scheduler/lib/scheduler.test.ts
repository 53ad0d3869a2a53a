import { describe, it, expect, vi } from 'vitest';
import { createStateManager } from '../../../entities/processed-state';
import { createRunReport, type RunOutcome } from '../../../entities/run-report';
import type { ErrorReporter, Sleep } from '../../../shared/lib';
import { createMemoryStore } from '../../../shared/storage';
import { createScheduler, formatStats } from './scheduler';

function succeeded(postsProcessed: number = 0, commentsPosted: number = 0): RunOutcome {
  const report = createRunReport(new Date('2026-03-10T12:00:00.000Z'));
  report.postsProcessed = postsProcessed;
  report.commentsPosted = commentsPosted;
  return { status: 'succeeded', report };
}

function fatal(message: string = 'Login failed (invalid_credentials): rejected'): RunOutcome {
  return { status: 'fatal_error', report: createRunReport(), error: new Error(message) };
}

function setup() {
  const controller = new AbortController();
  const failures = createStateManager({ store: createMemoryStore() });
  const reporter = {
    captureException: vi.fn<ErrorReporter['captureException']>(),
    captureMessage: vi.fn<ErrorReporter['captureMessage']>(),
  };
  const sleep = vi.fn<Sleep>(async () => {});
  const clock = () => new Date('2026-03-10T12:00:00.000Z');
  return { controller, failures, reporter, sleep, clock };
}

describe('createScheduler', () => {
  it('exits 0 after a successful single run', async () => {
    const { controller, failures, sleep, clock } = setup();
    const runOnce = vi.fn(async () => succeeded(3, 1));
    const scheduler = createScheduler(
      { runOnce, failures, sleep, clock },
      { mode: 'single', intervalMinutes: 60, signal: controller.signal }
    );

    expect(await scheduler.start()).toBe(0);
    expect(runOnce).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(scheduler.getStats()).toMatchObject({ totalRuns: 1, successfulRuns: 1, postsProcessed: 3, commentsPosted: 1 });
  });

  it('exits 1 after a fatal single run and counts the failure', async () => {
    const { controller, failures, clock } = setup();
    const scheduler = createScheduler(
      { runOnce: async () => fatal(), failures, clock },
      { mode: 'single', intervalMinutes: 60, signal: controller.signal }
    );

    expect(await scheduler.start()).toBe(1);
    expect((await failures.getState()).consecutiveFailures).toBe(1);
  });

  it('keeps looping after a fatal run and stops on abort', async () => {
    const { controller, failures, sleep, clock } = setup();
    const runOnce = vi
      .fn<(signal: AbortSignal) => Promise<RunOutcome>>()
      .mockResolvedValueOnce(fatal())
      .mockResolvedValueOnce(succeeded(2, 2))
      .mockImplementationOnce(async () => {
        controller.abort();
        return succeeded(1, 0);
      });
    const scheduler = createScheduler(
      { runOnce, failures, sleep, clock },
      { mode: 'scheduled', intervalMinutes: 15, signal: controller.signal }
    );

    expect(await scheduler.start()).toBe(0);
    expect(runOnce).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(900_000, controller.signal);
    expect(scheduler.getStats()).toEqual({
      totalRuns: 3,
      successfulRuns: 2,
      failedRuns: 1,
      postsProcessed: 3,
      commentsPosted: 2,
      lastRunAt: new Date('2026-03-10T12:00:00.000Z'),
      nextRunAt: null,
    });
    expect((await failures.getState()).consecutiveFailures).toBe(0);
  });

  it('reports only once the consecutive failure threshold is reached', async () => {
    const { controller, failures, reporter, sleep, clock } = setup();
    let calls = 0;
    const runOnce = async () => {
      calls++;
      if (calls === 3) {
        controller.abort();
      }
      return fatal('browser disconnected');
    };
    const scheduler = createScheduler(
      { runOnce, failures, reporter, sleep, clock },
      { mode: 'scheduled', intervalMinutes: 1, signal: controller.signal }
    );

    await scheduler.start();

    expect(reporter.captureException).toHaveBeenCalledTimes(1);
    expect(reporter.captureException).toHaveBeenCalledWith(new Error('browser disconnected'), {
      tags: { source: 'run' },
      extra: { consecutiveFailures: 3 },
    });
  });

  it('skips a run requested while one is active', async () => {
    const { controller, failures, clock } = setup();
    let finish: (outcome: RunOutcome) => void = () => {};
    const runOnce = vi.fn(
      () =>
        new Promise<RunOutcome>((resolve) => {
          finish = resolve;
        })
    );
    const scheduler = createScheduler(
      { runOnce, failures, clock },
      { mode: 'scheduled', intervalMinutes: 60, signal: controller.signal }
    );

    const first = scheduler.triggerRun();
    const second = await scheduler.triggerRun();
    finish(succeeded());

    expect(second).toBeNull();
    expect((await first)?.status).toBe('succeeded');
    expect(runOnce).toHaveBeenCalledTimes(1);
  });

  it('treats a thrown run as fatal', async () => {
    const { controller, failures, clock } = setup();
    const scheduler = createScheduler(
      {
        runOnce: async () => {
          throw new Error('unexpected');
        },
        failures,
        clock,
      },
      { mode: 'single', intervalMinutes: 60, signal: controller.signal }
    );

    expect(await scheduler.start()).toBe(1);
    expect(scheduler.getStats().failedRuns).toBe(1);
  });
});

describe('formatStats', () => {
  it('prints the totals and run times', () => {
    expect(
      formatStats({
        totalRuns: 4,
        successfulRuns: 3,
        failedRuns: 1,
        postsProcessed: 12,
        commentsPosted: 5,
        lastRunAt: new Date('2026-03-10T12:00:00.000Z'),
        nextRunAt: null,
      })
    ).toEqual([
      'Runs: 4 (successful: 3, failed: 1)',
      'Posts processed: 12, comments posted: 5',
      'Last run: 2026-03-10T12:00:00.000Z',
      'Next run: none',
    ]);
  });
});
