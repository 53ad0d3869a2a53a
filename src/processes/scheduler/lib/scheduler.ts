/**
 * Scheduler - runs the orchestrator once or on a fixed interval
 *
 * A fatal run never ends scheduled mode. Consecutive fatal runs are counted
 * in the persisted state and reported once they reach the alert threshold.
 */

import type { StateManager } from '../../../entities/processed-state';
import { createRunReport, type RunOutcome } from '../../../entities/run-report';
import {
  errorMessage,
  noopReporter,
  sleep as defaultSleep,
  systemClock,
  type Clock,
  type ErrorReporter,
  type Sleep,
} from '../../../shared/lib';

/** Number of consecutive failures before alerting */
export const ALERT_FAILURE_THRESHOLD = 3;

export type RunMode = 'single' | 'scheduled';

/**
 * Totals across every run since the process started
 */
export interface SchedulerStats {
  totalRuns: number;
  successfulRuns: number;
  failedRuns: number;
  postsProcessed: number;
  commentsPosted: number;
  lastRunAt: Date | null;
  nextRunAt: Date | null;
}

export interface SchedulerDeps {
  runOnce: (signal: AbortSignal) => Promise<RunOutcome>;
  failures: Pick<StateManager, 'recordFailure' | 'resetFailures'>;
  reporter?: ErrorReporter;
  sleep?: Sleep;
  clock?: Clock;
}

export interface SchedulerOptions {
  mode: RunMode;
  intervalMinutes: number;
  signal: AbortSignal;
}

/**
 * Summary lines for the cumulative statistics
 */
export function formatStats(stats: SchedulerStats): string[] {
  return [
    `Runs: ${stats.totalRuns} (successful: ${stats.successfulRuns}, failed: ${stats.failedRuns})`,
    `Posts processed: ${stats.postsProcessed}, comments posted: ${stats.commentsPosted}`,
    `Last run: ${stats.lastRunAt ? stats.lastRunAt.toISOString() : 'never'}`,
    `Next run: ${stats.nextRunAt ? stats.nextRunAt.toISOString() : 'none'}`,
  ];
}

/**
 * Create a scheduler
 */
export function createScheduler(deps: SchedulerDeps, options: SchedulerOptions) {
  const { runOnce, failures, reporter = noopReporter, sleep = defaultSleep, clock = systemClock } = deps;
  const { mode, intervalMinutes, signal } = options;

  const stats: SchedulerStats = {
    totalRuns: 0,
    successfulRuns: 0,
    failedRuns: 0,
    postsProcessed: 0,
    commentsPosted: 0,
    lastRunAt: null,
    nextRunAt: null,
  };

  let running = false;

  async function execute(): Promise<RunOutcome> {
    const startedAt = clock();
    console.log(`[scheduler] Run #${stats.totalRuns + 1} started at ${startedAt.toISOString()}`);

    let outcome: RunOutcome;
    try {
      outcome = await runOnce(signal);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(errorMessage(error));
      outcome = { status: 'fatal_error', report: createRunReport(startedAt), error: cause };
    }

    stats.totalRuns++;
    stats.lastRunAt = startedAt;
    stats.postsProcessed += outcome.report.postsProcessed;
    stats.commentsPosted += outcome.report.commentsPosted;

    try {
      if (outcome.status === 'succeeded') {
        stats.successfulRuns++;
        await failures.resetFailures();
      } else {
        stats.failedRuns++;
        const failureCount = await failures.recordFailure();
        console.error(
          `[scheduler] FATAL: run failed (${failureCount} consecutive): ${outcome.error.message}`
        );

        // Report to Sentry if we've hit the threshold
        if (failureCount >= ALERT_FAILURE_THRESHOLD) {
          reporter.captureException(outcome.error, {
            tags: { source: 'run' },
            extra: { consecutiveFailures: failureCount },
          });
        }
      }
    } catch (error) {
      console.error('[scheduler] Could not update the failure count:', errorMessage(error));
      reporter.captureException(error, { tags: { source: 'state' } });
    }

    return outcome;
  }

  function logStats(): void {
    console.log('[scheduler] Statistics');
    for (const line of formatStats(stats)) {
      console.log(`  ${line}`);
    }
  }

  return {
    /**
     * Run now unless a run is already active
     *
     * Returns null when the request was skipped.
     */
    async triggerRun(): Promise<RunOutcome | null> {
      if (running) {
        console.warn('[scheduler] A run is already in progress; skipping this one');
        return null;
      }

      running = true;
      try {
        return await execute();
      } finally {
        running = false;
      }
    },

    /**
     * Copy of the cumulative statistics
     */
    getStats(): SchedulerStats {
      return { ...stats };
    },

    /**
     * Run according to the mode and resolve with the process exit code
     */
    async start(): Promise<number> {
      if (mode === 'single') {
        const outcome = await this.triggerRun();
        logStats();
        return outcome?.status === 'succeeded' ? 0 : 1;
      }

      console.log(`[scheduler] Scheduled mode: one run every ${intervalMinutes} minutes`);
      const intervalMs = intervalMinutes * 60_000;

      while (!signal.aborted) {
        await this.triggerRun();

        stats.nextRunAt = signal.aborted ? null : new Date(clock().getTime() + intervalMs);
        logStats();

        if (signal.aborted) {
          break;
        }
        await sleep(intervalMs, signal);
      }

      console.log('[scheduler] Shutdown requested; stopped');
      return 0;
    },
  };
}

/**
 * Type for the scheduler
 */
export type Scheduler = ReturnType<typeof createScheduler>;
