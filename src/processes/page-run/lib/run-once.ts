/**
 * Run orchestrator - one full pass: open session, log in, walk pages, close
 */

import type { ContentAnalyzer } from '../../../entities/analysis';
import type { QuotaTracker } from '../../../entities/daily-quota';
import type { StateManager } from '../../../entities/processed-state';
import { createRunReport, formatRunReport, type RunOutcome, type RunReport } from '../../../entities/run-report';
import type { BrowserSession, Credentials, SessionFactory } from '../../../entities/session';
import {
  InfrastructureError,
  errorMessage,
  systemClock,
  type Clock,
  type ErrorReporter,
  type Sleep,
} from '../../../shared/lib';
import { walkPages, type WalkPagesOptions } from './walk-pages';

export interface RunOrchestratorDeps {
  openSession: SessionFactory;
  analyzer: ContentAnalyzer;
  quota: Pick<QuotaTracker, 'tryConsume' | 'remaining'>;
  history: Pick<StateManager, 'isProcessed' | 'recordPost' | 'filterNewItems' | 'loadState'>;
  credentials: Credentials;
  reporter?: ErrorReporter;
  clock?: Clock;
  sleep?: Sleep;
  random?: () => number;
}

export type RunOrchestratorOptions = Omit<WalkPagesOptions, 'signal'>;

/**
 * Create the orchestrator for single runs
 */
export function createRunOrchestrator(deps: RunOrchestratorDeps, options: RunOrchestratorOptions) {
  const { openSession, quota, history, credentials, clock = systemClock } = deps;

  function finish(report: RunReport): RunReport {
    report.finishedAt = clock();
    console.log('[run] Summary');
    for (const line of formatRunReport(report)) {
      console.log(`  ${line}`);
    }
    return report;
  }

  function fatal(report: RunReport, error: unknown): RunOutcome {
    const cause = error instanceof Error ? error : new Error(errorMessage(error));
    console.error(`[run] Fatal: ${cause.message}`);
    return { status: 'fatal_error', report: finish(report), error: cause };
  }

  return {
    /**
     * Execute one run; never throws
     */
    async runOnce(signal?: AbortSignal): Promise<RunOutcome> {
      const report = createRunReport(clock());

      try {
        if ((await quota.remaining('processed')) === 0) {
          console.log('[run] Daily processed quota already reached; not opening the browser');
          report.quotaExhausted = true;
          return { status: 'succeeded', report: finish(report) };
        }

        await history.loadState();
      } catch (error) {
        return fatal(report, error);
      }

      let session: BrowserSession;
      try {
        session = await openSession();
      } catch (error) {
        return fatal(report, error);
      }

      try {
        const login = await session.login(credentials);
        if (!login.ok) {
          return fatal(
            report,
            new InfrastructureError(`Login failed (${login.error.kind}): ${login.error.detail}`)
          );
        }
        console.log('[run] Logged in');

        await walkPages({ ...deps, session }, { ...options, signal }, report);
        return { status: 'succeeded', report: finish(report) };
      } catch (error) {
        return fatal(report, error);
      } finally {
        await session.close().catch((error: unknown) => {
          console.warn('[run] Failed to close browser session:', errorMessage(error));
        });
      }
    },
  };
}

/**
 * Type for the run orchestrator
 */
export type RunOrchestrator = ReturnType<typeof createRunOrchestrator>;
