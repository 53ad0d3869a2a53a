/**
 * Page Commenter
 *
 * Logs in to the platform, walks the configured pages, asks an LLM whether
 * each new post's headline matches its article, and comments when it has
 * something to add. Runs once or on a fixed interval.
 */

import 'dotenv/config';
import { createQuotaTracker } from '../entities/daily-quota';
import { createStateManager } from '../entities/processed-state';
import { createAnalyzerClient, loadPromptTemplates, type PromptTemplates } from '../features/content-analyzer';
import { createPlaywrightSessionFactory } from '../features/browser-session';
import { createRunOrchestrator } from '../processes/page-run';
import { createScheduler } from '../processes/scheduler';
import { errorMessage } from '../shared/lib';
import { createFileStore } from '../shared/storage';
import { loadConfig, startupExitCode, type Config } from './config';
import { createAppReporter } from './reporter';

/**
 * Wire the collaborators and run until done; resolves with the exit code
 */
async function main(): Promise<number> {
  let config: Readonly<Config>;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(`[app] ${errorMessage(error)}`);
    return startupExitCode();
  }

  const reporter = createAppReporter(config.sentryDsn);

  let prompts: PromptTemplates;
  try {
    prompts = await loadPromptTemplates(config.llm.promptsFile);
  } catch (error) {
    console.error(`[app] ${errorMessage(error)}`);
    reporter.captureException(error, { tags: { source: 'startup' } });
    await reporter.flush();
    return startupExitCode();
  }

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      console.warn(`[app] Received ${signal} again; exiting immediately`);
      process.exit(130);
    }
    console.log(`[app] Received ${signal}; stopping after the current post`);
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const store = createFileStore({ dir: config.dataDir });
  const history = createStateManager({ store, maxRecords: config.postHistoryLimit });
  const quota = createQuotaTracker({ store, limits: config.limits });

  const orchestrator = createRunOrchestrator(
    {
      openSession: createPlaywrightSessionFactory(config.browser),
      analyzer: createAnalyzerClient({ ...config.llm, prompts }),
      quota,
      history,
      credentials: config.credentials,
      reporter,
    },
    {
      pages: config.pages,
      maxPostsPerPage: config.maxPostsPerPage,
      enableComments: config.enableComments,
      postDelaySeconds: config.postDelaySeconds,
      pageDelaySeconds: config.pageDelaySeconds,
    }
  );

  const scheduler = createScheduler(
    {
      runOnce: (signal) => orchestrator.runOnce(signal),
      failures: history,
      reporter,
    },
    {
      mode: config.runMode,
      intervalMinutes: config.runIntervalMinutes,
      signal: controller.signal,
    }
  );

  console.log(
    `[app] Starting in ${config.runMode} mode for ${config.pages.length} pages (comments ${config.enableComments ? 'on' : 'off'})`
  );

  try {
    return await scheduler.start();
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await reporter.flush();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[app] Unhandled error:', error);
    process.exitCode = 1;
  }
);
