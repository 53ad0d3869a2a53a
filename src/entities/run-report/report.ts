/**
 * Run report construction and formatting
 */

import type { RunError, RunReport } from './types';

/**
 * Create an empty report for a run starting now
 */
export function createRunReport(startedAt: Date = new Date()): RunReport {
  return {
    startedAt,
    finishedAt: null,
    pagesVisited: 0,
    postsProcessed: 0,
    commentsPosted: 0,
    postsSkipped: 0,
    postsFailed: 0,
    duplicatesSkipped: 0,
    quotaExhausted: false,
    interrupted: false,
    errors: [],
  };
}

/**
 * Append an error to the report and log it with its context
 */
export function recordRunError(report: RunReport, error: RunError): void {
  report.errors.push(error);
  const subject = error.postId ? `post ${error.postId}` : 'page';
  console.error(`[run] ✗ ${subject} on ${error.pageSlug} failed at ${error.stage}: ${error.reason}`);
}

/**
 * Summary lines for logging
 */
export function formatRunReport(report: RunReport): string[] {
  const finishedAt = report.finishedAt ?? new Date();
  const seconds = ((finishedAt.getTime() - report.startedAt.getTime()) / 1000).toFixed(1);

  const lines = [
    `Pages visited: ${report.pagesVisited}`,
    `Posts processed: ${report.postsProcessed} (commented: ${report.commentsPosted}, skipped: ${report.postsSkipped}, failed: ${report.postsFailed})`,
    `Already processed: ${report.duplicatesSkipped}`,
    `Duration: ${seconds}s`,
  ];

  if (report.quotaExhausted) {
    lines.push('Stopped early: daily processed quota reached');
  }
  if (report.interrupted) {
    lines.push('Stopped early: shutdown requested');
  }
  if (report.errors.length > 0) {
    lines.push(`Errors (${report.errors.length}):`);
    for (const error of report.errors) {
      lines.push(`  - [${error.pageSlug}] ${error.postId ?? '-'} @ ${error.stage}: ${error.reason}`);
    }
  }

  return lines;
}
