/**
 * Scheduler library exports
 */
export {
  createScheduler,
  formatStats,
  ALERT_FAILURE_THRESHOLD,
  type Scheduler,
  type SchedulerDeps,
  type SchedulerOptions,
  type SchedulerStats,
  type RunMode,
} from './scheduler';
