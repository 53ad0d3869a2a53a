/**
 * Scheduler process - public API
 */
export {
  createScheduler,
  ALERT_FAILURE_THRESHOLD,
  type Scheduler,
  type SchedulerStats,
  type RunMode,
} from './lib';
