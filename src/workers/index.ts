/**
 * Background Workers Exports
 *
 * Both workers unref their timers so they never hold the process open.
 */

export { createRetentionSweep, DEFAULT_SWEEP_INTERVAL_MS } from './retention-sweep.js';
export type { RetentionSweep, RetentionSweepDeps } from './retention-sweep.js';
export { createCheckInScheduler } from './check-in-scheduler.js';
export type {
  CheckInCallback,
  CheckInScheduler,
  CheckInSchedulerDeps,
} from './check-in-scheduler.js';
