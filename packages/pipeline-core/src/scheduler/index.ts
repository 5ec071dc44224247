export { AnnotationScheduler, defaultPromptContext } from './scheduler.js';
export type {
  AnnotationCapability,
  AnnotationRequest,
  JobOutcome,
  SchedulerCounts,
  SchedulerOptions,
  SchedulerReport,
  SchedulerRunOptions,
} from './scheduler.js';
export { AnnotationJob } from './job.js';
export {
  DEFAULT_RETRY_POLICY,
  computeBackoffDelay,
  createRetryPolicy,
  runWithRetry,
  sleep,
} from './retry.js';
export type { RetryOptions, RetryOutcome, RetryPolicy, Sleep } from './retry.js';
export { runPool } from './worker-pool.js';
export type { PoolOptions, PoolResult } from './worker-pool.js';
export { linkSignals } from './signals.js';
