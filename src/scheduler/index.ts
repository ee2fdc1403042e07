export {
  DEFAULT_SCHEDULER_CONFIG,
  executeWithRetry,
  RequestPriority,
  RequestScheduler,
} from "./request-scheduler.ts";
export type {
  RetryOptions,
  ScheduledOperation,
  SchedulerConfig,
  SchedulerStats,
} from "./request-scheduler.ts";
