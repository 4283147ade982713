/**
 * Scheduler Module
 */

export { ScheduleEngine } from "./engine.js";
export { TriggerWheel } from "./trigger-wheel.js";
export { ExecutionGuard } from "./guard.js";
export { GracefulShutdown } from "./shutdown.js";
export type { GracefulShutdownOptions } from "./shutdown.js";
export { SchedulerError } from "./errors.js";
export { calculateNextRun, formatLocalDateTime } from "./next-run.js";
export {
  runWithSchedule,
  DEFAULT_TASK_SCHEDULE,
  DEFAULT_STOCK_NAME_REFRESH_SCHEDULE,
} from "./run-with-schedule.js";
export type { RunWithScheduleOptions, StockNameRefreshOptions } from "./run-with-schedule.js";
export { DEFAULT_POLL_INTERVAL_MS } from "./types.js";
export type {
  Trigger,
  TriggerJob,
  TimerBackend,
  EngineState,
  ScheduledCallback,
  ExecutionOutcome,
  ShutdownSignal,
  ScheduleEngineOptions,
} from "./types.js";
