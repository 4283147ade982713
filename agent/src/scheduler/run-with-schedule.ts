/**
 * One-call entry point: schedule a task (and optionally the stock-name cache
 * refresh) and block until shutdown.
 */

import type { ILogger } from "@tickwatch/shared/logging";
import { createComponentLogger } from "../logging.js";
import type { ScheduleSpecInput } from "../schedule/types.js";
import type { StockNameService } from "../stock-names/service.js";
import { createStockNameRefreshTask } from "../stock-names/refresh-task.js";
import { ScheduleEngine } from "./engine.js";
import { GracefulShutdown } from "./shutdown.js";
import type { ScheduledCallback, ShutdownSignal } from "./types.js";

export const DEFAULT_TASK_SCHEDULE = "18:00";
export const DEFAULT_STOCK_NAME_REFRESH_SCHEDULE = "09:00";

export interface StockNameRefreshOptions {
  service: StockNameService;
  /** default: "09:00" daily */
  schedule?: ScheduleSpecInput;
}

export interface RunWithScheduleOptions {
  /** default: "18:00" daily */
  schedule?: ScheduleSpecInput;
  /** Run the task once before waiting for the first trigger (default: true) */
  runImmediately?: boolean;
  pollIntervalMs?: number;
  /**
   * Stop flag for every loop. When omitted, a GracefulShutdown bound to
   * SIGINT/SIGTERM is installed for the duration of the call.
   */
  shutdown?: ShutdownSignal;
  stockNameRefresh?: StockNameRefreshOptions;
  logger?: ILogger;
}

/**
 * Resolves once every loop has stopped. Throws ScheduleSpecError before
 * anything runs if a schedule is malformed.
 */
export async function runWithSchedule(task: ScheduledCallback, options: RunWithScheduleOptions = {}): Promise<void> {
  const log = options.logger ?? createComponentLogger("scheduler");
  let owned: GracefulShutdown | null = null;
  let shutdown: ShutdownSignal;
  if (options.shutdown) {
    shutdown = options.shutdown;
  } else {
    owned = new GracefulShutdown({ logger: log }).install();
    shutdown = owned;
  }

  try {
    const engine = new ScheduleEngine(options.schedule ?? DEFAULT_TASK_SCHEDULE, {
      name: "task",
      pollIntervalMs: options.pollIntervalMs,
      shutdown,
      logger: log,
    });

    let refreshEngine: ScheduleEngine | null = null;
    if (options.stockNameRefresh) {
      const { service, schedule } = options.stockNameRefresh;
      refreshEngine = new ScheduleEngine(schedule ?? DEFAULT_STOCK_NAME_REFRESH_SCHEDULE, {
        name: "stock-name-refresh",
        pollIntervalMs: options.pollIntervalMs,
        shutdown,
        logger: log,
      });
      await refreshEngine.register(createStockNameRefreshTask(service, log));
    }

    await engine.register(task, options.runImmediately ?? true);

    await Promise.all([engine.run(), refreshEngine?.run()]);
  } finally {
    owned?.dispose();
  }
}
