/**
 * Schedule Engine
 *
 * Owns a parsed schedule, one task callback and a single-flight guard.
 * Each (day, time) pair of the table becomes one trigger on the timing
 * backend; a polling loop fires due triggers until stop() is called or the
 * shutdown flag is raised.
 *
 * Execution rules:
 * - At most one run of the callback at a time. A trigger that comes due while
 *   a run is in progress is skipped and logged, never queued. This holds for
 *   triggers due on the same tick and for triggers that came due during a
 *   run that spanned several ticks.
 * - Callback errors are logged and swallowed; the guard is always released.
 * - Stop and shutdown are observed between ticks only.
 */

import { nanoid } from "nanoid";
import type { ILogger } from "@tickwatch/shared/logging";
import { createComponentLogger } from "../logging.js";
import { parseScheduleSpec } from "../schedule/parser.js";
import { formatTimeOfDay } from "../schedule/time-of-day.js";
import type { ScheduleSpecInput, ScheduleTable } from "../schedule/types.js";
import { SchedulerError } from "./errors.js";
import { ExecutionGuard } from "./guard.js";
import { formatLocalDateTime } from "./next-run.js";
import { TriggerWheel } from "./trigger-wheel.js";
import {
  DEFAULT_POLL_INTERVAL_MS,
  type EngineState,
  type ExecutionOutcome,
  type ScheduleEngineOptions,
  type ScheduledCallback,
  type ShutdownSignal,
  type TimerBackend,
  type Trigger,
} from "./types.js";

export class ScheduleEngine {
  readonly table: ScheduleTable;
  private readonly name: string;
  private readonly pollIntervalMs: number;
  private readonly shutdown: ShutdownSignal | null;
  private readonly backend: TimerBackend;
  private readonly log: ILogger;
  private readonly guard = new ExecutionGuard();

  private callback: ScheduledCallback | null = null;
  private engineState: EngineState = "idle";
  private stopRequested = false;
  private wake: (() => void) | null = null;
  private heartbeatHour: string | null = null;
  private lastRun: { startedAt: Date; finishedAt: Date } | null = null;

  /**
   * Parses the schedule. Throws ScheduleSpecError for a malformed spec, in
   * which case nothing is registered.
   */
  constructor(spec: ScheduleSpecInput, options: ScheduleEngineOptions = {}) {
    this.table = parseScheduleSpec(spec);
    this.name = options.name ?? "task";
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.shutdown = options.shutdown ?? null;
    this.backend = options.backend ?? new TriggerWheel();
    this.log = options.logger ?? createComponentLogger("scheduler");

    if (!Number.isFinite(this.pollIntervalMs) || this.pollIntervalMs <= 0) {
      throw new SchedulerError(`Poll interval must be a positive number of milliseconds, got ${this.pollIntervalMs}`);
    }
  }

  // ----------------------------------------
  // Observability
  // ----------------------------------------

  get state(): EngineState {
    return this.engineState;
  }

  get triggers(): readonly Trigger[] {
    return this.backend.triggers;
  }

  /** True while the callback is running. */
  get isExecuting(): boolean {
    return this.guard.isLocked;
  }

  nextRunAt(): Date | null {
    return this.backend.nextRunAt();
  }

  describeNextRun(): string {
    const next = this.nextRunAt();
    return next ? formatLocalDateTime(next) : "not scheduled";
  }

  // ----------------------------------------
  // Registration
  // ----------------------------------------

  /**
   * Bind the callback to one trigger per (day, time) pair. A pair that fails
   * to register is logged and the rest still register. With runImmediately
   * the callback runs once (guarded) before this resolves.
   */
  async register(callback: ScheduledCallback, runImmediately = false): Promise<readonly Trigger[]> {
    if (this.engineState !== "idle") {
      throw new SchedulerError(`Cannot register a task on a ${this.engineState} scheduler`);
    }
    if (this.callback) {
      throw new SchedulerError(`A task is already registered with scheduler "${this.name}"`);
    }
    this.callback = callback;

    for (const [day, times] of this.table) {
      for (const time of times) {
        const label = `${day}@${formatTimeOfDay(time)}`;
        try {
          const trigger = this.backend.schedule(day, time, (fired, dueAt) => this.fire(fired, dueAt));
          this.log.info("Trigger registered", { task: this.name, trigger: label, id: trigger.id });
        } catch (error) {
          this.log.error("Trigger registration failed", error, { task: this.name, trigger: label });
        }
      }
    }

    if (this.backend.triggers.length === 0) {
      this.log.warn("No triggers registered; task will not run on schedule", { task: this.name });
    }

    if (runImmediately) {
      this.log.info("Running task once before entering the schedule", { task: this.name });
      await this.runGuarded();
    }

    return this.backend.triggers;
  }

  // ----------------------------------------
  // Guarded execution
  // ----------------------------------------

  /**
   * Run the callback unless a run is already in progress.
   * Never rejects: errors from the callback are logged and reported as "failed".
   */
  async runGuarded(trigger?: Trigger): Promise<ExecutionOutcome> {
    const callback = this.callback;
    if (!callback) {
      this.log.debug("No task registered, nothing to run", { task: this.name });
      return "skipped";
    }

    const source = trigger ? triggerLabel(trigger) : "manual";
    const runId = `run_${nanoid(10)}`;

    if (!this.guard.tryAcquire(runId)) {
      this.log.warn("Previous run still in progress, skipping trigger", {
        task: this.name,
        trigger: source,
        activeRun: this.guard.currentHolder,
      });
      return "skipped";
    }

    const runLog = this.log.child({ correlationId: runId });
    const startedAt = new Date();
    let outcome: ExecutionOutcome = "completed";

    try {
      runLog.info("Task started", {
        task: this.name,
        trigger: source,
        startedAt: formatLocalDateTime(startedAt),
      });

      try {
        await callback();
      } catch (error) {
        outcome = "failed";
        runLog.error("Task failed", error, { task: this.name });
      }

      const finishedAt = new Date();
      runLog.info("Task finished", {
        task: this.name,
        outcome,
        finishedAt: formatLocalDateTime(finishedAt),
        durationMs: finishedAt.getTime() - startedAt.getTime(),
      });
    } finally {
      this.lastRun = { startedAt, finishedAt: new Date() };
      this.guard.release();
    }

    return outcome;
  }

  /**
   * Entry point for scheduled firings. A trigger that came due while the
   * previous run was still in progress is skipped; it has already been moved
   * to its next occurrence.
   */
  private fire(trigger: Trigger, dueAt: Date): Promise<ExecutionOutcome> {
    const last = this.lastRun;
    if (last && dueAt >= last.startedAt && dueAt < last.finishedAt) {
      this.log.warn("Previous run still in progress, skipping trigger", {
        task: this.name,
        trigger: triggerLabel(trigger),
        dueAt: formatLocalDateTime(dueAt),
        previousRunFinishedAt: formatLocalDateTime(last.finishedAt),
      });
      return Promise.resolve("skipped");
    }
    return this.runGuarded(trigger);
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  /**
   * Poll for due triggers every pollIntervalMs until stopped.
   * Resolves once the loop has exited; the engine cannot be run again.
   */
  async run(): Promise<void> {
    if (this.engineState === "running") {
      throw new SchedulerError(`Scheduler "${this.name}" is already running`);
    }
    if (this.engineState === "stopped") {
      throw new SchedulerError(`Scheduler "${this.name}" has stopped and cannot be restarted`);
    }

    if (this.shouldExit()) {
      this.engineState = "stopped";
      this.backend.clear();
      this.log.info("Scheduler stopped before starting", { task: this.name, reason: this.exitReason() });
      return;
    }

    this.engineState = "running";
    this.heartbeatHour = hourKey(new Date());
    this.log.info("Scheduler started", {
      task: this.name,
      triggers: this.backend.triggers.length,
      pollIntervalMs: this.pollIntervalMs,
      nextRun: this.describeNextRun(),
    });

    try {
      while (!this.shouldExit()) {
        await this.backend.runPending(new Date());
        this.heartbeat(new Date());
        if (this.shouldExit()) break;
        await this.sleep(this.pollIntervalMs);
      }
    } finally {
      this.engineState = "stopped";
      this.log.info("Scheduler stopped", { task: this.name, reason: this.exitReason() });
      this.backend.clear();
    }
  }

  /**
   * Ask the loop to exit after the current tick. Idempotent; a run in
   * progress is left to finish.
   */
  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.log.info("Stop requested", { task: this.name, state: this.engineState });
    this.wake?.();
  }

  // ----------------------------------------
  // Internals
  // ----------------------------------------

  private shouldExit(): boolean {
    return this.stopRequested || this.shutdown?.shouldShutdown === true;
  }

  private exitReason(): string {
    return this.stopRequested ? "stop requested" : "shutdown signal";
  }

  /** Log once per wall-clock hour, on the first tick after it begins. */
  private heartbeat(now: Date): void {
    const key = hourKey(now);
    if (key === this.heartbeatHour) return;
    this.heartbeatHour = key;
    this.log.info("Scheduler running", { task: this.name, nextRun: this.describeNextRun() });
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}

function triggerLabel(trigger: Trigger): string {
  return `${trigger.day}@${formatTimeOfDay(trigger.time)}`;
}

function hourKey(date: Date): string {
  return formatLocalDateTime(date).slice(0, 13);
}
