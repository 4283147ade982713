/**
 * Scheduler Types
 */

import type { ILogger } from "@tickwatch/shared/logging";
import type { DayKey, TimeOfDay } from "../schedule/types.js";

// ============================================
// TRIGGERS
// ============================================

/** One registered (day, time) firing point. Never mutated after registration. */
export interface Trigger {
  readonly id: string;
  readonly day: DayKey;
  readonly time: TimeOfDay;
}

/** Receives the trigger and the instant it came due. */
export type TriggerJob = (trigger: Trigger, dueAt: Date) => Promise<unknown>;

/**
 * Timing subsystem the engine registers triggers with.
 */
export interface TimerBackend {
  /** Register a trigger. Throws if the pair cannot be registered. */
  schedule(day: DayKey, time: TimeOfDay, job: TriggerJob): Trigger;
  /** Fire every due trigger; resolves when all of their jobs have settled. Returns how many fired. */
  runPending(now?: Date): Promise<number>;
  /** Earliest upcoming fire time, or null when nothing is registered. */
  nextRunAt(): Date | null;
  /** Remove all triggers. */
  clear(): void;
  readonly triggers: readonly Trigger[];
}

// ============================================
// ENGINE
// ============================================

export type EngineState = "idle" | "running" | "stopped";

/** The task being scheduled: no arguments, result ignored. */
export type ScheduledCallback = () => void | Promise<void>;

export type ExecutionOutcome = "completed" | "failed" | "skipped";

/**
 * Read-only view of a process-lifecycle flag owned elsewhere.
 */
export interface ShutdownSignal {
  readonly shouldShutdown: boolean;
}

export interface ScheduleEngineOptions {
  /** Label used in log lines (default: "task") */
  name?: string;
  /** How often the loop checks for due triggers (default: 30s) */
  pollIntervalMs?: number;
  /** External stop flag, read once per tick */
  shutdown?: ShutdownSignal;
  /** Timing subsystem (default: a fresh TriggerWheel) */
  backend?: TimerBackend;
  /** Logger (default: the agent.scheduler component logger) */
  logger?: ILogger;
}

export const DEFAULT_POLL_INTERVAL_MS = 30_000;
