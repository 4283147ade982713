/**
 * Schedule Types
 *
 * Value types shared by the schedule parser and the scheduler engine.
 */

// ============================================
// TIME OF DAY
// ============================================

/** A 24-hour wall-clock time with minute resolution, written `HH:MM`. */
export interface TimeOfDay {
  readonly hour: number;   // 0-23
  readonly minute: number; // 0-59
}

// ============================================
// DAY KEYS
// ============================================

export type Weekday = "MON" | "TUE" | "WED" | "THU" | "FRI" | "SAT" | "SUN";

/** `EVERY` or a weekday identifier. */
export type DayKey = "EVERY" | Weekday;

// ============================================
// SCHEDULE TABLE
// ============================================

/**
 * Normalized schedule: day key -> ordered, de-duplicated times.
 * Map iteration order is the order in which days were first seen.
 */
export type ScheduleTable = ReadonlyMap<DayKey, readonly TimeOfDay[]>;

/** Mapping shape: `{ "every": ["18:00"], "1": ["09:30"] }`. */
export type ScheduleMapping = Readonly<Record<string, readonly string[]>>;

/** Every accepted shape of a human-written schedule. */
export type ScheduleSpecInput = string | readonly string[] | ScheduleMapping;
