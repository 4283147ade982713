/**
 * Day tokens.
 *
 * Only the numeric convention is accepted in rule strings: 1=Monday ... 7=Sunday.
 */

import { ScheduleSpecError } from "./errors.js";
import type { DayKey, Weekday } from "./types.js";

export const WEEK_ORDER: readonly Weekday[] = ["MON", "TUE", "WED", "THU", "FRI", "SAT", "SUN"];

export const DAY_KEYS: readonly DayKey[] = ["EVERY", ...WEEK_ORDER];

export function isDayKey(value: string): value is DayKey {
  return DAY_KEYS.some(day => day === value);
}

/** Map a single digit "1".."7" to its weekday. */
export function parseDayNumber(token: string): Weekday {
  const index = /^[1-7]$/.test(token) ? parseInt(token, 10) - 1 : -1;
  const day = WEEK_ORDER[index];
  if (!day) {
    throw new ScheduleSpecError(`Invalid day "${token}": expected a digit 1-7 (1=Monday, 7=Sunday)`, token);
  }
  return day;
}

/**
 * Resolve `a-b` to weekdays in week order. `a > b` wraps past Sunday,
 * so "5-2" is Fri, Sat, Sun, Mon, Tue.
 */
export function resolveDayRange(token: string): Weekday[] {
  const bounds = token.split("-").map(part => part.trim());
  if (bounds.length !== 2) {
    throw new ScheduleSpecError(`Invalid day range "${token}": expected a-b`, token);
  }
  for (const bound of bounds) {
    if (!/^[1-7]$/.test(bound)) {
      throw new ScheduleSpecError(`Invalid day range "${token}": bound "${bound}" is not a digit 1-7`, token);
    }
  }
  const start = parseInt(bounds[0], 10);
  const end = parseInt(bounds[1], 10);
  if (start <= end) {
    return WEEK_ORDER.slice(start - 1, end);
  }
  return [...WEEK_ORDER.slice(start - 1), ...WEEK_ORDER.slice(0, end)];
}

/** Resolve a comma-separated dayspec ("1-5", "1,3,5", "6-7,1") to weekdays. */
export function resolveDaySpec(dayspec: string): Weekday[] {
  const tokens = dayspec.split(",").map(t => t.trim());
  if (tokens.every(t => t === "")) {
    throw new ScheduleSpecError(`Empty day list in "${dayspec}"`, dayspec);
  }
  const days: Weekday[] = [];
  for (const token of tokens) {
    if (token === "") {
      throw new ScheduleSpecError(`Empty day token in "${dayspec}"`, dayspec);
    }
    const resolved = token.includes("-") ? resolveDayRange(token) : [parseDayNumber(token)];
    days.push(...resolved);
  }
  return days;
}

/**
 * Resolve a mapping key: "every", a digit 1-7, or a weekday identifier
 * such as "MON". Case-insensitive, surrounding whitespace ignored.
 */
export function parseMappingKey(key: string): DayKey {
  const normalized = key.trim().toUpperCase();
  if (isDayKey(normalized)) return normalized;
  if (/^[1-7]$/.test(normalized)) return parseDayNumber(normalized);
  throw new ScheduleSpecError(`Unrecognized schedule key "${key}": expected "every", 1-7 or MON-SUN`, key);
}
