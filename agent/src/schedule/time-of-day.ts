/**
 * TimeOfDay parsing and formatting.
 */

import { ScheduleSpecError } from "./errors.js";
import type { TimeOfDay } from "./types.js";

const TIME_PATTERN = /^(\d{2}):(\d{2})$/;

/**
 * Parse a strict `HH:MM` string. Returns null for anything else, including
 * single-digit hours ("9:30") and out-of-range values ("24:00", "12:60").
 */
export function tryParseTimeOfDay(text: string): TimeOfDay | null {
  const match = TIME_PATTERN.exec(text);
  if (!match) return null;
  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

export function parseTimeOfDay(text: string): TimeOfDay {
  const time = tryParseTimeOfDay(text);
  if (!time) {
    throw new ScheduleSpecError(`Invalid time "${text}": expected HH:MM (00:00-23:59)`, text);
  }
  return time;
}

export function isValidTimeOfDay(time: TimeOfDay): boolean {
  return Number.isInteger(time.hour) && Number.isInteger(time.minute)
    && time.hour >= 0 && time.hour <= 23
    && time.minute >= 0 && time.minute <= 59;
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return `${String(time.hour).padStart(2, "0")}:${String(time.minute).padStart(2, "0")}`;
}

export function compareTimeOfDay(a: TimeOfDay, b: TimeOfDay): number {
  return a.hour - b.hour || a.minute - b.minute;
}

export function sameTimeOfDay(a: TimeOfDay, b: TimeOfDay): boolean {
  return compareTimeOfDay(a, b) === 0;
}
