/**
 * Next-run calculation in host local time.
 */

import type { DayKey, TimeOfDay, Weekday } from "../schedule/types.js";

/** Date#getDay() numbering: 0=Sun..6=Sat */
const JS_WEEKDAY: Record<Weekday, number> = {
  SUN: 0,
  MON: 1,
  TUE: 2,
  WED: 3,
  THU: 4,
  FRI: 5,
  SAT: 6,
};

/**
 * First instant strictly after `after` that falls on `time` (and on `day`
 * unless it is EVERY).
 */
export function calculateNextRun(day: DayKey, time: TimeOfDay, after: Date): Date {
  if (day === "EVERY") {
    return nextDaily(time, after);
  }
  return nextWeekly(JS_WEEKDAY[day], time, after);
}

function nextDaily(time: TimeOfDay, after: Date): Date {
  const next = new Date(after);
  next.setHours(time.hour, time.minute, 0, 0);
  // If that time already passed today, schedule for tomorrow
  if (next <= after) {
    next.setDate(next.getDate() + 1);
  }
  return next;
}

function nextWeekly(targetDay: number, time: TimeOfDay, after: Date): Date {
  const next = new Date(after);
  next.setHours(time.hour, time.minute, 0, 0);

  let daysUntil = targetDay - next.getDay();
  if (daysUntil < 0) daysUntil += 7;
  if (daysUntil === 0 && next <= after) daysUntil = 7;
  next.setDate(next.getDate() + daysUntil);

  return next;
}

/** `YYYY-MM-DD HH:MM:SS` in host local time. */
export function formatLocalDateTime(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
