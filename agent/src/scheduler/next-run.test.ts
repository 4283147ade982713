import { describe, it, expect } from "vitest";
import { calculateNextRun, formatLocalDateTime } from "./next-run.js";

// Monday 2026-01-05 10:00 local time
const monday10 = new Date(2026, 0, 5, 10, 0, 0);

describe("calculateNextRun", () => {
  it("uses today when the time is still ahead", () => {
    expect(calculateNextRun("EVERY", { hour: 18, minute: 0 }, monday10)).toEqual(new Date(2026, 0, 5, 18, 0));
  });

  it("rolls over to tomorrow once the time has passed", () => {
    expect(calculateNextRun("EVERY", { hour: 9, minute: 0 }, monday10)).toEqual(new Date(2026, 0, 6, 9, 0));
  });

  it("is strictly after the reference instant", () => {
    expect(calculateNextRun("EVERY", { hour: 10, minute: 0 }, monday10)).toEqual(new Date(2026, 0, 6, 10, 0));
  });

  it("rolls over the end of the year", () => {
    const newYearsEve = new Date(2026, 11, 31, 23, 30);
    expect(calculateNextRun("EVERY", { hour: 0, minute: 15 }, newYearsEve)).toEqual(new Date(2027, 0, 1, 0, 15));
  });

  it("finds later the same weekday", () => {
    expect(calculateNextRun("MON", { hour: 11, minute: 0 }, monday10)).toEqual(new Date(2026, 0, 5, 11, 0));
  });

  it("waits a week when the weekday's time has passed", () => {
    expect(calculateNextRun("MON", { hour: 9, minute: 0 }, monday10)).toEqual(new Date(2026, 0, 12, 9, 0));
  });

  it("finds the next occurrence of another weekday", () => {
    expect(calculateNextRun("FRI", { hour: 8, minute: 30 }, monday10)).toEqual(new Date(2026, 0, 9, 8, 30));
    expect(calculateNextRun("SUN", { hour: 10, minute: 0 }, monday10)).toEqual(new Date(2026, 0, 11, 10, 0));
  });
});

describe("formatLocalDateTime", () => {
  it("zero-pads every field", () => {
    expect(formatLocalDateTime(new Date(2026, 0, 5, 9, 5, 3))).toBe("2026-01-05 09:05:03");
  });
});
