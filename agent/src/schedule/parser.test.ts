/**
 * Schedule parser tests.
 *
 * Covers the three input shapes, day ranges with wraparound,
 * de-duplication and every rejection path.
 */

import { describe, it, expect } from "vitest";
import { parseScheduleSpec, describeScheduleTable } from "./parser.js";
import { ScheduleSpecError } from "./errors.js";
import type { DayKey, ScheduleTable } from "./types.js";

/** Flatten a table to { DAY: ["HH:MM", ...] } for readable assertions. */
function asPlain(table: ScheduleTable): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const [day, times] of table) {
    out[day] = times.map(t => `${String(t.hour).padStart(2, "0")}:${String(t.minute).padStart(2, "0")}`);
  }
  return out;
}

function expectSpecError(spec: unknown, token: string): void {
  let caught: unknown;
  try {
    parseScheduleSpec(spec);
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(ScheduleSpecError);
  if (caught instanceof ScheduleSpecError) {
    expect(caught.token).toBe(token);
  }
}

// ============================================
// PLAIN TIME LISTS
// ============================================

describe("plain time list", () => {
  it("parses a single daily time", () => {
    expect(asPlain(parseScheduleSpec("18:00"))).toEqual({ EVERY: ["18:00"] });
  });

  it("parses comma-separated times and trims whitespace", () => {
    expect(asPlain(parseScheduleSpec(" 09:30, 13:30 ,15:00 "))).toEqual({ EVERY: ["09:30", "13:30", "15:00"] });
  });

  it("removes duplicates keeping first-occurrence order", () => {
    expect(asPlain(parseScheduleSpec("09:30,09:30,13:30"))).toEqual({ EVERY: ["09:30", "13:30"] });
    expect(asPlain(parseScheduleSpec("13:30,09:30,13:30"))).toEqual({ EVERY: ["13:30", "09:30"] });
  });

  it("accepts an already-split list", () => {
    expect(asPlain(parseScheduleSpec(["09:30", "13:30", "09:30"]))).toEqual({ EVERY: ["09:30", "13:30"] });
  });

  it("accepts the boundary times", () => {
    expect(asPlain(parseScheduleSpec("00:00,23:59"))).toEqual({ EVERY: ["00:00", "23:59"] });
  });

  it.each(["24:00", "9:30", "12:60", "12:3", "1230", "12-30", "ab:cd", "12:30:00"])(
    "rejects malformed time %s",
    (bad) => {
      expectSpecError(bad, bad);
    },
  );

  it("rejects a non-string list entry", () => {
    expectSpecError(["09:30", 930], "930");
  });
});

// ============================================
// RULE STRINGS
// ============================================

describe("rule string", () => {
  it("applies one time list to every day of a range", () => {
    const table = parseScheduleSpec("1-5@09:30,13:30;6-7@10:00");
    expect(asPlain(table)).toEqual({
      MON: ["09:30", "13:30"],
      TUE: ["09:30", "13:30"],
      WED: ["09:30", "13:30"],
      THU: ["09:30", "13:30"],
      FRI: ["09:30", "13:30"],
      SAT: ["10:00"],
      SUN: ["10:00"],
    });
  });

  it("resolves 1-5 to Monday through Friday", () => {
    expect([...parseScheduleSpec("1-5@08:00").keys()]).toEqual(["MON", "TUE", "WED", "THU", "FRI"]);
  });

  it("wraps a descending range around the week", () => {
    expect([...parseScheduleSpec("5-2@08:00").keys()]).toEqual(["FRI", "SAT", "SUN", "MON", "TUE"]);
  });

  it("treats a-a as a single day", () => {
    expect([...parseScheduleSpec("3-3@08:00").keys()]).toEqual(["WED"]);
  });

  it("maps each digit to its weekday", () => {
    const expected: DayKey[] = ["MON", "TUE", "WED", "THU", "FRI", "SAT", "SUN"];
    for (let n = 1; n <= 7; n++) {
      expect([...parseScheduleSpec(`${n}@12:00`).keys()]).toEqual([expected[n - 1]]);
    }
  });

  it("mixes single days and ranges in one dayspec", () => {
    expect([...parseScheduleSpec("1,3,6-7@08:00").keys()]).toEqual(["MON", "WED", "SAT", "SUN"]);
  });

  it("merges times for the same day across rules without duplicates", () => {
    const table = parseScheduleSpec("1@09:30;1-2@09:30,15:00");
    expect(asPlain(table)).toEqual({ MON: ["09:30", "15:00"], TUE: ["09:30", "15:00"] });
  });

  it("folds a bare time rule into EVERY", () => {
    const table = parseScheduleSpec("1-5@09:30;18:00,20:00");
    expect(asPlain(table)).toEqual({
      MON: ["09:30"],
      TUE: ["09:30"],
      WED: ["09:30"],
      THU: ["09:30"],
      FRI: ["09:30"],
      EVERY: ["18:00", "20:00"],
    });
  });

  it("ignores empty rules left by a trailing separator", () => {
    expect(asPlain(parseScheduleSpec("6@10:00;"))).toEqual({ SAT: ["10:00"] });
  });

  it.each([
    ["8@09:30", "8"],
    ["0@09:30", "0"],
    ["mon@09:30", "mon"],
    ["MON@09:30", "MON"],
    ["1-8@09:30", "1-8"],
    ["a-3@09:30", "a-3"],
    ["1-2-3@09:30", "1-2-3"],
    ["1@25:00", "25:00"],
    ["1-5@09:30,9:45", "9:45"],
  ])("rejects %s (token %s)", (spec, token) => {
    expectSpecError(spec, token);
  });

  it("rejects a bare rule that is not all times", () => {
    expectSpecError("1-5@09:30;weekday", "weekday");
  });

  it("rejects a rule with no times", () => {
    expectSpecError("1-5@", "1-5@");
  });

  it("rejects an empty specification", () => {
    expectSpecError("   ", "   ");
  });

  it("rejects a specification made only of separators", () => {
    expectSpecError(";", ";");
    expectSpecError(" ; ; ", " ; ; ");
  });
});

// ============================================
// DIRECT MAPPING
// ============================================

describe("direct mapping", () => {
  it("keeps day and every buckets independent", () => {
    const table = parseScheduleSpec({ "1": ["09:30"], every: ["18:00"] });
    expect(asPlain(table)).toEqual({ MON: ["09:30"], EVERY: ["18:00"] });
  });

  it("trims and upper-cases keys and accepts weekday identifiers", () => {
    const table = parseScheduleSpec({ " EVERY ": ["07:00"], " 7 ": ["10:00"], tue: ["11:00"] });
    expect(asPlain(table)).toEqual({ EVERY: ["07:00"], SUN: ["10:00"], TUE: ["11:00"] });
  });

  it("merges keys that resolve to the same day", () => {
    const table = parseScheduleSpec({ "1": ["09:30", "10:00"], MON: ["10:00", "11:00"] });
    expect(asPlain(table)).toEqual({ MON: ["09:30", "10:00", "11:00"] });
  });

  it("rejects an out-of-range day key", () => {
    expectSpecError({ "9": ["09:30"] }, "9");
  });

  it("rejects an unknown key", () => {
    expectSpecError({ weekdays: ["09:30"] }, "weekdays");
  });

  it("rejects a malformed time value", () => {
    expectSpecError({ every: ["7:00"] }, "7:00");
  });

  it("rejects a non-list value", () => {
    expectSpecError({ every: "18:00" }, "every");
  });
});

// ============================================
// INPUT TYPES
// ============================================

describe("input type", () => {
  it.each([
    [42, "42"],
    [null, "null"],
    [undefined, "undefined"],
    [true, "true"],
  ])("rejects %s", (spec, token) => {
    expectSpecError(spec, token);
  });

  it("reports the type in the message", () => {
    expect(() => parseScheduleSpec(42)).toThrow('Unsupported schedule type "number"');
  });
});

describe("describeScheduleTable", () => {
  it("renders days in the order they were first seen", () => {
    expect(describeScheduleTable(parseScheduleSpec("6-7@10:00;09:30,13:00;1@08:00")))
      .toBe("SAT@10:00;SUN@10:00;EVERY@09:30,13:00;MON@08:00");
  });
});
