import { describe, expect, it } from "vitest";
import { parseRecurrenceRule } from "../../src/recurrence/rruleString";
import { expandRecurrence } from "../../src/recurrence/recurrenceExpander";
import { InvalidRuleError } from "../../src/shared/domainErrors";

describe("parseRecurrenceRule", () => {
  it("разбирает FREQ/INTERVAL/COUNT/BYDAY", () => {
    expect(parseRecurrenceRule("FREQ=WEEKLY;INTERVAL=2;COUNT=4;BYDAY=MO,WE")).toEqual({
      freq: "WEEKLY",
      interval: 2,
      count: 4,
      byWeekday: ["MO", "WE"],
    });
  });

  it("принимает префикс RRULE: и пробелы вокруг", () => {
    expect(parseRecurrenceRule("  RRULE:FREQ=DAILY;COUNT=2  ")).toEqual({ freq: "DAILY", count: 2 });
  });

  it("BYDAY с порядковым номером", () => {
    expect(parseRecurrenceRule("FREQ=MONTHLY;COUNT=2;BYDAY=-1FR")).toEqual({ freq: "MONTHLY", count: 2, byWeekday: [{ day: "FR", n: -1 }] });
  });

  it("UNTIL трактуется как локальное время", () => {
    expect(parseRecurrenceRule("FREQ=DAILY;UNTIL=20240131T235959Z").until).toEqual(new Date(2024, 0, 31, 23, 59, 59));
  });

  it("числовые BYxxx", () => {
    expect(parseRecurrenceRule("FREQ=YEARLY;BYMONTH=1,7;BYMONTHDAY=15;COUNT=2")).toEqual({
      freq: "YEARLY",
      count: 2,
      byMonth: [1, 7],
      byMonthDay: [15],
    });
  });

  it("результат разворачивается expandRecurrence", () => {
    const rule = parseRecurrenceRule("FREQ=WEEKLY;COUNT=2");
    const out = expandRecurrence(new Date(2024, 0, 15, 9, 0), new Date(2024, 0, 15, 10, 0), rule);
    expect(out.map((x) => x.start)).toEqual([new Date(2024, 0, 15, 9, 0), new Date(2024, 0, 22, 9, 0)]);
  });

  it("пустая или битая строка → InvalidRuleError", () => {
    expect(() => parseRecurrenceRule("")).toThrow(InvalidRuleError);
    expect(() => parseRecurrenceRule("RRULE:")).toThrow(InvalidRuleError);
    expect(() => parseRecurrenceRule("COUNT=2")).toThrow(InvalidRuleError);
    expect(() => parseRecurrenceRule("FREQ=FORTNIGHTLY;COUNT=2")).toThrow(InvalidRuleError);
    expect(() => parseRecurrenceRule("FOO=BAR")).toThrow(InvalidRuleError);
  });
});
