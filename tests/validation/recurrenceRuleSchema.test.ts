import { describe, expect, it } from "vitest";
import { parseRawRecurrenceRule } from "../../src/shared/validation/recurrenceRuleSchema";

describe("parseRawRecurrenceRule", () => {
  it("объект правила проходит как есть", () => {
    const r = parseRawRecurrenceRule({ freq: "WEEKLY", count: 2, byWeekday: ["MO", { day: "FR", n: -1 }] });
    expect(r).toEqual({ ok: true, value: { freq: "WEEKLY", count: 2, byWeekday: ["MO", { day: "FR", n: -1 }] } });
  });

  it("until из строки приводится к Date", () => {
    const r = parseRawRecurrenceRule({ until: "2024-02-01T00:00:00" });
    if (!r.ok) throw new Error("expected ok");
    expect(r.value.until).toEqual(new Date(2024, 1, 1));
  });

  it("undefined → пустое (вырожденное) правило", () => {
    expect(parseRawRecurrenceRule(undefined)).toEqual({ ok: true, value: {} });
  });

  it("ошибки формы → E_VALIDATION с путями", () => {
    const r = parseRawRecurrenceRule({ freq: "FORTNIGHTLY", count: 1.5 });
    if (r.ok) throw new Error("expected err");
    expect(r.error.code).toBe("E_VALIDATION");
    const issues = r.error.details?.issues;
    expect(Array.isArray(issues) ? issues.length : 0).toBe(2);

    const extra = parseRawRecurrenceRule({ freq: "DAILY", every: 2 });
    expect(extra.ok ? "" : extra.error.code).toBe("E_VALIDATION");
  });

  it("BYxxx вне диапазона → E_VALIDATION", () => {
    const raws: unknown[] = [
      { byHour: [24] },
      { byMonth: [13] },
      { byMonthDay: [0] },
      { byYearDay: [-367] },
      { byWeekNo: [54] },
      { bySetPos: [0] },
      { byMinute: [60] },
      { bySecond: [-1] },
      { byWeekday: [{ day: "MO", n: 0 }] },
    ];
    for (const raw of raws) {
      const r = parseRawRecurrenceRule(raw);
      expect(r.ok ? "" : r.error.code).toBe("E_VALIDATION");
    }
  });

  it("граничные значения BYxxx проходят", () => {
    const r = parseRawRecurrenceRule({ byMonthDay: [-31, 31], byHour: [0, 23], byWeekday: [{ day: "FR", n: -53 }] });
    expect(r.ok).toBe(true);
  });

  it("RRULE-строка", () => {
    expect(parseRawRecurrenceRule("FREQ=DAILY;COUNT=2")).toEqual({ ok: true, value: { freq: "DAILY", count: 2 } });
  });

  it("битая RRULE-строка → E_INVALID_RULE", () => {
    const r = parseRawRecurrenceRule("COUNT=2");
    if (r.ok) throw new Error("expected err");
    expect(r.error.code).toBe("E_INVALID_RULE");
  });
});
