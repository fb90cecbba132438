import { describe, expect, it } from "vitest";
import { combineDayAndTime, isValidTimeOfDay, parseTimeOfDay } from "../../src/domain/policies/timeOfDay";

describe("timeOfDay", () => {
  it("parseTimeOfDay: HH:mm и H:mm", () => {
    expect(parseTimeOfDay("09:00")).toEqual({ hours: 9, minutes: 0 });
    expect(parseTimeOfDay(" 9:05 ")).toEqual({ hours: 9, minutes: 5 });
    expect(parseTimeOfDay("23:59")).toEqual({ hours: 23, minutes: 59 });
  });

  it("parseTimeOfDay: мусор и значения вне диапазона → null", () => {
    expect(parseTimeOfDay("24:00")).toBeNull();
    expect(parseTimeOfDay("12:60")).toBeNull();
    expect(parseTimeOfDay("9:5")).toBeNull();
    expect(parseTimeOfDay("ab")).toBeNull();
    expect(parseTimeOfDay("")).toBeNull();
  });

  it("isValidTimeOfDay", () => {
    expect(isValidTimeOfDay({ hours: 0, minutes: 0 })).toBe(true);
    expect(isValidTimeOfDay({ hours: 9.5, minutes: 0 })).toBe(false);
    expect(isValidTimeOfDay({ hours: -1, minutes: 0 })).toBe(false);
  });

  it("combineDayAndTime отбрасывает время исходной даты", () => {
    expect(combineDayAndTime(new Date(2024, 0, 15, 18, 45, 12, 7), { hours: 9, minutes: 30 })).toEqual(new Date(2024, 0, 15, 9, 30));
  });
});
