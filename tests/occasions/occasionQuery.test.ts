import { describe, expect, it } from "vitest";
import { dailyOccasions, nextOccasion, overlapping, upcomingOccasions } from "../../src/occasions/occasionQuery";
import type { Occasion } from "../../src/types";

function at(day: number, hours: number, minutes = 0): Date {
  return new Date(2024, 0, day, hours, minutes);
}

function occ(id: string, start: Date, end: Date, eventId = "evt-1"): Occasion {
  return { id, start, end, event: { id: eventId, title: id, description: "" } };
}

const ids = (items: Occasion[]) => items.map((o) => o.id);

describe("overlapping", () => {
  const items = [
    occ("touchesStart", at(15, 8), at(15, 9)),
    occ("touchesEnd", at(15, 10), at(15, 11)),
    occ("before", at(15, 7), at(15, 8, 59)),
    occ("after", at(15, 10, 1), at(15, 11)),
    occ("covers", at(15, 8), at(15, 12)),
    occ("inside", at(15, 9, 15), at(15, 9, 45)),
  ];

  it("замкнутые границы, порядок входа сохраняется", () => {
    expect(ids(overlapping(items, at(15, 9), at(15, 10)))).toEqual(["touchesStart", "touchesEnd", "covers", "inside"]);
  });

  it("пересечение симметрично", () => {
    const window = occ("window", at(15, 9), at(15, 10));
    for (const o of items) {
      const forward = overlapping([o], window.start, window.end).length;
      const backward = overlapping([window], o.start, o.end).length;
      expect(forward).toBe(backward);
    }
  });

  it("фильтр по событию", () => {
    const mixed = [occ("a", at(15, 9), at(15, 10), "evt-1"), occ("b", at(15, 9), at(15, 10), "evt-2")];
    expect(ids(overlapping(mixed, at(15, 0), at(15, 23), { eventId: "evt-2" }))).toEqual(["b"]);
  });
});

describe("dailyOccasions", () => {
  const items = [
    occ("overnight", at(14, 22), at(15, 1)),
    occ("late", at(15, 23, 30), at(16, 0, 30)),
    occ("nextMidnight", at(16, 0), at(16, 1)),
    occ("morning", at(15, 9), at(15, 10)),
  ];

  it("всё, что пересекается с днём", () => {
    expect(ids(dailyOccasions(items, { day: at(15, 13) }))).toEqual(["overnight", "late", "morning"]);
  });

  it("день по умолчанию берётся из nowMs", () => {
    expect(ids(dailyOccasions(items, { nowMs: at(16, 12).getTime() }))).toEqual(["late", "nextMidnight"]);
  });
});

describe("upcomingOccasions / nextOccasion", () => {
  const items = [occ("c", at(17, 9), at(17, 10)), occ("a", at(15, 9), at(15, 10)), occ("b", at(16, 9), at(16, 10), "evt-2")];

  it("только начинающиеся не раньше now, по возрастанию", () => {
    expect(ids(upcomingOccasions(items, at(15, 9)))).toEqual(["a", "b", "c"]);
    expect(ids(upcomingOccasions(items, at(15, 9, 1)))).toEqual(["b", "c"]);
    expect(ids(upcomingOccasions(items, at(15, 12), { eventId: "evt-1" }))).toEqual(["c"]);
  });

  it("nextOccasion: ближайшее или null", () => {
    expect(nextOccasion(items, at(15, 12))?.id).toBe("b");
    expect(nextOccasion(items, at(18, 0))).toBeNull();
  });
});
