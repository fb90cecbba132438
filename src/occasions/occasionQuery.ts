import type { Occasion } from "../types";
import { dayWindow } from "../domain/policies/dayBoundaries";
import { sortOccasions } from "../domain/policies/occasionOrder";

export type OccasionFilter = {
  /** Только вхождения этого события. */
  eventId?: string;
};

/**
 * Вхождения, пересекающиеся с окном `[windowStart, windowEnd]`.
 *
 * Одно условие покрывает все четыре случая (начинается внутри, заканчивается внутри,
 * целиком внутри, накрывает окно целиком). Границы замкнутые, `end == windowStart` считается пересечением.
 * Порядок входного списка сохраняется.
 */
export function overlapping(occasions: readonly Occasion[], windowStart: Date, windowEnd: Date, filter?: OccasionFilter): Occasion[] {
  const startMs = windowStart.getTime();
  const endMs = windowEnd.getTime();
  const eventId = filter?.eventId;
  return occasions.filter((o) => {
    if (eventId != null && o.event.id !== eventId) return false;
    return o.start.getTime() <= endMs && o.end.getTime() >= startMs;
  });
}

/**
 * Вхождения, пересекающиеся с днём `day` (по умолчанию: сегодня).
 *
 * @param params.nowMs Источник “сейчас” для дня по умолчанию (для тестов)
 */
export function dailyOccasions(occasions: readonly Occasion[], params?: OccasionFilter & { day?: Date; nowMs?: number }): Occasion[] {
  const day = params?.day ?? new Date(params?.nowMs ?? Date.now());
  const { start, end } = dayWindow(day);
  return overlapping(occasions, start, end, params);
}

/** Вхождения, начинающиеся не раньше `now`, по возрастанию. */
export function upcomingOccasions(occasions: readonly Occasion[], now: Date, filter?: OccasionFilter): Occasion[] {
  const nowMs = now.getTime();
  const eventId = filter?.eventId;
  return sortOccasions(occasions.filter((o) => o.start.getTime() >= nowMs && (eventId == null || o.event.id === eventId)));
}

/** Ближайшее предстоящее вхождение или `null`. */
export function nextOccasion(occasions: readonly Occasion[], now: Date, filter?: OccasionFilter): Occasion | null {
  return upcomingOccasions(occasions, now, filter)[0] ?? null;
}
