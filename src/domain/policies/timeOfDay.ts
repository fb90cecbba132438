import type { TimeOfDay } from "../../types";

/**
 * Политика: распарсить время суток `HH:mm` (или `H:mm`).
 *
 * Возвращает `null` для мусора и значений вне диапазона.
 */
export function parseTimeOfDay(raw: string): TimeOfDay | null {
  const m = String(raw ?? "")
    .trim()
    .match(/^(\d{1,2}):(\d{2})$/);
  if (!m) return null;
  const hours = Number(m[1]);
  const minutes = Number(m[2]);
  if (!isValidTimeOfDay({ hours, minutes })) return null;
  return { hours, minutes };
}

export function isValidTimeOfDay(t: TimeOfDay): boolean {
  return Number.isInteger(t.hours) && Number.isInteger(t.minutes) && t.hours >= 0 && t.hours <= 23 && t.minutes >= 0 && t.minutes <= 59;
}

/** Policy: дата дня + время суток → локальный момент. */
export function combineDayAndTime(day: Date, time: TimeOfDay): Date {
  return new Date(day.getFullYear(), day.getMonth(), day.getDate(), time.hours, time.minutes, 0, 0);
}
