import { endOfDay, startOfDay, startOfMonth, lastDayOfMonth } from "date-fns";

/** Policy: окно дня `[00:00:00.000, 23:59:59.999]` по локальному времени. */
export function dayWindow(reference: Date = new Date()): { start: Date; end: Date } {
  return { start: startOfDay(reference), end: endOfDay(reference) };
}

/** Policy: первый и последний день месяца (оба на 00:00). */
export function monthBoundaries(reference: Date): { start: Date; end: Date } {
  return { start: startOfMonth(reference), end: startOfDay(lastDayOfMonth(reference)) };
}
