import type { Occasion } from "../../types";

/**
 * Policy: полный порядок вхождений по `start`, затем по `end`.
 *
 * `id` как последний ключ нужен только для детерминизма при полном совпадении интервалов.
 */
export function compareOccasions(a: Occasion, b: Occasion): number {
  const byStart = a.start.getTime() - b.start.getTime();
  if (byStart !== 0) return byStart;
  const byEnd = a.end.getTime() - b.end.getTime();
  if (byEnd !== 0) return byEnd;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/** Отсортированная копия (исходный массив не трогаем). */
export function sortOccasions(occasions: readonly Occasion[]): Occasion[] {
  return occasions.slice().sort(compareOccasions);
}
