import type { GridConfig, Occasion, SkippedOccasion } from "../types";
import { InvalidConfigError } from "../shared/domainErrors";
import { combineDayAndTime, isValidTimeOfDay } from "../domain/policies/timeOfDay";
import { sortOccasions } from "../domain/policies/occasionOrder";
import { OccasionPlacement } from "./occasionPlacement";
import type { EventClassCycler } from "./eventClassCycler";

/** Ячейка сетки: пусто или ссылка на размещение (`continuation`: вхождение началось в строке выше). */
export type GridCell = { readonly placement: OccasionPlacement; readonly continuation: boolean } | null;

export interface TimeslotRow {
  readonly slot: Date;
  readonly cells: readonly GridCell[];
}

export interface TimeslotGrid {
  /** Строки по возрастанию времени; ширина всех строк = `columnCount`. */
  readonly rows: readonly TimeslotRow[];
  readonly columnCount: number;
  /** Вхождения, не попавшие в сетку (диагностика, не ошибка). */
  readonly skipped: readonly SkippedOccasion[];
}

export type BuildTimeslotGridOptions = {
  /** Если задан: каждому размещению назначается CSS-класс по колонке и типу события. */
  classCycler?: EventClassCycler;
};

/**
 * Построить сетку таймслотов на день.
 *
 * Раскладка жадная: вхождения обходятся по (start, end), каждое занимает самую левую свободную
 * колонку в своей первой строке и держит её во всех следующих строках, пока слот `< end`
 * (последняя строка сетки: включительно, если `end` совпадает с концом сетки).
 *
 * Политика деградации (без исключений):
 * - вхождение, закончившееся до начала сетки (`end <= gridStart`), пропускается;
 * - вхождение, начавшееся раньше сетки, начинается с первой строки;
 * - вхождение, чей старт не попадает ровно на слот, пропускается (сетка предполагает выравнивание);
 * - хвост за пределами сетки отрезается.
 *
 * @throws InvalidConfigError если конфигурация некорректна (до построения строк)
 */
export function buildTimeslotGrid(day: Date, config: GridConfig, occasions: readonly Occasion[], opts?: BuildTimeslotGridOptions): TimeslotGrid {
  assertGridConfig(day, config);

  const slotMs = Math.round(config.slotMinutes * 60_000);
  const gridStartMs = combineDayAndTime(day, config.startTime).getTime();
  const gridEndMs = gridStartMs + Math.round(config.spanMinutes * 60_000);

  // slot → колонки строки (плотный массив: индекс = колонка).
  const index = new Map<number, GridCell[]>();
  for (let t = gridStartMs; t <= gridEndMs; t += slotMs) index.set(t, []);

  const skipped: SkippedOccasion[] = [];
  for (const occasion of sortOccasions(occasions)) {
    const startMs = occasion.start.getTime();
    const endMs = occasion.end.getTime();
    if (endMs <= gridStartMs) {
      skipped.push({ occasion, reason: "ended_before_grid" });
      continue;
    }

    const rowKey = startMs > gridStartMs ? startMs : gridStartMs;
    const firstRow = index.get(rowKey);
    if (!firstRow) {
      // Старт между слотами (или после конца сетки).
      skipped.push({ occasion, reason: "unaligned_start" });
      continue;
    }

    let column = 0;
    while (firstRow[column]) column++;
    const placement = new OccasionPlacement(occasion, column);
    firstRow[column] = { placement, continuation: false };

    // Коллизий здесь быть не может: благодаря сортировке эта колонка ниже уже свободна.
    // Вхождение, которое заканчивается ровно на конце сетки, занимает и последнюю строку.
    for (let t = rowKey + slotMs; t < endMs || (t === endMs && endMs === gridEndMs); t += slotMs) {
      const row = index.get(t);
      if (!row) break;
      row[column] = { placement, continuation: true };
    }
  }

  let widest = 0;
  for (const cells of index.values()) widest = Math.max(widest, cells.length);
  const columnCount = Math.max(config.minColumns, widest);

  const rows: TimeslotRow[] = [];
  for (const [slot, cells] of [...index.entries()].sort((a, b) => a[0] - b[0])) {
    const padded: GridCell[] = Array.from({ length: columnCount }, (_, i) => cells[i] ?? null);
    rows.push(Object.freeze({ slot: new Date(slot), cells: Object.freeze(padded) }));
  }

  if (opts?.classCycler) assignEventClasses(rows, opts.classCycler);

  return Object.freeze({ rows: Object.freeze(rows), columnCount, skipped: Object.freeze(skipped) });
}

/** Первое назначение побеждает: размещение получает класс в своей первой строке. */
function assignEventClasses(rows: readonly TimeslotRow[], cycler: EventClassCycler): void {
  for (const row of rows) {
    row.cells.forEach((cell, column) => {
      if (!cell || cell.placement.eventClass) return;
      cell.placement.assignEventClass(cycler.next(column, cell.placement.category));
    });
  }
}

export function assertGridConfig(day: Date, config: GridConfig): void {
  if (!(day instanceof Date) || Number.isNaN(day.getTime())) {
    throw new InvalidConfigError("Планировщик: некорректный день сетки");
  }
  if (!Number.isFinite(config.slotMinutes) || Math.round(config.slotMinutes * 60_000) <= 0) {
    throw new InvalidConfigError("Планировщик: шаг слота должен быть > 0", { slotMinutes: config.slotMinutes });
  }
  if (!Number.isFinite(config.spanMinutes) || config.spanMinutes < 0) {
    throw new InvalidConfigError("Планировщик: длина сетки должна быть >= 0", { spanMinutes: config.spanMinutes });
  }
  if (!Number.isInteger(config.minColumns) || config.minColumns < 0) {
    throw new InvalidConfigError("Планировщик: minColumns должен быть целым >= 0", { minColumns: config.minColumns });
  }
  if (!isValidTimeOfDay(config.startTime)) {
    throw new InvalidConfigError("Планировщик: некорректное время начала сетки", { startTime: config.startTime });
  }
}
