import type { Occasion } from "../types";
import type { OccasionPlacement } from "../grid/occasionPlacement";
import type { TimeslotGrid } from "../grid/timeslotGrid";
import { formatTimeslot } from "../domain/policies/timeslotFormat";

/**
 * Порт форматирования: размещение → единица отображения.
 *
 * Ядро результат не разбирает; что показывать (текст, ссылка, маркер продолжения) решает реализация.
 */
export interface PlacementFormatter<T> {
  format(placement: OccasionPlacement, continuation: boolean): T;
}

/** Единица отображения по умолчанию. */
export type PlacementView = {
  label: string;
  href?: string;
  className: string;
  continuation: boolean;
};

/**
 * Форматтер по умолчанию. Первая ячейка показывает название события (со ссылкой, если задан `urlFor`),
 * ячейки продолжения показывают маркер `^`.
 */
export class DefaultPlacementFormatter implements PlacementFormatter<PlacementView> {
  static readonly CONTINUATION_MARK = "^";

  constructor(private readonly opts: { urlFor?: (occasion: Occasion) => string } = {}) {}

  format(placement: OccasionPlacement, continuation: boolean): PlacementView {
    const className = placement.eventClass;
    if (continuation) return { label: DefaultPlacementFormatter.CONTINUATION_MARK, className, continuation };
    const view: PlacementView = { label: placement.occasion.event.title, className, continuation };
    const href = this.opts.urlFor?.(placement.occasion);
    if (href) view.href = href;
    return view;
  }
}

export type RenderedTimeslotRow<T> = {
  slot: Date;
  /** Подпись слота по `timeFormat`. */
  time: string;
  cells: Array<T | null>;
};

/** Прогнать сетку через форматтер: по вызову на каждую непустую ячейку. */
export function renderTimeslotGrid<T>(grid: TimeslotGrid, formatter: PlacementFormatter<T>, timeFormat: string): Array<RenderedTimeslotRow<T>> {
  return grid.rows.map((row) => ({
    slot: row.slot,
    time: formatTimeslot(row.slot, timeFormat),
    cells: row.cells.map((cell) => (cell ? formatter.format(cell.placement, cell.continuation) : null)),
  }));
}
