import type { Occasion } from "../types";

/**
 * Размещение вхождения в колонке сетки.
 *
 * Один экземпляр разделяется всеми ячейками, которые занимает вхождение:
 * класс, назначенный через любую ячейку, виден из всех остальных.
 */
export class OccasionPlacement {
  private cls = "";

  constructor(
    readonly occasion: Occasion,
    readonly column: number,
  ) {}

  /** CSS-класс для отображения (пустая строка, пока не назначен). */
  get eventClass(): string {
    return this.cls;
  }

  /** Категория для палитры: `abbr` типа события. */
  get category(): string | undefined {
    return this.occasion.event.eventType?.abbr;
  }

  /**
   * Назначить класс. Побеждает первое назначение: повторный вызов ничего не меняет.
   *
   * @returns `true`, если класс был назначен этим вызовом
   */
  assignEventClass(cls: string): boolean {
    if (this.cls || !cls) return false;
    this.cls = cls;
    return true;
  }
}
