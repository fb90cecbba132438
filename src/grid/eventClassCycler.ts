/** Палитра по умолчанию для вхождений без типа события. */
export const FALLBACK_PALETTE: readonly string[] = ["evt-even", "evt-odd"];

/** Палитра для типа события `abbr`: `evt-<abbr>-even`, `evt-<abbr>-odd`. */
export function defaultEventPalette(category?: string): readonly string[] {
  const abbr = String(category ?? "").trim();
  return abbr ? [`evt-${abbr}-even`, `evt-${abbr}-odd`] : FALLBACK_PALETTE;
}

/**
 * Чередование CSS-классов по колонкам сетки.
 *
 * Для каждой пары (колонка, категория) свой счётчик: `next()` отдаёт `palette[i++ % palette.length]`.
 * Экземпляр живёт в пределах одного построения сетки.
 */
export class EventClassCycler {
  private readonly counters = new Map<string, number>();

  constructor(private readonly paletteFor: (category?: string) => readonly string[] = defaultEventPalette) {}

  next(column: number, category?: string): string {
    const custom = this.paletteFor(category);
    const palette = custom.length ? custom : FALLBACK_PALETTE;
    const key = `${column}\u0000${category ?? ""}`;
    const i = this.counters.get(key) ?? 0;
    this.counters.set(key, i + 1);
    return palette[i % palette.length];
  }
}
