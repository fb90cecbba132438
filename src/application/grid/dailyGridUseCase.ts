import { endOfDay, format, startOfDay } from "date-fns";
import type { GridConfig, Occasion, SchedulerSettings } from "../../types";
import type { OccasionRepository } from "../contracts/occasionRepository";
import type { OccasionFilter } from "../../occasions/occasionQuery";
import type { Logger } from "../../log/logService";
import { err, ok, type Result } from "../../shared/result";
import { toAppErrorDto } from "../../shared/appError";
import { APP_ERROR } from "../../shared/appErrorCodes";
import { toGridConfig } from "../../settingsStore";
import { combineDayAndTime } from "../../domain/policies/timeOfDay";
import { buildTimeslotGrid, type TimeslotGrid } from "../../grid/timeslotGrid";
import { EventClassCycler } from "../../grid/eventClassCycler";
import { renderTimeslotGrid, type PlacementFormatter, type RenderedTimeslotRow } from "../../presentation/placementFormatter";

export type DailyGridUseCaseDeps = {
  getSettings: () => SchedulerSettings;
  occasions: OccasionRepository;
  nowMs: () => number;
  log: Logger;
  /** Новый cycler на каждое построение; `null`: без CSS-классов. */
  createClassCycler?: () => EventClassCycler | null;
};

/** Сетка таймслотов на день: загрузка вхождений → раскладка → (опционально) форматирование. */
export class DailyGridUseCase {
  constructor(private readonly deps: DailyGridUseCaseDeps) {}

  async buildForDay(day?: Date, filter?: OccasionFilter): Promise<Result<TimeslotGrid>> {
    const d = day ?? new Date(this.deps.nowMs());
    const dayKey = format(d, "yyyy-MM-dd");
    const config = toGridConfig(this.deps.getSettings());

    let items: Occasion[];
    try {
      items = await this.deps.occasions.loadOccasionsInWindow(startOfDay(d), loadWindowEnd(d, config), filter);
    } catch (e) {
      const dto = toAppErrorDto(e, { code: APP_ERROR.INTERNAL, message: "Планировщик: не удалось загрузить вхождения дня", details: { day: dayKey } });
      this.deps.log.error("Сетка: загрузка: ошибка", { code: dto.code, cause: dto.cause });
      return err(dto);
    }

    let grid: TimeslotGrid;
    try {
      const classCycler = this.deps.createClassCycler ? this.deps.createClassCycler() : new EventClassCycler();
      grid = buildTimeslotGrid(d, config, items, classCycler ? { classCycler } : undefined);
    } catch (e) {
      const dto = toAppErrorDto(e, { code: APP_ERROR.INVALID_CONFIG, message: "Планировщик: некорректная конфигурация сетки" });
      this.deps.log.error("Сетка: построение: ошибка", { code: dto.code, details: dto.details });
      return err(dto);
    }

    for (const s of grid.skipped) {
      // Закончившиеся до начала сетки: норма (вчерашние хвосты), не шумим.
      if (s.reason === "unaligned_start") {
        this.deps.log.warn("Сетка: вхождение не выровнено по слоту, пропущено", { day: dayKey, occasionId: s.occasion.id, start: s.occasion.start });
      }
    }
    this.deps.log.info("Сетка: построена", { day: dayKey, rows: grid.rows.length, columns: grid.columnCount, loaded: items.length, skipped: grid.skipped.length });
    return ok(grid);
  }

  async renderForDay<T>(formatter: PlacementFormatter<T>, day?: Date, filter?: OccasionFilter): Promise<Result<Array<RenderedTimeslotRow<T>>>> {
    const r = await this.buildForDay(day, filter);
    if (!r.ok) return r;
    return ok(renderTimeslotGrid(r.value, formatter, this.deps.getSettings().timeslot.timeFormat));
  }
}

/** Конец окна загрузки: конец дня или конец сетки, если она уходит за полночь. */
function loadWindowEnd(day: Date, config: GridConfig): Date {
  const dayEnd = endOfDay(day);
  const gridEndMs = combineDayAndTime(day, config.startTime).getTime() + Math.round(config.spanMinutes * 60_000);
  // Некорректный конфиг отклонит buildTimeslotGrid, здесь только не даём NaN в окно.
  return Number.isFinite(gridEndMs) && gridEndMs > dayEnd.getTime() ? new Date(gridEndMs) : dayEnd;
}
