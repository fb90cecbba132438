import type { GridConfig, SchedulerSettings, TimeOfDay } from "./types";
import { RawSchedulerSettingsSchema, type RawSchedulerSettings } from "./shared/validation/schedulerSettingsSchema";
import { parseTimeOfDay } from "./domain/policies/timeOfDay";

/** Настройки по умолчанию. */
export const DEFAULT_SETTINGS: SchedulerSettings = {
  timeslot: {
    intervalMinutes: 15,
    startTime: "09:00",
    endTimeDurationMinutes: 8 * 60,
    minColumns: 4,
    timeFormat: "%I:%M %p",
  },
  occasion: {
    defaultDurationMinutes: 60,
  },
  log: {
    maxEntries: 2048,
  },
};

/**
 * Нормализовать “сырые” настройки.
 *
 * Делает:
 * - валидацию формы (zod); битый объект целиком → defaults
 * - заполнение значений по умолчанию
 * - ограничение чисел разумными границами
 */
export function normalizeSettings(raw: unknown): SchedulerSettings {
  const parsed = RawSchedulerSettingsSchema.safeParse(raw ?? {});
  const obj: RawSchedulerSettings = parsed.success ? parsed.data : {};
  const d = DEFAULT_SETTINGS;

  return {
    timeslot: {
      intervalMinutes: normalizeNumber(obj.timeslot?.intervalMinutes, { defaultValue: d.timeslot.intervalMinutes, min: 1, max: 24 * 60 }),
      startTime: normalizeStartTime(obj.timeslot?.startTime) ?? d.timeslot.startTime,
      // Длина может выходить за полночь: 15:00 + 10.5 ч = 01:30 следующего дня.
      endTimeDurationMinutes: normalizeNumber(obj.timeslot?.endTimeDurationMinutes, {
        defaultValue: d.timeslot.endTimeDurationMinutes,
        min: 0,
        max: 48 * 60,
      }),
      minColumns: normalizeNumber(obj.timeslot?.minColumns, { defaultValue: d.timeslot.minColumns, min: 0, max: 100 }),
      timeFormat: obj.timeslot?.timeFormat?.trim() || d.timeslot.timeFormat,
    },
    occasion: {
      defaultDurationMinutes: normalizeNumber(obj.occasion?.defaultDurationMinutes, {
        defaultValue: d.occasion.defaultDurationMinutes,
        min: 0,
        max: 7 * 24 * 60,
      }),
    },
    log: {
      maxEntries: normalizeNumber(obj.log?.maxEntries, { defaultValue: d.log.maxEntries, min: 10, max: 20_000 }),
    },
  };
}

/** Конфигурация сетки из настроек. */
export function toGridConfig(settings: SchedulerSettings): GridConfig {
  return {
    startTime: startTimeOf(settings),
    spanMinutes: settings.timeslot.endTimeDurationMinutes,
    slotMinutes: settings.timeslot.intervalMinutes,
    minColumns: settings.timeslot.minColumns,
  };
}

function startTimeOf(settings: SchedulerSettings): TimeOfDay {
  // normalizeSettings гарантирует корректный формат, но настройки могут прийти и не через него.
  return parseTimeOfDay(settings.timeslot.startTime) ?? { hours: 9, minutes: 0 };
}

function normalizeStartTime(v: string | undefined): string | undefined {
  if (v == null) return undefined;
  const t = parseTimeOfDay(v);
  if (!t) return undefined;
  return `${String(t.hours).padStart(2, "0")}:${String(t.minutes).padStart(2, "0")}`;
}

function normalizeNumber(v: unknown, params: { defaultValue: number; min?: number; max?: number }): number {
  const n = typeof v === "number" ? v : typeof v === "string" && v.trim() ? Number(v) : NaN;
  if (!Number.isFinite(n)) return params.defaultValue;
  const min = typeof params.min === "number" ? params.min : -Infinity;
  const max = typeof params.max === "number" ? params.max : Infinity;
  return Math.min(max, Math.max(min, Math.floor(n)));
}
