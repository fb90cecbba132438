/** Частота повторения (RFC 5545 FREQ). */
export type RecurrenceFrequency = "YEARLY" | "MONTHLY" | "WEEKLY" | "DAILY" | "HOURLY" | "MINUTELY" | "SECONDLY";

/** День недели в нотации RRULE (BYDAY / WKST). */
export type WeekdayCode = "MO" | "TU" | "WE" | "TH" | "FR" | "SA" | "SU";

/** BYDAY: либо просто день, либо день с порядковым номером (`-1FR` = последняя пятница). */
export type WeekdaySpec = WeekdayCode | { day: WeekdayCode; n: number };

/** Интервал времени. Инвариант: `end >= start`. */
export interface TimeInterval {
  readonly start: Date;
  readonly end: Date;
}

/**
 * Правило повторения.
 *
 * Без `count` и без `until` правило вырожденное: ровно одно вхождение (сам `start..end`).
 */
export interface RecurrenceRule {
  /** По умолчанию DAILY. */
  freq?: RecurrenceFrequency;
  /** По умолчанию 1. */
  interval?: number;
  count?: number;
  /** Включительно. */
  until?: Date;
  wkst?: WeekdayCode;
  byWeekday?: WeekdaySpec[];
  byMonthDay?: number[];
  byMonth?: number[];
  byYearDay?: number[];
  byWeekNo?: number[];
  bySetPos?: number[];
  byHour?: number[];
  byMinute?: number[];
  bySecond?: number[];
}

/** Тип (категория) события: по `abbr` выбирается палитра CSS-классов в сетке. */
export interface EventType {
  abbr: string;
  label: string;
}

/** Событие-владелец. Живёт независимо от своих вхождений. */
export interface ScheduledEvent {
  id: string;
  title: string;
  description: string;
  eventType?: EventType;
}

/** Конкретное вхождение события. После создания не меняется. */
export interface Occasion extends TimeInterval {
  readonly id: string;
  readonly event: ScheduledEvent;
}

/** Время суток (локальное). */
export interface TimeOfDay {
  hours: number;
  minutes: number;
}

/**
 * Конфигурация сетки таймслотов на день.
 *
 * Сетка покрывает `[day + startTime, day + startTime + spanMinutes]` включительно,
 * слоты ровно через `slotMinutes`: всего `floor(spanMinutes / slotMinutes) + 1` строк.
 */
export interface GridConfig {
  startTime: TimeOfDay;
  spanMinutes: number;
  slotMinutes: number;
  minColumns: number;
}

/** Почему вхождение не попало в сетку (деградация отображения, не ошибка). */
export type SkipReason = "ended_before_grid" | "unaligned_start";

export interface SkippedOccasion {
  occasion: Occasion;
  reason: SkipReason;
}

/** Все настройки планировщика (после нормализации). */
export interface SchedulerSettings {
  timeslot: {
    /** Шаг слота, мин. */
    intervalMinutes: number;
    /** Начало сетки, `HH:mm`. */
    startTime: string;
    /** Длина сетки от `startTime`, мин. Может выходить за полночь. */
    endTimeDurationMinutes: number;
    minColumns: number;
    /** strftime-шаблон подписи слота. */
    timeFormat: string;
  };
  occasion: {
    /** Длительность нового вхождения, если `end` не указан, мин. */
    defaultDurationMinutes: number;
  };
  log: {
    maxEntries: number;
  };
}
