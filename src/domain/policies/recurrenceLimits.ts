import type { RecurrenceRule } from "../../types";

/** Числовые BYxxx-фильтры правила. */
export type NumericRuleFilter = "byMonthDay" | "byMonth" | "byYearDay" | "byWeekNo" | "bySetPos" | "byHour" | "byMinute" | "bySecond";

export type FilterLimit = { min: number; max: number; nonZero: boolean };

/**
 * Policy: допустимые значения BYxxx (RFC 5545). Отрицательные считаются с конца периода.
 *
 * Значение вне диапазона никогда не совпадёт: rrule будет перебирать даты до 9999 года.
 */
export const FILTER_LIMITS: Readonly<Record<NumericRuleFilter, FilterLimit>> = {
  byMonth: { min: 1, max: 12, nonZero: true },
  byMonthDay: { min: -31, max: 31, nonZero: true },
  byYearDay: { min: -366, max: 366, nonZero: true },
  byWeekNo: { min: -53, max: 53, nonZero: true },
  bySetPos: { min: -366, max: 366, nonZero: true },
  byHour: { min: 0, max: 23, nonZero: false },
  byMinute: { min: 0, max: 59, nonZero: false },
  bySecond: { min: 0, max: 59, nonZero: false },
};

export const NUMERIC_RULE_FILTERS = Object.keys(FILTER_LIMITS).filter(isNumericRuleFilter);

/** Порядковый номер дня недели в BYDAY (`-1FR`, `2MO`). */
export const WEEKDAY_ORDINAL_LIMIT: FilterLimit = { min: -53, max: 53, nonZero: true };

export function isWithinLimit(value: number, limit: FilterLimit): boolean {
  if (!Number.isInteger(value)) return false;
  if (limit.nonZero && value === 0) return false;
  return value >= limit.min && value <= limit.max;
}

/** Первый фильтр правила со значением вне диапазона (или `null`). */
export function findFilterOutOfRange(rule: RecurrenceRule): { filter: NumericRuleFilter; value: number } | null {
  for (const filter of NUMERIC_RULE_FILTERS) {
    for (const value of rule[filter] ?? []) {
      if (!isWithinLimit(value, FILTER_LIMITS[filter])) return { filter, value };
    }
  }
  return null;
}

function isNumericRuleFilter(key: string): key is NumericRuleFilter {
  return key in FILTER_LIMITS;
}
