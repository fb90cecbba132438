import { RRule, Weekday, type ByWeekday, type Frequency, type Options } from "rrule";
import type { RecurrenceFrequency, RecurrenceRule, WeekdayCode, WeekdaySpec } from "../types";
import { InvalidRuleError } from "../shared/domainErrors";
import { isWithinLimit, WEEKDAY_ORDINAL_LIMIT } from "../domain/policies/recurrenceLimits";
import { fromFloating, toFloating } from "./floatingTime";

const FREQUENCY_NAMES: readonly RecurrenceFrequency[] = ["YEARLY", "MONTHLY", "WEEKLY", "DAILY", "HOURLY", "MINUTELY", "SECONDLY"];

const FREQUENCIES: Record<RecurrenceFrequency, Frequency> = {
  YEARLY: RRule.YEARLY,
  MONTHLY: RRule.MONTHLY,
  WEEKLY: RRule.WEEKLY,
  DAILY: RRule.DAILY,
  HOURLY: RRule.HOURLY,
  MINUTELY: RRule.MINUTELY,
  SECONDLY: RRule.SECONDLY,
};

// Индекс = `Weekday.weekday` в rrule (0 = MO).
const WEEKDAY_CODES: readonly WeekdayCode[] = ["MO", "TU", "WE", "TH", "FR", "SA", "SU"];

const WEEKDAYS: Record<WeekdayCode, Weekday> = {
  MO: RRule.MO,
  TU: RRule.TU,
  WE: RRule.WE,
  TH: RRule.TH,
  FR: RRule.FR,
  SA: RRule.SA,
  SU: RRule.SU,
};

// Числовые BYxxx: наше имя ↔ имя в опциях rrule.
const NUMERIC_FIELDS = [
  ["byMonthDay", "bymonthday"],
  ["byMonth", "bymonth"],
  ["byYearDay", "byyearday"],
  ["byWeekNo", "byweekno"],
  ["bySetPos", "bysetpos"],
  ["byHour", "byhour"],
  ["byMinute", "byminute"],
  ["bySecond", "bysecond"],
] as const;

/**
 * Собрать опции rrule из нашего правила.
 *
 * `dtstart` и `until` переводятся в плавающее время (см. floatingTime.ts).
 */
export function toRRuleOptions(rule: RecurrenceRule, dtstart: Date): Partial<Options> {
  const opts: Partial<Options> = {
    freq: FREQUENCIES[rule.freq ?? "DAILY"],
    dtstart: toFloating(dtstart),
    interval: rule.interval ?? 1,
  };
  if (rule.count != null) opts.count = rule.count;
  if (rule.until != null) opts.until = toFloating(rule.until);
  if (rule.wkst) opts.wkst = WEEKDAYS[rule.wkst];
  if (rule.byWeekday?.length) opts.byweekday = rule.byWeekday.map(toRRuleWeekday);
  for (const [ours, theirs] of NUMERIC_FIELDS) {
    const values = rule[ours];
    if (values?.length) opts[theirs] = values;
  }
  return opts;
}

function toRRuleWeekday(spec: WeekdaySpec): Weekday {
  if (typeof spec === "string") return WEEKDAYS[spec];
  // rrule не умеет n = 0 (бросает), поэтому проверяем заранее.
  if (!isWithinLimit(spec.n, WEEKDAY_ORDINAL_LIMIT)) {
    throw new InvalidRuleError("Планировщик: некорректный порядковый номер дня недели", { byWeekday: spec });
  }
  return WEEKDAYS[spec.day].nth(spec.n);
}

/** Обратное преобразование: опции rrule (например, из RRULE-строки) → наше правило. */
export function fromRRuleOptions(opts: Partial<Options>): RecurrenceRule {
  const freq = opts.freq == null ? undefined : frequencyName(opts.freq);
  const rule: RecurrenceRule = {};
  if (freq) rule.freq = freq;
  if (opts.interval != null) rule.interval = opts.interval;
  if (opts.count != null) rule.count = opts.count;
  if (opts.until != null) rule.until = fromFloating(opts.until);
  if (opts.wkst != null) rule.wkst = weekdayCode(opts.wkst);

  const byWeekday = toArray(opts.byweekday).map(fromRRuleWeekday);
  if (byWeekday.length) rule.byWeekday = byWeekday;

  for (const [ours, theirs] of NUMERIC_FIELDS) {
    const values = toArray(opts[theirs]);
    if (values.length) rule[ours] = values;
  }
  return rule;
}

function frequencyName(freq: Frequency): RecurrenceFrequency | undefined {
  return FREQUENCY_NAMES.find((name) => FREQUENCIES[name] === freq);
}

function weekdayCode(w: Weekday | number): WeekdayCode {
  const idx = typeof w === "number" ? w : w.weekday;
  return WEEKDAY_CODES[((idx % 7) + 7) % 7];
}

function fromRRuleWeekday(w: ByWeekday): WeekdaySpec {
  if (typeof w === "string") return w;
  if (typeof w === "number") return weekdayCode(w);
  const day = weekdayCode(w);
  return w.n ? { day, n: w.n } : day;
}

function toArray<T>(v: T | T[] | null | undefined): T[] {
  if (v == null) return [];
  return Array.isArray(v) ? v : [v];
}
