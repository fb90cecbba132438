import { z } from "zod";
import type { RecurrenceRule } from "../../types";
import { err, ok, type Result } from "../result";
import { toAppErrorDto } from "../appError";
import { APP_ERROR } from "../appErrorCodes";
import { parseRecurrenceRule } from "../../recurrence/rruleString";
import { FILTER_LIMITS, WEEKDAY_ORDINAL_LIMIT, type FilterLimit } from "../../domain/policies/recurrenceLimits";

/**
 * Runtime-валидация “сырого” правила повторения (payload извне: JSON, форма, API).
 *
 * Проверяем форму и диапазоны BYxxx; семантику (interval >= 1, count >= 1) проверяет `expandRecurrence`.
 */

const zLimited = (limit: FilterLimit) =>
  z
    .number()
    .int()
    .min(limit.min)
    .max(limit.max)
    .refine((v) => !limit.nonZero || v !== 0, { message: "не может быть 0" });
const zFilter = (limit: FilterLimit) => z.array(zLimited(limit));
const WeekdayCodeSchema = z.enum(["MO", "TU", "WE", "TH", "FR", "SA", "SU"]);

export const RawRecurrenceRuleSchema = z
  .object({
    freq: z.enum(["YEARLY", "MONTHLY", "WEEKLY", "DAILY", "HOURLY", "MINUTELY", "SECONDLY"]).optional(),
    interval: z.number().int().optional(),
    count: z.number().int().optional(),
    // ISO-строка без зоны трактуется как локальное время.
    until: z.coerce.date().optional(),
    wkst: WeekdayCodeSchema.optional(),
    byWeekday: z.array(z.union([WeekdayCodeSchema, z.object({ day: WeekdayCodeSchema, n: zLimited(WEEKDAY_ORDINAL_LIMIT) }).strict()])).optional(),
    byMonthDay: zFilter(FILTER_LIMITS.byMonthDay).optional(),
    byMonth: zFilter(FILTER_LIMITS.byMonth).optional(),
    byYearDay: zFilter(FILTER_LIMITS.byYearDay).optional(),
    byWeekNo: zFilter(FILTER_LIMITS.byWeekNo).optional(),
    bySetPos: zFilter(FILTER_LIMITS.bySetPos).optional(),
    byHour: zFilter(FILTER_LIMITS.byHour).optional(),
    byMinute: zFilter(FILTER_LIMITS.byMinute).optional(),
    bySecond: zFilter(FILTER_LIMITS.bySecond).optional(),
  })
  .strict();

/**
 * Разобрать правило из объекта или RRULE-строки.
 *
 * Строка → `parseRecurrenceRule`, объект → zod-схема. Ошибки формы → `E_VALIDATION`,
 * битая RRULE → `E_INVALID_RULE`.
 */
export function parseRawRecurrenceRule(raw: unknown): Result<RecurrenceRule> {
  if (typeof raw === "string") {
    try {
      return ok(parseRecurrenceRule(raw));
    } catch (e) {
      return err(toAppErrorDto(e, { code: APP_ERROR.INVALID_RULE, message: "Планировщик: не удалось разобрать RRULE" }));
    }
  }

  const parsed = RawRecurrenceRuleSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    return err({
      code: APP_ERROR.VALIDATION,
      message: "Планировщик: некорректное правило повторения",
      details: { issues: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`) },
    });
  }
  return ok(parsed.data);
}
