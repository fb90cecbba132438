import { RRule } from "rrule";
import type { RecurrenceRule, TimeInterval } from "../types";
import { InvalidRuleError } from "../shared/domainErrors";
import { findFilterOutOfRange, isWithinLimit, WEEKDAY_ORDINAL_LIMIT } from "../domain/policies/recurrenceLimits";
import { fromFloating } from "./floatingTime";
import { toRRuleOptions } from "./rruleOptions";

/** Потолок вхождений для правила без `count` (`until` с SECONDLY может дать миллионы). */
export const MAX_OCCURRENCES = 5000;

/**
 * Развернуть `(start, end, rule)` в упорядоченный конечный список интервалов.
 *
 * - без `count` и `until`: ровно один интервал `[start, end]`, rrule не вызывается;
 * - иначе каждое вхождение `t` правила (начиная со `start`) даёт `[t, t + (end - start)]`.
 *
 * `count` ограничивает разворот сам; правило только с `until` ограничено `MAX_OCCURRENCES`.
 * При ошибке бросает `InvalidRuleError` и ничего не возвращает частично.
 */
export function expandRecurrence(start: Date, end: Date, rule: RecurrenceRule = {}): TimeInterval[] {
  assertRule(start, end, rule);

  if (rule.count == null && rule.until == null) {
    return [{ start: new Date(start.getTime()), end: new Date(end.getTime()) }];
  }

  const deltaMs = end.getTime() - start.getTime();
  // rrule работает с точностью до секунды: миллисекунды снимаем и возвращаем после.
  const startMs = start.getMilliseconds();
  const dtstart = new Date(start.getTime() - startMs);

  const rrule = new RRule(toRRuleOptions(rule, dtstart));
  const bounded = rule.count != null;
  const anchors = bounded ? rrule.all() : rrule.all((_d, len) => len <= MAX_OCCURRENCES);
  if (!bounded && anchors.length > MAX_OCCURRENCES) {
    throw new InvalidRuleError("Планировщик: правило порождает слишком много вхождений", { max: MAX_OCCURRENCES });
  }

  return anchors.map((a) => {
    const t = fromFloating(a).getTime() + startMs;
    return { start: new Date(t), end: new Date(t + deltaMs) };
  });
}

function assertRule(start: Date, end: Date, rule: RecurrenceRule): void {
  if (!isValidDate(start) || !isValidDate(end)) {
    throw new InvalidRuleError("Планировщик: некорректные start/end");
  }
  if (end.getTime() < start.getTime()) {
    throw new InvalidRuleError("Планировщик: end раньше start", { start: start.toISOString(), end: end.toISOString() });
  }
  if (rule.interval != null && (!Number.isInteger(rule.interval) || rule.interval < 1)) {
    throw new InvalidRuleError("Планировщик: interval должен быть целым >= 1", { interval: rule.interval });
  }
  if (rule.count != null && (!Number.isInteger(rule.count) || rule.count < 1)) {
    throw new InvalidRuleError("Планировщик: count должен быть целым >= 1", { count: rule.count });
  }
  if (rule.until != null && !isValidDate(rule.until)) {
    throw new InvalidRuleError("Планировщик: некорректный until");
  }
  const outOfRange = findFilterOutOfRange(rule);
  if (outOfRange) {
    throw new InvalidRuleError(`Планировщик: недопустимое значение ${outOfRange.filter}`, { [outOfRange.filter]: outOfRange.value });
  }
  for (const spec of rule.byWeekday ?? []) {
    if (typeof spec !== "string" && !isWithinLimit(spec.n, WEEKDAY_ORDINAL_LIMIT)) {
      throw new InvalidRuleError("Планировщик: некорректный порядковый номер дня недели", { byWeekday: spec });
    }
  }
}

function isValidDate(d: Date): boolean {
  return d instanceof Date && !Number.isNaN(d.getTime());
}
