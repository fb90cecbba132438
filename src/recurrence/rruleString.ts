import { RRule, type Options } from "rrule";
import type { RecurrenceRule } from "../types";
import { InvalidRuleError } from "../shared/domainErrors";
import { fromRRuleOptions } from "./rruleOptions";

/**
 * Распарсить RRULE-строку (RFC 5545) в `RecurrenceRule`.
 *
 * Пример: `FREQ=WEEKLY;COUNT=4;BYDAY=MO,WE` (префикс `RRULE:` допускается).
 * UNTIL трактуется как локальное время (суффикс `Z` не сдвигает момент).
 */
export function parseRecurrenceRule(raw: string): RecurrenceRule {
  const text = String(raw ?? "")
    .trim()
    .replace(/^RRULE:/i, "");
  if (!text) throw new InvalidRuleError("Планировщик: пустая RRULE");

  let opts: Partial<Options>;
  try {
    opts = RRule.parseString(text);
  } catch (e) {
    throw new InvalidRuleError("Планировщик: не удалось разобрать RRULE", { rrule: text, cause: e instanceof Error ? e.message : String(e) });
  }
  const rule = fromRRuleOptions(opts);
  if (!rule.freq) throw new InvalidRuleError("Планировщик: в RRULE нет корректного FREQ", { rrule: text });
  return rule;
}
