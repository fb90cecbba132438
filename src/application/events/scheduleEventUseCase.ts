import { addMinutes, startOfHour } from "date-fns";
import type { EventType, Occasion, RecurrenceRule, ScheduledEvent, SchedulerSettings, TimeInterval } from "../../types";
import type { EventRepository } from "../contracts/eventRepository";
import type { OccasionRepository } from "../contracts/occasionRepository";
import type { Logger } from "../../log/logService";
import { err, ok, type Result } from "../../shared/result";
import { toAppErrorDto } from "../../shared/appError";
import { APP_ERROR } from "../../shared/appErrorCodes";
import { expandRecurrence } from "../../recurrence/recurrenceExpander";
import { parseRecurrenceRule } from "../../recurrence/rruleString";
import { nextOccasion, upcomingOccasions } from "../../occasions/occasionQuery";

const MAX_TITLE_CHARS = 32;
const MAX_DESCRIPTION_CHARS = 100;

export type CreateEventInput = {
  title: string;
  description?: string;
  eventType?: EventType;
  /** По умолчанию: начало текущего часа. */
  start?: Date;
  /** По умолчанию: `start + occasion.defaultDurationMinutes`. */
  end?: Date;
  /** Объект правила или RRULE-строка. Без правила: одно вхождение. */
  rule?: RecurrenceRule | string;
};

export type ScheduleEventUseCaseDeps = {
  getSettings: () => SchedulerSettings;
  events: EventRepository;
  occasions: OccasionRepository;
  nowMs: () => number;
  makeId: (prefix: string) => string;
  log: Logger;
};

/**
 * Создание событий и их вхождений.
 *
 * Правило разворачивается целиком до записи: при ошибке правила в хранилище не попадает ничего.
 * Запись не транзакционная: если хранилище падает на середине, событие и часть вхождений остаются,
 * а в `details` ошибки лежат `persisted` / `expected`.
 */
export class ScheduleEventUseCase {
  constructor(private readonly deps: ScheduleEventUseCaseDeps) {}

  async createEvent(input: CreateEventInput): Promise<Result<{ event: ScheduledEvent; occasions: Occasion[] }>> {
    const title = String(input.title ?? "").trim();
    if (!title || title.length > MAX_TITLE_CHARS) {
      return err({ code: APP_ERROR.VALIDATION, message: `Планировщик: название обязательно (до ${MAX_TITLE_CHARS} символов)`, details: { title } });
    }
    const description = String(input.description ?? "").trim();
    if (description.length > MAX_DESCRIPTION_CHARS) {
      return err({ code: APP_ERROR.VALIDATION, message: `Планировщик: описание длиннее ${MAX_DESCRIPTION_CHARS} символов` });
    }

    const start = input.start ?? startOfHour(new Date(this.deps.nowMs()));
    const end = input.end ?? addMinutes(start, this.deps.getSettings().occasion.defaultDurationMinutes);
    const order = checkOrder(start, end);
    if (!order.ok) return order;
    const expanded = this.expand(start, end, input.rule);
    if (!expanded.ok) return expanded;

    const event: ScheduledEvent = { id: this.deps.makeId("evt"), title, description };
    if (input.eventType) event.eventType = { ...input.eventType };

    const saved: Occasion[] = [];
    try {
      await this.deps.events.saveEvent(event);
      await this.persist(event, expanded.value, saved);
      this.deps.log.info("событие создано", { eventId: event.id, occasions: saved.length });
      return ok({ event, occasions: saved });
    } catch (e) {
      const progress = { eventId: event.id, persisted: saved.length, expected: expanded.value.length };
      const dto = toAppErrorDto(e, { code: APP_ERROR.INTERNAL, message: "Планировщик: не удалось сохранить событие", details: progress });
      this.deps.log.error("создание события: ошибка", { code: dto.code, cause: dto.cause, ...progress });
      return err(dto);
    }
  }

  /** Добавить вхождения существующему событию (семантика правила: как в `createEvent`). */
  async addOccasions(event: ScheduledEvent, start: Date, end: Date, rule?: RecurrenceRule | string): Promise<Result<Occasion[]>> {
    const order = checkOrder(start, end);
    if (!order.ok) return order;
    const expanded = this.expand(start, end, rule);
    if (!expanded.ok) return expanded;
    const saved: Occasion[] = [];
    try {
      await this.persist(event, expanded.value, saved);
      this.deps.log.info("вхождения добавлены", { eventId: event.id, occasions: saved.length });
      return ok(saved);
    } catch (e) {
      const progress = { eventId: event.id, persisted: saved.length, expected: expanded.value.length };
      const dto = toAppErrorDto(e, { code: APP_ERROR.INTERNAL, message: "Планировщик: не удалось сохранить вхождения", details: progress });
      this.deps.log.error("добавление вхождений: ошибка", { code: dto.code, cause: dto.cause, ...progress });
      return err(dto);
    }
  }

  /** Вхождения события, начинающиеся не раньше текущего момента. */
  async upcomingOccasions(eventId: string): Promise<Result<Occasion[]>> {
    try {
      const all = await this.deps.occasions.listOccasions({ eventId });
      return ok(upcomingOccasions(all, new Date(this.deps.nowMs())));
    } catch (e) {
      return err(toAppErrorDto(e, { code: APP_ERROR.INTERNAL, message: "Планировщик: не удалось загрузить вхождения", details: { eventId } }));
    }
  }

  /** Ближайшее предстоящее вхождение события (или `null`). */
  async nextOccasion(eventId: string): Promise<Result<Occasion | null>> {
    try {
      const all = await this.deps.occasions.listOccasions({ eventId });
      return ok(nextOccasion(all, new Date(this.deps.nowMs())));
    } catch (e) {
      return err(toAppErrorDto(e, { code: APP_ERROR.INTERNAL, message: "Планировщик: не удалось загрузить вхождения", details: { eventId } }));
    }
  }

  private expand(start: Date, end: Date, rule?: RecurrenceRule | string): Result<TimeInterval[]> {
    try {
      const resolved = typeof rule === "string" ? parseRecurrenceRule(rule) : rule;
      return ok(expandRecurrence(start, end, resolved));
    } catch (e) {
      const dto = toAppErrorDto(e, { code: APP_ERROR.INVALID_RULE, message: "Планировщик: некорректное правило повторения" });
      this.deps.log.warn("правило отклонено", { code: dto.code, message: dto.message, details: dto.details });
      return err(dto);
    }
  }

  /** Пишет по одному; `saved` к моменту ошибки содержит уже записанные вхождения. */
  private async persist(event: ScheduledEvent, intervals: TimeInterval[], saved: Occasion[]): Promise<void> {
    for (const interval of intervals) {
      const occasion: Occasion = { id: this.deps.makeId("occ"), start: interval.start, end: interval.end, event };
      await this.deps.occasions.saveOccasion(occasion);
      saved.push(occasion);
    }
  }
}

function checkOrder(start: Date, end: Date): Result<void> {
  // Невалидные даты отклоняет разворот правила (E_INVALID_RULE).
  if (!(end.getTime() < start.getTime())) return ok(undefined);
  return err({
    code: APP_ERROR.VALIDATION,
    message: "Планировщик: окончание раньше начала",
    details: { start: start.toISOString(), end: end.toISOString() },
  });
}
