import type { Occasion, ScheduledEvent } from "../types";
import type { EventRepository } from "../application/contracts/eventRepository";
import type { OccasionRepository } from "../application/contracts/occasionRepository";
import { dailyOccasions, overlapping, type OccasionFilter } from "../occasions/occasionQuery";
import { compareOccasions } from "../domain/policies/occasionOrder";

/**
 * In-memory стор событий и вхождений.
 *
 * - вхождения держим отсортированными по (start, end)
 * - индекс по событию для выборок `eventId`
 * - наружу отдаём только копии списков
 *
 * Используется тестами и встраивающими приложениями без собственной БД.
 */
export class InMemoryScheduleStore implements EventRepository, OccasionRepository {
  private events = new Map<string, ScheduledEvent>();
  private occasions: Occasion[] = [];
  private byEventId = new Map<string, Occasion[]>();

  async saveEvent(event: ScheduledEvent): Promise<void> {
    this.events.set(event.id, { ...event });
  }

  async getEvent(id: string): Promise<ScheduledEvent | null> {
    const ev = this.events.get(id);
    return ev ? { ...ev } : null;
  }

  /** Сохранить вхождение (повторное сохранение с тем же `id` заменяет запись). */
  async saveOccasion(occasion: Occasion): Promise<void> {
    const rest = this.occasions.filter((o) => o.id !== occasion.id);
    const at = rest.findIndex((o) => compareOccasions(occasion, o) < 0);
    if (at < 0) rest.push(occasion);
    else rest.splice(at, 0, occasion);
    this.occasions = rest;
    this.rebuildIndexes();
  }

  async loadOccasionsForDay(day: Date, filter?: OccasionFilter): Promise<Occasion[]> {
    return dailyOccasions(this.scope(filter), { day });
  }

  async loadOccasionsInWindow(start: Date, end: Date, filter?: OccasionFilter): Promise<Occasion[]> {
    return overlapping(this.scope(filter), start, end);
  }

  async listOccasions(filter?: OccasionFilter): Promise<Occasion[]> {
    return this.scope(filter).slice();
  }

  /** Количество вхождений (для диагностики). */
  size(): number {
    return this.occasions.length;
  }

  private scope(filter?: OccasionFilter): readonly Occasion[] {
    if (filter?.eventId == null) return this.occasions;
    return this.byEventId.get(filter.eventId) ?? [];
  }

  private rebuildIndexes() {
    this.byEventId.clear();
    for (const o of this.occasions) {
      const list = this.byEventId.get(o.event.id);
      if (list) list.push(o);
      else this.byEventId.set(o.event.id, [o]);
    }
  }
}
