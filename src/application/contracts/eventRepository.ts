import type { ScheduledEvent } from "../../types";

/** Порт хранилища событий-владельцев. */
export interface EventRepository {
  saveEvent(event: ScheduledEvent): Promise<void>;
  getEvent(id: string): Promise<ScheduledEvent | null>;
}
