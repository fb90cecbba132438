import "reflect-metadata";
import { randomBytes } from "node:crypto";
import { container, type DependencyContainer } from "tsyringe";
import type { SchedulerSettings } from "../types";
import type { MutableRef } from "../shared/mutableRef";
import type { EventRepository } from "../application/contracts/eventRepository";
import type { OccasionRepository } from "../application/contracts/occasionRepository";
import { LogService, type LogEntry } from "../log/logService";
import { normalizeSettings } from "../settingsStore";
import { InMemoryScheduleStore } from "../store/inMemoryScheduleStore";
import { makeEntityId } from "../domain/policies/entityId";
import { ScheduleEventUseCase } from "../application/events/scheduleEventUseCase";
import { DailyGridUseCase } from "../application/grid/dailyGridUseCase";

export type SchedulerContainerParams = {
  /** “Сырые” настройки; нормализуются через `normalizeSettings`. */
  settings?: unknown;
  /** Своё хранилище; по умолчанию: `InMemoryScheduleStore`. */
  repositories?: { events: EventRepository; occasions: OccasionRepository };
  nowMs?: () => number;
  onLogEntry?: (entry: LogEntry) => void;
};

/**
 * Tsyringe container (child container на экземпляр планировщика).
 *
 * DI без декораторов/emitDecoratorMetadata: все зависимости регистрируются явно,
 * поэтому любой токен можно переопределить в тестах или во встраивающем приложении.
 */
export function createSchedulerContainer(params: SchedulerContainerParams = {}): DependencyContainer {
  const c = container.createChildContainer();

  let settings = normalizeSettings(params.settings);
  const settingsRef: MutableRef<SchedulerSettings> = {
    get: () => settings,
    set: (next) => {
      settings = next;
    },
  };
  c.register<MutableRef<SchedulerSettings>>("scheduler.settingsRef", { useValue: settingsRef });
  // “Снимок” настроек на момент resolve.
  c.register<SchedulerSettings>("scheduler.settings", { useFactory: (cc) => cc.resolve<MutableRef<SchedulerSettings>>("scheduler.settingsRef").get() });

  const nowMs = params.nowMs ?? (() => Date.now());
  c.register<() => number>("clock.nowMs", { useValue: nowMs });
  c.register<(prefix: string) => string>("ids.make", {
    useValue: (prefix) => makeEntityId({ prefix, nowMs: nowMs(), randomHex: randomBytes(4).toString("hex") }),
  });

  c.register<LogService>("scheduler.logService", { useValue: new LogService(settings.log.maxEntries, params.onLogEntry, nowMs) });

  const repositories = params.repositories ?? inMemoryRepositories();
  c.register<EventRepository>("scheduler.eventRepository", { useValue: repositories.events });
  c.register<OccasionRepository>("scheduler.occasionRepository", { useValue: repositories.occasions });

  c.register(ScheduleEventUseCase, {
    useFactory: (cc) => {
      const ref = cc.resolve<MutableRef<SchedulerSettings>>("scheduler.settingsRef");
      return new ScheduleEventUseCase({
        getSettings: () => ref.get(),
        events: cc.resolve<EventRepository>("scheduler.eventRepository"),
        occasions: cc.resolve<OccasionRepository>("scheduler.occasionRepository"),
        nowMs: cc.resolve<() => number>("clock.nowMs"),
        makeId: cc.resolve<(prefix: string) => string>("ids.make"),
        log: cc.resolve<LogService>("scheduler.logService").scoped("События"),
      });
    },
  });

  c.register(DailyGridUseCase, {
    useFactory: (cc) => {
      const ref = cc.resolve<MutableRef<SchedulerSettings>>("scheduler.settingsRef");
      return new DailyGridUseCase({
        getSettings: () => ref.get(),
        occasions: cc.resolve<OccasionRepository>("scheduler.occasionRepository"),
        nowMs: cc.resolve<() => number>("clock.nowMs"),
        log: cc.resolve<LogService>("scheduler.logService"),
      });
    },
  });

  return c;
}

function inMemoryRepositories(): { events: EventRepository; occasions: OccasionRepository } {
  const store = new InMemoryScheduleStore();
  return { events: store, occasions: store };
}
