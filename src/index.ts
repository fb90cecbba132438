export type {
  EventType,
  GridConfig,
  Occasion,
  RecurrenceFrequency,
  RecurrenceRule,
  ScheduledEvent,
  SchedulerSettings,
  SkippedOccasion,
  SkipReason,
  TimeInterval,
  TimeOfDay,
  WeekdayCode,
  WeekdaySpec,
} from "./types";

export { expandRecurrence, MAX_OCCURRENCES } from "./recurrence/recurrenceExpander";
export { FILTER_LIMITS, WEEKDAY_ORDINAL_LIMIT, type FilterLimit, type NumericRuleFilter } from "./domain/policies/recurrenceLimits";
export { parseRecurrenceRule } from "./recurrence/rruleString";
export { dailyOccasions, nextOccasion, overlapping, upcomingOccasions, type OccasionFilter } from "./occasions/occasionQuery";
export { dayWindow, monthBoundaries } from "./domain/policies/dayBoundaries";
export { buildTimeslotGrid, type BuildTimeslotGridOptions, type GridCell, type TimeslotGrid, type TimeslotRow } from "./grid/timeslotGrid";
export { OccasionPlacement } from "./grid/occasionPlacement";
export { EventClassCycler, defaultEventPalette, FALLBACK_PALETTE } from "./grid/eventClassCycler";
export {
  DefaultPlacementFormatter,
  renderTimeslotGrid,
  type PlacementFormatter,
  type PlacementView,
  type RenderedTimeslotRow,
} from "./presentation/placementFormatter";
export { formatTimeslot } from "./domain/policies/timeslotFormat";

export type { EventRepository } from "./application/contracts/eventRepository";
export type { OccasionRepository } from "./application/contracts/occasionRepository";
export { InMemoryScheduleStore } from "./store/inMemoryScheduleStore";
export { ScheduleEventUseCase, type CreateEventInput, type ScheduleEventUseCaseDeps } from "./application/events/scheduleEventUseCase";
export { DailyGridUseCase, type DailyGridUseCaseDeps } from "./application/grid/dailyGridUseCase";
export { createSchedulerContainer, type SchedulerContainerParams } from "./di/schedulerContainer";

export { DEFAULT_SETTINGS, normalizeSettings, toGridConfig } from "./settingsStore";
export { parseRawRecurrenceRule, RawRecurrenceRuleSchema } from "./shared/validation/recurrenceRuleSchema";
export { LogService, type LogEntry, type LogLevel, type Logger } from "./log/logService";
export { AppError, isAppError, toAppErrorDto } from "./shared/appError";
export { APP_ERROR, type AppErrorCode } from "./shared/appErrorCodes";
export { InvalidConfigError, InvalidRuleError } from "./shared/domainErrors";
export { err, isErr, isOk, ok, type AppErrorDto, type ErrorCode, type Result } from "./shared/result";
