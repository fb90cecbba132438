import { z } from "zod";

/**
 * Runtime-валидация “сырых” настроек (JSON-файл, env, объект от встраивающего приложения).
 *
 * Важно:
 * - схема описывает RAW формат, где числа могут прийти строками
 * - окончательная нормализация (defaults, границы) делается в `normalizeSettings()`
 */

const zStr = z.string();
const zNumOrStr = z.union([z.number(), z.string()]);

export const RawSchedulerSettingsSchema = z
  .object({
    timeslot: z
      .object({
        intervalMinutes: zNumOrStr.optional(),
        startTime: zStr.optional(),
        endTimeDurationMinutes: zNumOrStr.optional(),
        minColumns: zNumOrStr.optional(),
        timeFormat: zStr.optional(),
      })
      .strict()
      .optional(),

    occasion: z
      .object({
        defaultDurationMinutes: zNumOrStr.optional(),
      })
      .strict()
      .optional(),

    log: z
      .object({
        maxEntries: zNumOrStr.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type RawSchedulerSettings = z.infer<typeof RawSchedulerSettingsSchema>;
