import type { AppErrorDto, ErrorCode } from "./result";

/**
 * Typed error для мест, где используется `throw`, но нужно переносить код ошибки и контекст.
 *
 * Важно: `message` в AppErrorDto можно показывать пользователю.
 */
export class AppError extends Error {
  readonly dto: AppErrorDto;

  constructor(dto: AppErrorDto) {
    super(dto.message);
    this.name = "AppError";
    this.dto = dto;
  }
}

export function isAppError(e: unknown): e is AppError {
  return e instanceof AppError || (e instanceof Error && "dto" in e && isAppErrorDto(e.dto));
}

function isAppErrorDto(v: unknown): v is AppErrorDto {
  if (typeof v !== "object" || v === null) return false;
  return "code" in v && typeof v.code === "string" && "message" in v && typeof v.message === "string";
}

export function toAppErrorDto(e: unknown, fallback: { code: ErrorCode; message: string; details?: Record<string, unknown> }): AppErrorDto {
  // Структурная проверка: AppError из другого бандла/realm не пройдёт instanceof.
  if (isAppError(e)) return e.dto;

  const msg = e instanceof Error ? e.message : "";
  const stack = e instanceof Error && e.stack ? e.stack : "";
  const bits = [msg, stack].filter(Boolean);
  const cause = bits.length ? bits.join("\n") : String(e ?? "неизвестная ошибка");

  return { code: fallback.code, message: fallback.message, cause, details: fallback.details };
}
