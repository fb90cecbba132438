export type Result<T> = { ok: true; value: T } | { ok: false; error: AppErrorDto };

export type ErrorCode = "E_VALIDATION" | "E_INVALID_RULE" | "E_INVALID_CONFIG" | "E_NOT_FOUND" | "E_INTERNAL";

/**
 * Унифицированная ошибка уровня приложения.
 *
 * - `message`: можно показывать пользователю
 * - `cause`: диагностика для лога
 */
export type AppErrorDto = {
  code: ErrorCode;
  message: string;
  cause?: string;
  details?: Record<string, unknown>;
};

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(error: AppErrorDto): Result<T> {
  return { ok: false, error };
}

export function isOk<T>(r: Result<T>): r is { ok: true; value: T } {
  return r.ok;
}

export function isErr<T>(r: Result<T>): r is { ok: false; error: AppErrorDto } {
  return !r.ok;
}
