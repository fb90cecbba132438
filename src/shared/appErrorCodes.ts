import type { ErrorCode } from "./result";

/**
 * Единый набор кодов ошибок (AppErrorDto.code).
 *
 * Коды стабильны: на них завязаны тесты и потребители Result.
 */
export const APP_ERROR = {
  VALIDATION: "E_VALIDATION",
  INVALID_RULE: "E_INVALID_RULE",
  INVALID_CONFIG: "E_INVALID_CONFIG",
  NOT_FOUND: "E_NOT_FOUND",
  INTERNAL: "E_INTERNAL",
} as const satisfies Record<string, ErrorCode>;

export type AppErrorCode = (typeof APP_ERROR)[keyof typeof APP_ERROR];
