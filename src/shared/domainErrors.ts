import { AppError } from "./appError";
import { APP_ERROR } from "./appErrorCodes";

/** Некорректное правило повторения (interval < 1, count < 1, битая RRULE-строка и т.п.). */
export class InvalidRuleError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: APP_ERROR.INVALID_RULE, message, details });
    this.name = "InvalidRuleError";
  }
}

/** Некорректная конфигурация сетки (шаг слота <= 0 и т.п.). Бросается до построения строк. */
export class InvalidConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: APP_ERROR.INVALID_CONFIG, message, details });
    this.name = "InvalidConfigError";
  }
}
