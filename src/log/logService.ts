/** Уровень записи лога. */
export type LogLevel = "info" | "warn" | "error";

/** Одна запись лога. */
export interface LogEntry {
  /** Unix time в мс. */
  ts: number;
  level: LogLevel;
  message: string;
  /** Доп. данные (для диагностики). */
  data?: Record<string, unknown>;
}

/** Минимальный интерфейс логгера, от которого зависят use-cases. */
export type Logger = {
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
};

type Listener = () => void;

const MAX_STRING_CHARS = 4000;
const MAX_ARRAY_ITEMS = 200;
const MAX_OBJECT_KEYS = 200;
const MAX_DEPTH = 6;

/**
 * In-memory лог (кольцевой буфер).
 *
 * Внешний sink (файл, stdout, телеметрия встраивающего приложения) подключается через `onEntry`.
 */
export class LogService implements Logger {
  private maxEntries: number;
  private entries: LogEntry[] = [];
  private listeners = new Set<Listener>();
  private readonly onEntry?: (entry: LogEntry) => void;
  private readonly nowMs: () => number;

  /** @param onEntry Коллбек на каждую новую запись (уже санитизированную). */
  constructor(maxEntries: number, onEntry?: (entry: LogEntry) => void, nowMs: () => number = () => Date.now()) {
    this.maxEntries = Math.max(10, maxEntries);
    this.onEntry = onEntry;
    this.nowMs = nowMs;
  }

  /** Изменить лимит записей (с обрезкой старых). */
  setMaxEntries(maxEntries: number) {
    this.maxEntries = Math.max(10, maxEntries);
    this.trim();
    this.emit();
  }

  onChange(cb: Listener) {
    this.listeners.add(cb);
    return () => this.listeners.delete(cb);
  }

  /** Копия текущих записей. */
  list(): LogEntry[] {
    return this.entries.slice();
  }

  /**
   * Логгер “в скоупе”: префикс сообщения + фиксированный контекст.
   *
   * Пример:
   *   const log = base.scoped("Сетка", { day: "2024-01-15" });
   *   log.info("построена", { rows: 33 });   // → "Сетка: построена", { day, rows }
   */
  scoped(scope: string, fixed?: Record<string, unknown>): Logger {
    const prefix = String(scope ?? "").trim();
    const msg = (message: string) => (prefix ? `${prefix}: ${message}` : message);
    const merge = (data?: Record<string, unknown>) => {
      if (!fixed && !data) return undefined;
      return { ...(fixed ?? {}), ...(data ?? {}) };
    };
    return {
      info: (message, data) => this.info(msg(message), merge(data)),
      warn: (message, data) => this.warn(msg(message), merge(data)),
      error: (message, data) => this.error(msg(message), merge(data)),
    };
  }

  info(message: string, data?: Record<string, unknown>) {
    this.push("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>) {
    this.push("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>) {
    this.push("error", message, data);
  }

  clear() {
    this.entries = [];
    this.emit();
  }

  private push(level: LogLevel, message: string, data?: Record<string, unknown>) {
    const entry: LogEntry = { ts: this.nowMs(), level, message: sanitizeString(message) };
    if (data) entry.data = sanitizeRecord(data, 0);
    this.entries.push(entry);
    this.trim();
    this.onEntry?.(entry);
    this.emit();
  }

  private trim() {
    const overflow = this.entries.length - this.maxEntries;
    if (overflow > 0) this.entries.splice(0, overflow);
  }

  private emit() {
    for (const cb of this.listeners) cb();
  }
}

function sanitizeString(s: string): string {
  const raw = String(s ?? "");
  if (raw.length > MAX_STRING_CHARS) return raw.slice(0, MAX_STRING_CHARS) + "...[truncated]";
  return raw;
}

function sanitizeRecord(obj: Record<string, unknown>, depth: number): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const keys = Object.keys(obj);
  for (const k of keys.slice(0, MAX_OBJECT_KEYS)) out[k] = sanitizeUnknown(obj[k], depth + 1);
  if (keys.length > MAX_OBJECT_KEYS) out["[truncated]"] = `${keys.length - MAX_OBJECT_KEYS} keys`;
  return out;
}

function sanitizeUnknown(v: unknown, depth: number): unknown {
  if (depth > MAX_DEPTH) return "[truncated]";
  if (v == null) return v;

  if (typeof v === "string") return sanitizeString(v);
  if (typeof v === "number" || typeof v === "boolean") return v;
  // Date в логах удобнее читать как ISO (и он переживает JSON-сериализацию sink'а).
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? "Invalid Date" : v.toISOString();

  if (v instanceof Error) {
    return {
      name: sanitizeString(v.name || "Error"),
      message: sanitizeString(v.message),
      stack: v.stack ? sanitizeString(v.stack) : undefined,
      cause: v.cause != null ? sanitizeUnknown(v.cause, depth + 1) : undefined,
    };
  }

  if (Array.isArray(v)) {
    const out = v.slice(0, MAX_ARRAY_ITEMS).map((x) => sanitizeUnknown(x, depth + 1));
    if (v.length > MAX_ARRAY_ITEMS) out.push("[truncated]");
    return out;
  }

  if (typeof v === "object") return sanitizeRecord({ ...v }, depth);

  return sanitizeString(String(v));
}
