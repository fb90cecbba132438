import type { Occasion } from "../../types";
import type { OccasionFilter } from "../../occasions/occasionQuery";

/**
 * Порт хранилища вхождений.
 *
 * Ядро напрямую к хранилищу не ходит: use-cases зависят от интерфейса,
 * конкретная реализация (БД, файл, in-memory) живёт снаружи.
 */
export interface OccasionRepository {
  /** Вхождения, пересекающиеся с днём `day` (снимок: дальнейшие изменения стора на него не влияют). */
  loadOccasionsForDay(day: Date, filter?: OccasionFilter): Promise<Occasion[]>;
  /** Вхождения, пересекающиеся с `[start, end]` (границы включены). */
  loadOccasionsInWindow(start: Date, end: Date, filter?: OccasionFilter): Promise<Occasion[]>;
  listOccasions(filter?: OccasionFilter): Promise<Occasion[]>;
  /**
   * Сохранить одно вхождение. Пакетной/транзакционной записи порт не даёт:
   * use-case пишет вхождения по одному и при ошибке сообщает, сколько успел записать.
   */
  saveOccasion(occasion: Occasion): Promise<void>;
}
