/** Изменяемая ссылка на текущее значение (настройки планировщика в DI-контейнере). */
export type MutableRef<T> = {
  get: () => T;
  set: (next: T) => void;
};
