/**
 * rrule считает всё в UTC. Чтобы «каждый день в 09:00» оставалось 09:00 по локальному времени,
 * разворачиваем правило в «плавающем» времени: UTC-компоненты = локальные компоненты.
 *
 *   локальное 2024-01-15 09:00 → fake-UTC 2024-01-15T09:00Z → rrule → fake-UTC → локальное
 */
export function toFloating(d: Date): Date {
  return new Date(Date.UTC(d.getFullYear(), d.getMonth(), d.getDate(), d.getHours(), d.getMinutes(), d.getSeconds(), d.getMilliseconds()));
}

export function fromFloating(d: Date): Date {
  return new Date(
    d.getUTCFullYear(),
    d.getUTCMonth(),
    d.getUTCDate(),
    d.getUTCHours(),
    d.getUTCMinutes(),
    d.getUTCSeconds(),
    d.getUTCMilliseconds(),
  );
}
