/**
 * Политика: идентификатор сущности (событие / вхождение).
 *
 * Функция чистая: `nowMs` и `randomHex` передаются снаружи (инфраструктура или тест).
 */
export function makeEntityId(params: { prefix: string; nowMs: number; randomHex: string }): string {
  const prefix = String(params.prefix ?? "").trim() || "id";
  const nowMs = Math.max(0, Math.floor(Number(params.nowMs) || 0));
  const randomHex = String(params.randomHex ?? "")
    .trim()
    .toLowerCase()
    .replace(/[^0-9a-f]/g, "");
  return `${prefix}-${nowMs.toString(36)}-${randomHex || "0"}`;
}
