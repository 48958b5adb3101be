/**
 * Политика: метки времени журнала сессий: локальный ISO-8601 без миллисекунд
 * (`2026-02-23T14:30:22`).
 */
export function isoLocalSeconds(d: Date): string {
  const p = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}-${p(d.getMonth() + 1)}-${p(d.getDate())}T${p(d.getHours())}:${p(d.getMinutes())}:${p(d.getSeconds())}`;
}
