/**
 * Policy: текст для диагностики: обрезка для лога и rolling-хвост stderr.
 */
export function trimForLogPolicy(value: unknown, maxChars = 1200): string {
  const text = String(value ?? "");
  const max = Math.max(0, Math.floor(Number(maxChars) || 0));
  if (text.length <= max) return text;
  return text.slice(0, max) + "…(truncated)";
}

/** Дописать кусок к хвосту, оставив не больше `maxChars` последних символов. */
export function appendTail(prev: string, chunk: string, maxChars: number): string {
  const max = Math.max(0, Math.floor(maxChars));
  if (max === 0) return "";
  const next = prev + chunk;
  return next.length > max ? next.slice(next.length - max) : next;
}
