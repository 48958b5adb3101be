/**
 * Policy: задержка перед повтором выгрузки (экспонента с потолком).
 *
 * attempt: номер неудавшейся попытки, начиная с 1.
 */
export const MAX_RETRY_BACKOFF_MS = 30_000;

export function retryDelayMsPolicy(params: { attempt: number; baseMs: number; capMs?: number }): number {
  const attempt = Math.max(1, Math.floor(Number(params.attempt) || 1));
  const base = Math.max(0, Number(params.baseMs) || 0);
  const cap = Math.max(0, params.capMs ?? MAX_RETRY_BACKOFF_MS);
  return Math.min(cap, base * 2 ** (attempt - 1));
}
