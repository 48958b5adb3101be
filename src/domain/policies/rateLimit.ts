/**
 * Policy: не чаще `intervalMs`. `lastAtMs = null` значит “ещё ни разу”.
 */
export function shouldEmitByInterval(params: { nowMs: number; lastAtMs: number | null; intervalMs: number }): boolean {
  if (params.lastAtMs === null) return true;
  const interval = Math.max(0, Number(params.intervalMs) || 0);
  return params.nowMs - params.lastAtMs >= interval;
}
