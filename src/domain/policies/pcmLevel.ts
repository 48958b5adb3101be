/**
 * Policy: уровень сигнала из PCM (s16le, каналы перемежаются).
 */

/** RMS в диапазоне 0..1 по всем сэмплам буфера. */
export function rms01FromS16le(buf: Buffer): number {
  const n = Math.floor(buf.length / 2);
  if (n === 0) return 0;
  let sumSq = 0;
  for (let i = 0; i < n * 2; i += 2) {
    const v = buf.readInt16LE(i) / 32768;
    sumSq += v * v;
  }
  return Math.sqrt(sumSq / n);
}

/**
 * Уровень в “dB 0..120”: `20·log10(rms) + 120`, с обрезкой.
 * Тишина = 0, полная шкала = 120.
 */
export function dbLevelFromRms01(rms01: number): number {
  if (!Number.isFinite(rms01) || rms01 <= 0) return 0;
  const db = 20 * Math.log10(rms01) + 120;
  return Math.max(0, Math.min(120, db));
}

export function dbLevelFromS16le(buf: Buffer): number {
  return dbLevelFromRms01(rms01FromS16le(buf));
}
