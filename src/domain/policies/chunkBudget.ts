/**
 * Policy: бюджет чанка в сэмпл-кадрах и производные длительности.
 *
 * Кадр = по одному s16le сэмплу на канал.
 */

export const BYTES_PER_SAMPLE = 2;

export function bytesPerFrame(channels: number): number {
  return BYTES_PER_SAMPLE * Math.max(1, Math.floor(channels));
}

export function chunkBudgetFrames(params: { chunkSeconds: number; sampleRate: number }): number {
  const frames = Math.round(Math.max(0, params.chunkSeconds) * Math.max(1, params.sampleRate));
  return Math.max(1, frames);
}

/** Поле размера RIFF 32-битное: столько байт PCM влезает в один WAV после 44-байтного заголовка. */
export const MAX_WAV_DATA_BYTES = 0xffff_ffff - 36;

export function maxWavChunkFrames(channels: number): number {
  return Math.floor(MAX_WAV_DATA_BYTES / bytesPerFrame(channels));
}

/** Наибольшая целая длина WAV-чанка в секундах. */
export function maxWavChunkSeconds(params: { sampleRate: number; channels: number }): number {
  return Math.floor(maxWavChunkFrames(params.channels) / Math.max(1, params.sampleRate));
}

export function durationSecFromFrames(frames: number, sampleRate: number): number {
  return Math.max(0, frames) / Math.max(1, sampleRate);
}

/** Округление длительностей для журнала (3 знака). */
export function roundDurationSec(sec: number): number {
  return Math.round(sec * 1000) / 1000;
}

/** Сколько мс аудио осталось до закрытия текущего чанка. */
export function nextChunkInMsPolicy(params: { bufferedFrames: number; budgetFrames: number; sampleRate: number }): number {
  const left = Math.max(0, params.budgetFrames - Math.max(0, params.bufferedFrames));
  return Math.round((left / Math.max(1, params.sampleRate)) * 1000);
}
