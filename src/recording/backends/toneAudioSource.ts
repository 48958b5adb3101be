import type { AudioCaptureParams, AudioCaptureStream, AudioSource } from "../audioSource";
import { bytesPerFrame } from "../../domain/policies/chunkBudget";
import { dbLevelFromS16le } from "../../domain/policies/pcmLevel";

export type ToneAudioSourceOptions = {
  framesPerRead: number;
  frequencyHz?: number;
  /** 0..1 от полной шкалы. */
  amplitude?: number;
  /** Отдавать пачки в темпе реального времени (иначе так быстро, как читают). */
  realtime?: boolean;
};

/**
 * Синтетический источник: синус без устройства.
 * Нужен для пробных прогонов конвейера (`recording.backend: tone`).
 */
export class ToneAudioSource implements AudioSource {
  readonly id = "tone" as const;

  constructor(private options: ToneAudioSourceOptions) {}

  async open(params: AudioCaptureParams): Promise<AudioCaptureStream> {
    const framesPerRead = Math.max(1, Math.floor(this.options.framesPerRead));
    const frequencyHz = this.options.frequencyHz ?? 440;
    const amplitude = Math.max(0, Math.min(1, this.options.amplitude ?? 0.3));
    const realtime = this.options.realtime ?? false;
    const channels = Math.max(1, Math.floor(params.channels));
    const sampleRate = Math.max(1, Math.floor(params.sampleRate));
    const frameBytes = bytesPerFrame(channels);

    let frame = 0;
    let closed = false;
    let lastLevel = 0;
    let timer: NodeJS.Timeout | null = null;
    let wake: (() => void) | null = null;

    const waitNext = async (ms: number) => {
      await new Promise<void>((resolve) => {
        wake = resolve;
        timer = setTimeout(resolve, ms);
      });
      timer = null;
      wake = null;
    };

    return {
      read: async () => {
        if (closed) return null;
        if (realtime) await waitNext((framesPerRead / sampleRate) * 1000);
        // отдаём управление циклу событий, чтобы воркеры выгрузки не голодали
        else await new Promise<void>((resolve) => setImmediate(resolve));
        if (closed) return null;

        const buf = Buffer.alloc(framesPerRead * frameBytes);
        for (let i = 0; i < framesPerRead; i++) {
          const v = Math.round(Math.sin((2 * Math.PI * frequencyHz * (frame + i)) / sampleRate) * amplitude * 32767);
          for (let ch = 0; ch < channels; ch++) buf.writeInt16LE(v, i * frameBytes + ch * 2);
        }
        frame += framesPerRead;
        lastLevel = dbLevelFromS16le(buf);
        return buf;
      },
      level: () => lastLevel,
      close: async () => {
        closed = true;
        if (timer) clearTimeout(timer);
        wake?.();
      },
    };
  }
}
