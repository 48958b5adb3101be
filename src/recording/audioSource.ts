import type { RecordingBackendId } from "../types";

export type AudioCaptureParams = {
  /** `null` = устройство по умолчанию. */
  device: string | null;
  sampleRate: number;
  channels: number;
};

/**
 * Открытый поток захвата.
 *
 * `read()` отдаёт пачку сэмпл-кадров (s16le, каналы перемежаются, целое число кадров)
 * или `null`, когда поток закончился.
 */
export interface AudioCaptureStream {
  read(): Promise<Buffer | null>;
  /** Уровень последней пачки, dB 0..120. */
  level(): number;
  close(): Promise<void>;
}

/** Источник звука одного backend'а. Выбирается конфигурацией (`recording.backend`). */
export interface AudioSource {
  readonly id: RecordingBackendId;
  /** Ошибка открытия: `AppError` с кодом `E_DEVICE`. */
  open(params: AudioCaptureParams): Promise<AudioCaptureStream>;
}
