import type { AudioFileFormat } from "../types";

/** Состояния одной сессии записи (`SessionController`). */
export type SessionState = "idle" | "starting" | "capturing" | "aborting" | "finalizing" | "ended";

/**
 * Сессия записи. Меняет только `SessionController`;
 * после выставления `endedAt` объект замораживается.
 */
export type RecordingSession = {
  sessionId: string;
  conversationId: string | null;
  /** Идентификатор устройства; `null` = устройство по умолчанию. */
  deviceId: string | null;
  deviceName: string;
  sampleRate: number;
  channels: number;
  format: AudioFileFormat;
  /** Каталог, в который пишутся файлы чанков. */
  outputDir: string;
  startedAt: Date;
  endedAt: Date | null;
  totalDurationSec: number;
  chunkCount: number;
};

/** Готовый чанк: файл уже записан и закрыт. */
export type CompletedChunk = Readonly<{
  /** С 1, строго возрастает в пределах сессии. */
  chunkIndex: number;
  filePath: string;
  startedAt: Date;
  durationSec: number;
  /** Количество сэмпл-кадров (по одному сэмплу на канал). */
  sampleCount: number;
}>;

/**
 * Итог выгрузки одного чанка.
 *
 * - `skipped`: очередь переполнена
 * - `not_attempted`: хранилище не настроено или выгрузка отключена
 * - `abandoned`: чанк ещё стоял в очереди, когда истёк `drain`
 */
export type UploadStatus = "uploaded" | "failed" | "skipped" | "not_attempted" | "abandoned";

export type UploadResult = Readonly<{
  status: UploadStatus;
  s3ObjectKey: string | null;
  s3Uploaded: boolean;
  attempts: number;
  error?: string;
}>;

export type RecordingStats = {
  state: SessionState;
  sessionId?: string;
  elapsedMs: number;
  chunksTotal: number;
  /** Сколько мс аудио осталось до закрытия текущего чанка. */
  nextChunkInMs?: number;
  /** Уровень входного сигнала, dB 0..120. */
  levelDb: number;
};
