import type { FfmpegInputFormat } from "./domain/policies/ffmpegCaptureArgs";

/**
 * Механизм захвата звука.
 *
 * - `ffmpeg`: системный `ffmpeg` пишет сырой PCM в stdout (Pulse/ALSA/AVFoundation/DirectShow).
 * - `tone`: синтетический синус без устройства (проверка конвейера, пробные прогоны).
 */
export type RecordingBackendId = "ffmpeg" | "tone";

/** Контейнер файлов чанков (без перекодирования). */
export type AudioFileFormat = "wav" | "pcm";

/** Настройки S3-совместимого хранилища. Секреты в лог не пишем. */
export interface S3Settings {
  bucket: string;
  endpointUrl: string;
  accessKey: string;
  secretKey: string;
  region: string | null;
  /** Префикс ключей объектов (может быть пустым). */
  prefix: string;
  verifySsl: boolean;
  /** path-style адресация (`endpoint/bucket/key`), нужна MinIO и подобным. */
  pathStyle: boolean;
}

/** Настройки рекордера (`.chunk-recorder.yml` + CLI). */
export interface RecorderSettings {
  recording: {
    backend: RecordingBackendId;
    /** Идентификатор устройства для backend'а; `null` = устройство по умолчанию. */
    device: string | null;
    /** Человекочитаемое имя устройства для журнала. */
    deviceName: string;
    sampleRate: number;
    channels: number;
    /** Длина одного чанка в секундах. По умолчанию 120. */
    chunkSeconds: number;
    format: AudioFileFormat;
    outputDir: string;
    /** Шаблон stem'а сессии: `{ts}`, `{device_id}`. */
    timestampFormat: string;
    /** strftime-шаблон для `{ts}`. */
    datetimeFormat: string;
    /** Формат входа ffmpeg; `auto` = по платформе. */
    ffmpegInputFormat: FfmpegInputFormat | "auto";
    /** Сколько сэмпл-кадров отдаёт один `read()` источника. */
    framesPerRead: number;
  };
  upload: {
    /** Выгрузка включена (можно отключить на один прогон через `--no-upload`). */
    enabled: boolean;
    workers: number;
    /** Ёмкость очереди; при переполнении чанк помечается `skipped`. */
    queueCapacity: number;
    /** 1 = без повторов. */
    maxAttempts: number;
    retryBackoffMs: number;
    /** Сколько ждать незавершённые выгрузки при завершении сессии. */
    drainTimeoutMs: number;
    /** Сколько ждать результат выгрузки перед записью `chunk` в журнал. 0 = писать сразу. */
    logGraceMs: number;
  };
  s3: S3Settings | null;
  log: {
    /** Журнал сессий (JSONL); относительный путь считается от `recording.outputDir`. */
    file: string;
    /** Папка диагностических логов; пусто = не писать в файлы. */
    dir: string;
    /** Максимум записей диагностики в памяти. По умолчанию 2048. */
    maxEntries: number;
    /** Сколько дней хранить диагностические лог‑файлы. По умолчанию 7. */
    retentionDays: number;
  };
}
