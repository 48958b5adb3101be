import type { AudioFileFormat, RecorderSettings, RecordingBackendId, S3Settings } from "./types";
import type { FfmpegInputFormat } from "./domain/policies/ffmpegCaptureArgs";
import { maxWavChunkSeconds } from "./domain/policies/chunkBudget";
import { DEFAULT_DATETIME_FORMAT, DEFAULT_TIMESTAMP_TEMPLATE } from "./domain/policies/chunkFileNaming";
import {
  RawLogSectionSchema,
  RawRecorderSettingsSchema,
  RawRecordingSectionSchema,
  RawS3SectionSchema,
  RawUploadSectionSchema,
  type RawLogSection,
  type RawRecordingSection,
  type RawS3Section,
  type RawUploadSection,
} from "./shared/validation/recorderSettingsSchema";
import type { ZodType } from "zod";

/** Настройки рекордера по умолчанию. */
export const DEFAULT_SETTINGS: RecorderSettings = {
  recording: {
    backend: "ffmpeg",
    device: null,
    deviceName: "default",
    sampleRate: 16_000,
    channels: 1,
    chunkSeconds: 120,
    format: "wav",
    outputDir: "audio",
    timestampFormat: DEFAULT_TIMESTAMP_TEMPLATE,
    datetimeFormat: DEFAULT_DATETIME_FORMAT,
    ffmpegInputFormat: "auto",
    framesPerRead: 1024,
  },
  upload: {
    enabled: true,
    workers: 2,
    queueCapacity: 16,
    maxAttempts: 1,
    retryBackoffMs: 500,
    drainTimeoutMs: 30_000,
    logGraceMs: 0,
  },
  s3: null,
  log: {
    file: "recordings.jsonl",
    dir: "",
    maxEntries: 2048,
    retentionDays: 7,
  },
};

export type NormalizedSettings = {
  settings: RecorderSettings;
  /** Что пришлось отбросить или заменить значениями по умолчанию (для предупреждений в лог). */
  problems: string[];
};

/**
 * Нормализовать “сырые” настройки (из YAML).
 *
 * Делает:
 * - валидацию каждой секции отдельно (zod)
 * - заполнение значений по умолчанию
 * - ограничение чисел разумными пределами
 *
 * Неполная секция `s3` отключает выгрузку (с записью в `problems`), а не роняет запуск.
 */
export function normalizeSettings(raw: unknown): NormalizedSettings {
  const problems: string[] = [];
  const root = RawRecorderSettingsSchema.safeParse(raw ?? {});
  if (!root.success) problems.push("корень конфигурации должен быть объектом");
  const obj: Record<string, unknown> = root.success ? root.data : {};

  const rec = parseSection<RawRecordingSection>("recording", obj.recording, RawRecordingSectionSchema, problems);
  const up = parseSection<RawUploadSection>("upload", obj.upload, RawUploadSectionSchema, problems);
  const s3Raw = parseSection<RawS3Section>("s3", obj.s3, RawS3SectionSchema, problems);
  const log = parseSection<RawLogSection>("log", obj.log, RawLogSectionSchema, problems);

  const d = DEFAULT_SETTINGS;
  return {
    settings: {
      recording: fitChunkToFormat(
        {
          backend: normalizeBackend(rec.backend, problems),
          device: normalizeDevice(rec.device ?? rec.device_id),
          deviceName: nonEmpty(rec.device_name) ?? d.recording.deviceName,
          sampleRate: normalizeNumber(rec.rate, { defaultValue: d.recording.sampleRate, min: 1000, max: 384_000 }),
          channels: normalizeNumber(rec.channels, { defaultValue: d.recording.channels, min: 1, max: 32 }),
          chunkSeconds: normalizeSeconds(rec.chunk_size ?? rec.chunk_seconds, {
            defaultValue: d.recording.chunkSeconds,
            min: 0.1,
            max: 24 * 60 * 60,
          }),
          format: normalizeFormat(rec.file_extension, problems),
          outputDir: nonEmpty(rec.output_dir) ?? d.recording.outputDir,
          timestampFormat: nonEmpty(rec.timestamp_format) ?? d.recording.timestampFormat,
          datetimeFormat: nonEmpty(rec.datetime_format) ?? d.recording.datetimeFormat,
          ffmpegInputFormat: normalizeInputFormat(rec.input_format, problems),
          framesPerRead: normalizeNumber(rec.frames_per_read, { defaultValue: d.recording.framesPerRead, min: 16, max: 65_536 }),
        },
        problems,
      ),
      upload: {
        enabled: up.enabled ?? d.upload.enabled,
        workers: normalizeNumber(up.workers, { defaultValue: d.upload.workers, min: 1, max: 16 }),
        queueCapacity: normalizeNumber(up.queue_capacity, { defaultValue: d.upload.queueCapacity, min: 1, max: 1024 }),
        maxAttempts: normalizeNumber(up.max_attempts, { defaultValue: d.upload.maxAttempts, min: 1, max: 10 }),
        retryBackoffMs: normalizeNumber(up.retry_backoff_ms, { defaultValue: d.upload.retryBackoffMs, min: 0, max: 30_000 }),
        drainTimeoutMs: normalizeNumber(up.drain_timeout_ms, { defaultValue: d.upload.drainTimeoutMs, min: 0, max: 60 * 60_000 }),
        logGraceMs: normalizeNumber(up.log_grace_ms, { defaultValue: d.upload.logGraceMs, min: 0, max: 60_000 }),
      },
      s3: obj.s3 === undefined || obj.s3 === null ? null : normalizeS3(s3Raw, problems),
      log: {
        file: nonEmpty(log.file) ?? d.log.file,
        dir: typeof log.dir === "string" ? log.dir.trim() : d.log.dir,
        maxEntries: normalizeNumber(log.max_entries, { defaultValue: d.log.maxEntries, min: 10, max: 20_000 }),
        retentionDays: normalizeRetentionDays(log.retention_days ?? d.log.retentionDays),
      },
    },
    problems,
  };
}

/**
 * WAV-чанк не может быть длиннее, чем описывает 32-битный размер RIFF:
 * длина чанка уменьшается с записью в `problems`.
 */
export function fitChunkToFormat(recording: RecorderSettings["recording"], problems: string[]): RecorderSettings["recording"] {
  if (recording.format !== "wav") return recording;
  const max = maxWavChunkSeconds({ sampleRate: recording.sampleRate, channels: recording.channels });
  if (recording.chunkSeconds <= max) return recording;
  problems.push(
    `recording.chunk_size: ${recording.chunkSeconds} с не помещается в один WAV при ${recording.sampleRate} Гц, каналов: ${recording.channels}; уменьшено до ${max} с`,
  );
  return { ...recording, chunkSeconds: max };
}

function parseSection<T>(name: string, v: unknown, schema: ZodType<T>, problems: string[]): Partial<T> {
  if (v === undefined || v === null) return {};
  const parsed = schema.safeParse(v);
  if (parsed.success) return parsed.data;
  const details = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
  problems.push(`секция ${name} проигнорирована: ${details}`);
  return {};
}

function normalizeS3(s3: Partial<RawS3Section>, problems: string[]): S3Settings | null {
  const bucket = nonEmpty(s3.bucket);
  const endpointUrl = nonEmpty(s3.endpoint_url);
  const accessKey = nonEmpty(s3.access_key);
  const secretKey = nonEmpty(s3.secret_key);
  if (!bucket || !endpointUrl || !accessKey || !secretKey) {
    const missing = [
      bucket ? "" : "bucket",
      endpointUrl ? "" : "endpoint_url",
      accessKey ? "" : "access_key",
      secretKey ? "" : "secret_key",
    ].filter(Boolean);
    problems.push(`s3: не заданы ${missing.join(", ")}; выгрузка отключена`);
    return null;
  }
  try {
    new URL(endpointUrl);
  } catch {
    problems.push(`s3: некорректный endpoint_url; выгрузка отключена`);
    return null;
  }
  return {
    bucket,
    endpointUrl,
    accessKey,
    secretKey,
    region: nonEmpty(s3.region ?? undefined) ?? null,
    prefix: typeof s3.prefix === "string" ? s3.prefix.trim().replace(/^\/+|\/+$/g, "") : "",
    verifySsl: s3.verify_ssl ?? true,
    pathStyle: s3.path_style ?? true,
  };
}

function normalizeBackend(v: unknown, problems: string[]): RecordingBackendId {
  if (v === undefined) return DEFAULT_SETTINGS.recording.backend;
  if (v === "ffmpeg" || v === "tone") return v;
  problems.push(`recording.backend: неизвестное значение ${JSON.stringify(v)}`);
  return DEFAULT_SETTINGS.recording.backend;
}

function normalizeFormat(v: unknown, problems: string[]): AudioFileFormat {
  if (v === undefined) return DEFAULT_SETTINGS.recording.format;
  const s = typeof v === "string" ? v.trim().toLowerCase().replace(/^\./, "") : "";
  if (s === "wav" || s === "pcm") return s;
  problems.push(`recording.file_extension: неподдерживаемый формат ${JSON.stringify(v)}`);
  return DEFAULT_SETTINGS.recording.format;
}

function normalizeInputFormat(v: unknown, problems: string[]): FfmpegInputFormat | "auto" {
  if (v === undefined) return DEFAULT_SETTINGS.recording.ffmpegInputFormat;
  if (v === "auto" || v === "pulse" || v === "alsa" || v === "avfoundation" || v === "dshow") return v;
  problems.push(`recording.input_format: неизвестное значение ${JSON.stringify(v)}`);
  return DEFAULT_SETTINGS.recording.ffmpegInputFormat;
}

function normalizeDevice(v: unknown): string | null {
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  if (typeof v === "string" && v.trim()) return v.trim();
  return null;
}

function nonEmpty(v: string | undefined): string | undefined {
  const s = typeof v === "string" ? v.trim() : "";
  return s ? s : undefined;
}

function normalizeNumber(v: unknown, params: { defaultValue: number; min?: number; max?: number }): number {
  const n = typeof v === "number" ? v : typeof v === "string" && v.trim() ? Number(v) : NaN;
  if (!Number.isFinite(n)) return params.defaultValue;
  const min = typeof params.min === "number" ? params.min : -Infinity;
  const max = typeof params.max === "number" ? params.max : Infinity;
  return Math.min(max, Math.max(min, Math.floor(n)));
}

/** Как `normalizeNumber`, но без округления: длина чанка может быть дробной. */
function normalizeSeconds(v: unknown, params: { defaultValue: number; min: number; max: number }): number {
  const n = typeof v === "number" ? v : typeof v === "string" && v.trim() ? Number(v) : NaN;
  if (!Number.isFinite(n)) return params.defaultValue;
  return Math.min(params.max, Math.max(params.min, n));
}

function normalizeRetentionDays(v: unknown): number {
  const n = typeof v === "number" ? v : Number(v);
  if (!Number.isFinite(n)) return 7;
  // Ограничиваем в разумных пределах, чтобы не выстрелить себе в ногу.
  return Math.min(365, Math.max(1, Math.floor(n)));
}
