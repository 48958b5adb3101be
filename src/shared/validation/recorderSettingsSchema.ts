import { z } from "zod";

/**
 * Runtime-валидация “сырых” настроек из `.chunk-recorder.yml`.
 *
 * Важно:
 * - схема описывает именно RAW формат (snake_case, числа могут прийти строками)
 * - каждая секция валидируется отдельно: битая секция не обнуляет остальные
 * - окончательная нормализация делается в `normalizeSettings()`
 */

const zBool = z.boolean();
const zStr = z.string();
const zNumOrStr = z.union([z.number(), z.string()]);

export const RawRecordingSectionSchema = z.object({
  backend: zStr.optional(),
  device: z.union([zStr, z.number()]).nullable().optional(),
  device_id: z.union([zStr, z.number()]).nullable().optional(),
  device_name: zStr.optional(),
  rate: zNumOrStr.optional(),
  channels: zNumOrStr.optional(),
  chunk_size: zNumOrStr.optional(),
  chunk_seconds: zNumOrStr.optional(),
  file_extension: zStr.optional(),
  output_dir: zStr.optional(),
  timestamp_format: zStr.optional(),
  datetime_format: zStr.optional(),
  input_format: zStr.optional(),
  frames_per_read: zNumOrStr.optional(),
});

export const RawUploadSectionSchema = z.object({
  enabled: zBool.optional(),
  workers: zNumOrStr.optional(),
  queue_capacity: zNumOrStr.optional(),
  max_attempts: zNumOrStr.optional(),
  retry_backoff_ms: zNumOrStr.optional(),
  drain_timeout_ms: zNumOrStr.optional(),
  log_grace_ms: zNumOrStr.optional(),
});

export const RawS3SectionSchema = z.object({
  bucket: zStr.optional(),
  endpoint_url: zStr.optional(),
  access_key: zStr.optional(),
  secret_key: zStr.optional(),
  region: zStr.nullable().optional(),
  prefix: zStr.optional(),
  verify_ssl: zBool.optional(),
  path_style: zBool.optional(),
});

export const RawLogSectionSchema = z.object({
  file: zStr.optional(),
  dir: zStr.optional(),
  max_entries: zNumOrStr.optional(),
  retention_days: zNumOrStr.optional(),
});

export type RawRecordingSection = z.infer<typeof RawRecordingSectionSchema>;
export type RawUploadSection = z.infer<typeof RawUploadSectionSchema>;
export type RawS3Section = z.infer<typeof RawS3SectionSchema>;
export type RawLogSection = z.infer<typeof RawLogSectionSchema>;

/** Корень файла: только объект; содержимое секций проверяется отдельно. */
export const RawRecorderSettingsSchema = z.record(z.unknown());
