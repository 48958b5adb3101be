import { z } from "zod";

// Журнал сессий (JSONL): одна запись на строку. Поля в snake_case, как в файле.

const zUploadStatus = z.enum(["uploaded", "failed", "skipped", "not_attempted", "abandoned"]);

export const SessionStartEntrySchema = z.object({
  type: z.literal("session"),
  event: z.literal("start"),
  session_id: z.string().min(1),
  conversation_id: z.string().nullable(),
  device_id: z.string().nullable(),
  device_name: z.string(),
  sample_rate: z.number().int().positive(),
  channels: z.number().int().positive(),
  format: z.string(),
  started_at: z.string(),
});

export const SessionEndEntrySchema = z.object({
  type: z.literal("session"),
  event: z.literal("end"),
  session_id: z.string().min(1),
  ended_at: z.string(),
  total_duration_sec: z.number().nonnegative(),
  chunk_count: z.number().int().nonnegative(),
});

export const ChunkEntrySchema = z.object({
  type: z.literal("chunk"),
  session_id: z.string().min(1),
  chunk_index: z.number().int().positive(),
  file_path: z.string(),
  started_at: z.string(),
  duration_sec: z.number().nonnegative(),
  sample_count: z.number().int().nonnegative(),
  s3_object_key: z.string().nullable(),
  s3_uploaded: z.boolean(),
});

export const ChunkUploadEntrySchema = z.object({
  type: z.literal("chunk_upload"),
  session_id: z.string().min(1),
  chunk_index: z.number().int().positive(),
  s3_object_key: z.string().nullable(),
  s3_uploaded: z.boolean(),
  status: zUploadStatus,
  error: z.string().optional(),
});

export const SessionLogEntrySchema = z.union([SessionStartEntrySchema, SessionEndEntrySchema, ChunkEntrySchema, ChunkUploadEntrySchema]);

export type SessionStartEntry = z.infer<typeof SessionStartEntrySchema>;
export type SessionEndEntry = z.infer<typeof SessionEndEntrySchema>;
export type ChunkEntry = z.infer<typeof ChunkEntrySchema>;
export type ChunkUploadEntry = z.infer<typeof ChunkUploadEntrySchema>;
export type SessionLogEntry = z.infer<typeof SessionLogEntrySchema>;
