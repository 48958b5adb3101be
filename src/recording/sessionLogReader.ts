import { readFile } from "node:fs/promises";

import type { UploadStatus } from "./recordingSessionTypes";
import { SessionLogEntrySchema, type ChunkEntry, type SessionLogEntry } from "../shared/validation/sessionLogSchemas";
import { roundDurationSec } from "../domain/policies/chunkBudget";
import { toAppErrorDto } from "../shared/appError";
import { APP_ERROR } from "../shared/appErrorCodes";
import { err, ok, type Result } from "../shared/result";

export type SessionLogReadout = {
  entries: SessionLogEntry[];
  /** Номера строк (с 1), которые не прошли разбор или схему. */
  malformedLines: number[];
};

/** Прочитать журнал сессий; битые строки пропускаются. */
export async function readSessionLog(filePath: string): Promise<Result<SessionLogReadout>> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (e) {
    return err(toAppErrorDto(e, { code: APP_ERROR.LOG_IO, message: "Рекордер: не удалось прочитать журнал сессий", details: { filePath } }));
  }
  return ok(parseSessionLog(text));
}

export function parseSessionLog(text: string): SessionLogReadout {
  const entries: SessionLogEntry[] = [];
  const malformedLines: number[] = [];
  const lines = text.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      malformedLines.push(i + 1);
      continue;
    }
    const parsed = SessionLogEntrySchema.safeParse(json);
    if (parsed.success) entries.push(parsed.data);
    else malformedLines.push(i + 1);
  }
  return { entries, malformedLines };
}

export type ReconciledChunk = {
  sessionId: string;
  chunkIndex: number;
  filePath: string;
  startedAt: string;
  durationSec: number;
  sampleCount: number;
  s3ObjectKey: string | null;
  s3Uploaded: boolean;
  /** Из последней поправки `chunk_upload`, если она была. */
  uploadStatus?: UploadStatus;
  error?: string;
};

/**
 * Свести `chunk` и поправки `chunk_upload` по `(session_id, chunk_index)`:
 * последняя по порядку запись авторитетна. Порядок результата = порядок строк `chunk`.
 */
export function reconcileChunkUploads(entries: SessionLogEntry[]): ReconciledChunk[] {
  const byKey = new Map<string, ReconciledChunk>();
  const order: string[] = [];
  for (const e of entries) {
    if (e.type === "chunk") {
      const key = chunkKey(e.session_id, e.chunk_index);
      if (!byKey.has(key)) order.push(key);
      byKey.set(key, fromChunkEntry(e));
      continue;
    }
    if (e.type !== "chunk_upload") continue;
    const cur = byKey.get(chunkKey(e.session_id, e.chunk_index));
    if (!cur) continue;
    cur.s3ObjectKey = e.s3_object_key;
    cur.s3Uploaded = e.s3_uploaded;
    cur.uploadStatus = e.status;
    cur.error = e.error;
  }
  const out: ReconciledChunk[] = [];
  for (const key of order) {
    const c = byKey.get(key);
    if (c) out.push(c);
  }
  return out;
}

export type SessionSummaryRow = {
  sessionId: string;
  conversationId: string | null;
  startedAt: string | null;
  endedAt: string | null;
  chunkCount: number;
  totalDurationSec: number;
  uploadedCount: number;
  /** Есть запись `session end`. */
  ended: boolean;
};

/** Сводка по сессиям (в порядке первого появления в журнале). */
export function summarizeSessions(entries: SessionLogEntry[]): SessionSummaryRow[] {
  const rows = new Map<string, SessionSummaryRow>();
  const rowFor = (sessionId: string): SessionSummaryRow => {
    const existing = rows.get(sessionId);
    if (existing) return existing;
    const row: SessionSummaryRow = {
      sessionId,
      conversationId: null,
      startedAt: null,
      endedAt: null,
      chunkCount: 0,
      totalDurationSec: 0,
      uploadedCount: 0,
      ended: false,
    };
    rows.set(sessionId, row);
    return row;
  };

  for (const e of entries) {
    if (e.type !== "session") continue;
    const row = rowFor(e.session_id);
    if (e.event === "start") {
      row.startedAt = e.started_at;
      row.conversationId = e.conversation_id;
    } else {
      row.endedAt = e.ended_at;
      row.ended = true;
    }
  }
  for (const c of reconcileChunkUploads(entries)) {
    const row = rowFor(c.sessionId);
    row.chunkCount += 1;
    row.totalDurationSec = roundDurationSec(row.totalDurationSec + c.durationSec);
    if (c.s3Uploaded) row.uploadedCount += 1;
  }
  return Array.from(rows.values());
}

function chunkKey(sessionId: string, chunkIndex: number): string {
  return `${sessionId}\u0000${chunkIndex}`;
}

function fromChunkEntry(e: ChunkEntry): ReconciledChunk {
  return {
    sessionId: e.session_id,
    chunkIndex: e.chunk_index,
    filePath: e.file_path,
    startedAt: e.started_at,
    durationSec: e.duration_sec,
    sampleCount: e.sample_count,
    s3ObjectKey: e.s3_object_key,
    s3Uploaded: e.s3_uploaded,
  };
}
