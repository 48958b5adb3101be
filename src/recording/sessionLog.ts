import { mkdir, open } from "node:fs/promises";
import * as path from "node:path";

import type { Logger } from "../log/logService";
import type { CompletedChunk, RecordingSession, UploadResult } from "./recordingSessionTypes";
import type { ChunkEntry, ChunkUploadEntry, SessionEndEntry, SessionLogEntry, SessionStartEntry } from "../shared/validation/sessionLogSchemas";
import { isoLocalSeconds } from "../domain/policies/logTimestamp";
import { roundDurationSec } from "../domain/policies/chunkBudget";
import { toAppErrorDto } from "../shared/appError";
import { APP_ERROR } from "../shared/appErrorCodes";
import { err, ok, type Result } from "../shared/result";

/** Дозапись одной строки: open(a) → write → fdatasync → close. */
export type LogLineAppender = (filePath: string, line: string) => Promise<void>;

export const appendLineDurable: LogLineAppender = async (filePath, line) => {
  await mkdir(path.dirname(filePath), { recursive: true });
  const fh = await open(filePath, "a");
  try {
    await fh.appendFile(line, "utf8");
    await fh.datasync();
  } finally {
    await fh.close();
  }
};

export type SessionLogDeps = {
  filePath: string;
  log: Logger;
  appendLine?: LogLineAppender;
};

/**
 * Журнал сессий: append-only JSONL.
 *
 * Каждая запись дописывается одной строкой и сбрасывается на диск до резолва.
 * Записи идут через одну цепочку промисов, поэтому строки не перемешиваются.
 * Ошибки не бросаются: возвращается `Result` с `E_LOG_IO`, а в лог пишется error.
 */
export class SessionLog {
  private chain: Promise<void> = Promise.resolve();
  private failures = 0;

  constructor(private deps: SessionLogDeps) {}

  get filePath(): string {
    return this.deps.filePath;
  }

  /** Сколько дозаписей не удалось. */
  get errorCount(): number {
    return this.failures;
  }

  async recordSessionStart(session: RecordingSession): Promise<Result<void>> {
    const entry: SessionStartEntry = {
      type: "session",
      event: "start",
      session_id: session.sessionId,
      conversation_id: session.conversationId,
      device_id: session.deviceId,
      device_name: session.deviceName,
      sample_rate: session.sampleRate,
      channels: session.channels,
      format: session.format,
      started_at: isoLocalSeconds(session.startedAt),
    };
    return await this.append(entry);
  }

  async recordChunk(session: RecordingSession, chunk: CompletedChunk, upload: Pick<UploadResult, "s3ObjectKey" | "s3Uploaded">): Promise<Result<void>> {
    const entry: ChunkEntry = {
      type: "chunk",
      session_id: session.sessionId,
      chunk_index: chunk.chunkIndex,
      file_path: chunk.filePath,
      started_at: isoLocalSeconds(chunk.startedAt),
      duration_sec: roundDurationSec(chunk.durationSec),
      sample_count: chunk.sampleCount,
      s3_object_key: upload.s3ObjectKey,
      s3_uploaded: upload.s3Uploaded,
    };
    return await this.append(entry);
  }

  /** Поправка к уже записанной строке `chunk`: итог выгрузки пришёл позже. */
  async recordChunkUpload(session: RecordingSession, chunk: CompletedChunk, upload: UploadResult): Promise<Result<void>> {
    const entry: ChunkUploadEntry = {
      type: "chunk_upload",
      session_id: session.sessionId,
      chunk_index: chunk.chunkIndex,
      s3_object_key: upload.s3ObjectKey,
      s3_uploaded: upload.s3Uploaded,
      status: upload.status,
    };
    if (upload.error) entry.error = upload.error;
    return await this.append(entry);
  }

  async recordSessionEnd(session: RecordingSession): Promise<Result<void>> {
    const entry: SessionEndEntry = {
      type: "session",
      event: "end",
      session_id: session.sessionId,
      ended_at: isoLocalSeconds(session.endedAt ?? session.startedAt),
      total_duration_sec: roundDurationSec(session.totalDurationSec),
      chunk_count: session.chunkCount,
    };
    return await this.append(entry);
  }

  /** Дождаться всех уже поставленных дозаписей. */
  async flush(): Promise<void> {
    await this.chain;
  }

  private async append(entry: SessionLogEntry): Promise<Result<void>> {
    const line = `${JSON.stringify(entry)}\n`;
    const run = this.chain.then(() => this.write(entry, line));
    this.chain = run.then(() => undefined);
    return await run;
  }

  private async write(entry: SessionLogEntry, line: string): Promise<Result<void>> {
    try {
      await (this.deps.appendLine ?? appendLineDurable)(this.deps.filePath, line);
      return ok(undefined);
    } catch (e) {
      this.failures += 1;
      const dto = toAppErrorDto(e, {
        code: APP_ERROR.LOG_IO,
        message: "Рекордер: не удалось дописать журнал сессий",
        details: { filePath: this.deps.filePath, type: entry.type },
      });
      this.deps.log.error("SessionLog: ошибка дозаписи", { filePath: this.deps.filePath, entryType: entry.type, sessionId: entry.session_id, error: dto.cause });
      return err(dto);
    }
  }
}
