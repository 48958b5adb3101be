import { mkdir, open, rm } from "node:fs/promises";
import * as path from "node:path";

import type { Logger } from "../log/logService";
import type { CompletedChunk, RecordingSession } from "./recordingSessionTypes";
import { bytesPerFrame, chunkBudgetFrames, durationSecFromFrames, maxWavChunkFrames } from "../domain/policies/chunkBudget";
import { chunkFileName } from "../domain/policies/chunkFileNaming";
import { wavHeader } from "../domain/policies/wavHeader";
import { AppError, errorMessageOf } from "../shared/appError";
import { APP_ERROR } from "../shared/appErrorCodes";

/**
 * Ошибка записи чанка на диск (`E_WRITE`). Фатальна для сессии.
 *
 * `completed`: чанки, которые успели записаться в том же `push()` до ошибки.
 */
export class WriteError extends AppError {
  readonly completed: CompletedChunk[];

  constructor(params: { filePath: string; cause: unknown; completed?: CompletedChunk[] }) {
    super({
      code: APP_ERROR.WRITE,
      message: "Рекордер: не удалось записать чанк на диск",
      cause: errorMessageOf(params.cause),
      details: { filePath: params.filePath },
    });
    this.name = "WriteError";
    this.completed = params.completed ?? [];
  }
}

/** Запись файла целиком: данные → fsync → close. Путь существует только после полного успеха или не существует вовсе. */
export type ChunkFileWriter = (filePath: string, data: Buffer) => Promise<void>;

export const writeChunkFileDurable: ChunkFileWriter = async (filePath, data) => {
  await mkdir(path.dirname(filePath), { recursive: true });
  const fh = await open(filePath, "w");
  try {
    await fh.writeFile(data);
    await fh.sync();
  } finally {
    await fh.close();
  }
};

export type ChunkWriterDeps = {
  now: () => Date;
  log: Logger;
  writeFile?: ChunkFileWriter;
};

type PendingChunk = {
  index: number;
  startedAt: Date;
  parts: Buffer[];
  frames: number;
};

/**
 * Нарезка потока кадров на чанки фиксированной длины и запись их в файлы.
 *
 * Бюджет чанка = `chunkSeconds × sampleRate` кадров; пачка, пересекающая границу,
 * режется ровно по ней, остаток начинает следующий чанк.
 */
export class ChunkWriter {
  private session: RecordingSession | null = null;
  private budgetFrames = 0;
  private frameBytes = 2;
  private current: PendingChunk | null = null;
  /** Чанк, запись которого упала; `close()` пробует его ещё раз. */
  private failed: PendingChunk | null = null;
  private carry: Buffer = Buffer.alloc(0);
  private nextIndex = 1;
  private closed = false;

  constructor(private deps: ChunkWriterDeps) {}

  open(session: RecordingSession, params: { chunkSeconds: number }): this {
    this.session = session;
    this.budgetFrames = chunkBudgetFrames({ chunkSeconds: params.chunkSeconds, sampleRate: session.sampleRate });
    this.frameBytes = bytesPerFrame(session.channels);
    if (session.format === "wav" && this.budgetFrames > maxWavChunkFrames(session.channels)) {
      const maxFrames = maxWavChunkFrames(session.channels);
      this.deps.log.warn("ChunkWriter: чанк не помещается в один WAV, длина уменьшена", {
        sessionId: session.sessionId,
        requestedFrames: this.budgetFrames,
        maxFrames,
      });
      this.budgetFrames = maxFrames;
    }
    this.current = null;
    this.failed = null;
    this.carry = Buffer.alloc(0);
    this.nextIndex = 1;
    this.closed = false;
    this.deps.log.info("ChunkWriter: открыт", {
      sessionId: session.sessionId,
      budgetFrames: this.budgetFrames,
      format: session.format,
      outputDir: session.outputDir,
    });
    return this;
  }

  /** Кадров в текущем (незакрытом) чанке. */
  get bufferedFrames(): number {
    return this.current?.frames ?? 0;
  }

  get chunkBudgetFrames(): number {
    return this.budgetFrames;
  }

  /**
   * Принять пачку кадров. Возвращает чанки, закрытые этой пачкой (обычно 0 или 1).
   * При ошибке записи бросает `WriteError`; после неё `push()` больше не принимает кадры.
   */
  async push(frames: Buffer): Promise<CompletedChunk[]> {
    const session = this.requireOpen();
    if (this.failed) throw new AppError({ code: APP_ERROR.INTERNAL, message: "Рекордер: запись чанков остановлена после ошибки" });

    let data = this.carry.length ? Buffer.concat([this.carry, frames]) : frames;
    const whole = data.length - (data.length % this.frameBytes);
    this.carry = whole < data.length ? Buffer.from(data.subarray(whole)) : Buffer.alloc(0);
    data = data.subarray(0, whole);

    const completed: CompletedChunk[] = [];
    let offset = 0;
    while (offset < data.length) {
      const cur = this.current ?? this.startChunk();
      const takeFrames = Math.min(this.budgetFrames - cur.frames, (data.length - offset) / this.frameBytes);
      const takeBytes = takeFrames * this.frameBytes;
      cur.parts.push(Buffer.from(data.subarray(offset, offset + takeBytes)));
      cur.frames += takeFrames;
      offset += takeBytes;
      if (cur.frames < this.budgetFrames) continue;

      this.current = null;
      try {
        completed.push(await this.flush(session, cur));
      } catch (e) {
        this.failed = cur;
        const droppedFrames = (data.length - offset) / this.frameBytes;
        if (droppedFrames > 0) this.deps.log.warn("ChunkWriter: кадры после ошибки записи отброшены", { droppedFrames });
        throw new WriteError({ filePath: this.filePathFor(session, cur.index), cause: e, completed });
      }
    }
    return completed;
  }

  /**
   * Дописать последний (возможно, короткий) чанк. Буфер не теряется:
   * если до этого запись упала, здесь делается одна повторная попытка.
   */
  async close(): Promise<CompletedChunk | null> {
    const session = this.requireOpen();
    this.closed = true;
    const pending = this.failed ?? this.current;
    this.failed = null;
    this.current = null;
    if (this.carry.length) this.deps.log.warn("ChunkWriter: неполный кадр в конце потока отброшен", { bytes: this.carry.length });
    this.carry = Buffer.alloc(0);
    if (!pending || pending.frames === 0) return null;

    try {
      return await this.flush(session, pending);
    } catch (e) {
      throw new WriteError({ filePath: this.filePathFor(session, pending.index), cause: e });
    }
  }

  private startChunk(): PendingChunk {
    const chunk: PendingChunk = { index: this.nextIndex, startedAt: this.deps.now(), parts: [], frames: 0 };
    this.nextIndex += 1;
    this.current = chunk;
    return chunk;
  }

  private async flush(session: RecordingSession, chunk: PendingChunk): Promise<CompletedChunk> {
    const filePath = this.filePathFor(session, chunk.index);
    const pcm = Buffer.concat(chunk.parts);
    const data = session.format === "wav" ? Buffer.concat([wavHeader({ sampleRate: session.sampleRate, channels: session.channels, dataBytes: pcm.length }), pcm]) : pcm;

    try {
      await (this.deps.writeFile ?? writeChunkFileDurable)(filePath, data);
    } catch (e) {
      this.deps.log.error("ChunkWriter: ошибка записи чанка", { filePath, chunkIndex: chunk.index, error: e });
      try {
        await rm(filePath, { force: true });
      } catch (rmErr) {
        this.deps.log.warn("ChunkWriter: не удалось удалить недописанный файл", { filePath, error: rmErr });
      }
      throw e;
    }

    const out: CompletedChunk = Object.freeze({
      chunkIndex: chunk.index,
      filePath,
      startedAt: chunk.startedAt,
      durationSec: durationSecFromFrames(chunk.frames, session.sampleRate),
      sampleCount: chunk.frames,
    });
    this.deps.log.info("ChunkWriter: чанк записан", { filePath, chunkIndex: out.chunkIndex, sampleCount: out.sampleCount, bytes: data.length });
    return out;
  }

  private filePathFor(session: RecordingSession, index: number): string {
    return path.join(session.outputDir, chunkFileName({ stem: session.sessionId, index, ext: session.format }));
  }

  private requireOpen(): RecordingSession {
    if (!this.session || this.closed) {
      throw new AppError({ code: APP_ERROR.INTERNAL, message: "Рекордер: ChunkWriter не открыт" });
    }
    return this.session;
  }
}
