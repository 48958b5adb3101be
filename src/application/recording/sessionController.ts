import type { Logger } from "../../log/logService";
import type { AudioCaptureStream, AudioSource } from "../../recording/audioSource";
import type { ChunkWriter } from "../../recording/chunkWriter";
import type { SessionLog } from "../../recording/sessionLog";
import type { CompletedChunk, RecordingSession, RecordingStats, SessionState, UploadResult, UploadStatus } from "../../recording/recordingSessionTypes";
import type { UploadDispatcher, UploadTicket } from "../../upload/uploadDispatcher";
import type { AudioFileFormat } from "../../types";
import type { AppErrorDto } from "../../shared/result";
import { WriteError } from "../../recording/chunkWriter";
import { bytesPerFrame, nextChunkInMsPolicy } from "../../domain/policies/chunkBudget";
import { pickFreeSessionStem, renderSessionStem } from "../../domain/policies/chunkFileNaming";
import { shouldEmitByInterval } from "../../domain/policies/rateLimit";
import { toAppErrorDto } from "../../shared/appError";
import { APP_ERROR } from "../../shared/appErrorCodes";

export type SessionConfig = {
  outputDir: string;
  deviceId: string | null;
  deviceName: string;
  conversationId: string | null;
  sampleRate: number;
  channels: number;
  format: AudioFileFormat;
  chunkSeconds: number;
  timestampFormat: string;
  datetimeFormat: string;
  drainTimeoutMs: number;
  logGraceMs: number;
};

export type SessionControllerDeps = {
  now: () => Date;
  log: Logger;
  audioSource: AudioSource;
  chunkWriter: ChunkWriter;
  sessionLog: SessionLog;
  uploads: UploadDispatcher;
  /** Занят ли stem (уже есть файлы чанков с таким префиксом). */
  isStemTaken: (stem: string) => Promise<boolean>;
  /** Минимальный интервал между вызовами `onStats` на каждой пачке. По умолчанию 250 мс. */
  statsIntervalMs?: number;
};

export type UploadCounters = Record<UploadStatus, number> & {
  /** Выгрузки, не завершившиеся к концу сессии. */
  pending: number;
};

export type SessionSummary = {
  state: SessionState;
  /** `null`, если сессия не успела создаться. */
  session: RecordingSession | null;
  chunks: CompletedChunk[];
  uploads: UploadCounters;
  /** Сколько записей в журнал сессий не удалось дописать. */
  logErrors: number;
  /** Запись прервана (AbortSignal или фатальная ошибка). */
  aborted: boolean;
  fatalError?: AppErrorDto;
};

type TrackedChunk = {
  chunk: CompletedChunk;
  ticket: UploadTicket;
  /** Запись `chunk` ушла без итога выгрузки: нужна поправка `chunk_upload`. */
  correction?: Promise<void>;
};

const ABORTED = Symbol("aborted");

/**
 * Одна сессия записи: Idle → Starting → Capturing → (Aborting) → Finalizing → Ended.
 *
 * Захват идёт одним async-циклом; журнал и выгрузка питаются от готовых чанков
 * и не задерживают чтение из источника.
 */
export class SessionController {
  private state: SessionState = "idle";
  private session: RecordingSession | null = null;
  private stream: AudioCaptureStream | null = null;
  private tracked: TrackedChunk[] = [];
  /** Записи `chunk` идут строго по порядку chunk_index. */
  private chunkLogChain: Promise<void> = Promise.resolve();
  /** После `session end` итоги выгрузки идут только в лог. */
  private sessionClosed = false;
  private startedAtMs = 0;
  private lastStatsAtMs: number | null = null;
  private onStats?: (s: RecordingStats) => void;

  constructor(
    private config: SessionConfig,
    private deps: SessionControllerDeps,
  ) {}

  setOnStats(cb?: (s: RecordingStats) => void) {
    this.onStats = cb;
  }

  getState(): SessionState {
    return this.state;
  }

  /** Уровень входного сигнала, dB 0..120 (0, если поток не открыт). */
  level(): number {
    return this.stream?.level() ?? 0;
  }

  getStats(): RecordingStats {
    const s = this.session;
    const elapsedMs = s ? Math.max(0, this.deps.now().getTime() - this.startedAtMs) : 0;
    return {
      state: this.state,
      sessionId: s?.sessionId,
      elapsedMs,
      chunksTotal: s?.chunkCount ?? 0,
      nextChunkInMs:
        this.state === "capturing"
          ? nextChunkInMsPolicy({
              bufferedFrames: this.deps.chunkWriter.bufferedFrames,
              budgetFrames: this.deps.chunkWriter.chunkBudgetFrames,
              sampleRate: this.config.sampleRate,
            })
          : undefined,
      levelDb: this.level(),
    };
  }

  /**
   * Провести сессию до конца. Резолвится в `SessionSummary` ровно один раз;
   * фатальные ошибки попадают в `fatalError`, а не в reject.
   */
  async run(params: { durationSec?: number; signal?: AbortSignal } = {}): Promise<SessionSummary> {
    if (this.state !== "idle") {
      throw new Error("Рекордер: сессия уже запускалась (SessionController одноразовый)");
    }
    const log = this.deps.log;
    this.setState("starting");

    let session: RecordingSession;
    try {
      session = await this.createSession();
    } catch (e) {
      const fatal = toAppErrorDto(e, { code: APP_ERROR.INTERNAL, message: "Рекордер: не удалось создать сессию" });
      log.error("Сессия: не удалось создать", { error: fatal.cause ?? fatal.message });
      this.setState("ended");
      return this.summary({ aborted: false, fatalError: fatal });
    }
    this.session = session;
    await this.deps.sessionLog.recordSessionStart(session);

    try {
      this.stream = await this.deps.audioSource.open({ device: this.config.deviceId, sampleRate: this.config.sampleRate, channels: this.config.channels });
    } catch (e) {
      const fatal = toAppErrorDto(e, { code: APP_ERROR.DEVICE, message: "Рекордер: не удалось открыть устройство захвата" });
      log.error("Сессия: устройство не открылось", { sessionId: session.sessionId, backend: this.deps.audioSource.id, error: fatal.cause ?? fatal.message });
      this.setState("ended");
      return this.summary({ aborted: false, fatalError: fatal });
    }

    this.deps.chunkWriter.open(session, { chunkSeconds: this.config.chunkSeconds });
    this.startedAtMs = this.deps.now().getTime();
    this.setState("capturing");
    log.info("Сессия: захват начат", {
      sessionId: session.sessionId,
      backend: this.deps.audioSource.id,
      sampleRate: session.sampleRate,
      channels: session.channels,
      chunkSeconds: this.config.chunkSeconds,
    });

    const { aborted, fatalError } = await this.captureLoop(this.stream, params);

    if (aborted) this.setState("aborting");
    await this.closeStream();
    let finalError = fatalError;
    try {
      const last = await this.deps.chunkWriter.close();
      if (last) this.acceptChunk(last);
    } catch (e) {
      const dto = toAppErrorDto(e, { code: APP_ERROR.WRITE, message: "Рекордер: не удалось записать последний чанк" });
      log.error("Сессия: последний чанк не записан", { sessionId: session.sessionId, error: dto.cause ?? dto.message });
      finalError = finalError ?? dto;
    }

    this.setState("finalizing");
    await this.chunkLogChain;
    await this.finalize(session);

    this.setState("ended");
    log.info("Сессия: завершена", {
      sessionId: session.sessionId,
      chunkCount: session.chunkCount,
      totalDurationSec: session.totalDurationSec,
      aborted,
    });
    return this.summary({ aborted, fatalError: finalError });
  }

  private async createSession(): Promise<RecordingSession> {
    const startedAt = this.deps.now();
    const stem = renderSessionStem({
      template: this.config.timestampFormat,
      datetimeFormat: this.config.datetimeFormat,
      at: startedAt,
      deviceId: this.config.deviceId,
    });
    const sessionId = await pickFreeSessionStem(stem, this.deps.isStemTaken);
    return {
      sessionId,
      conversationId: this.config.conversationId,
      deviceId: this.config.deviceId,
      deviceName: this.config.deviceName,
      sampleRate: this.config.sampleRate,
      channels: this.config.channels,
      format: this.config.format,
      outputDir: this.config.outputDir,
      startedAt,
      endedAt: null,
      totalDurationSec: 0,
      chunkCount: 0,
    };
  }

  private async captureLoop(
    stream: AudioCaptureStream,
    params: { durationSec?: number; signal?: AbortSignal },
  ): Promise<{ aborted: boolean; fatalError?: AppErrorDto }> {
    const log = this.deps.log;
    const frameBytes = bytesPerFrame(this.config.channels);
    const limitFrames =
      typeof params.durationSec === "number" && Number.isFinite(params.durationSec) && params.durationSec > 0
        ? Math.round(params.durationSec * this.config.sampleRate)
        : Infinity;
    let capturedFrames = 0;

    while (capturedFrames < limitFrames) {
      if (params.signal?.aborted) {
        log.info("Сессия: отмена", { capturedFrames });
        return { aborted: true };
      }

      let batch: Buffer | null | typeof ABORTED;
      try {
        batch = await readOrAbort(stream, params.signal, log);
      } catch (e) {
        const dto = toAppErrorDto(e, { code: APP_ERROR.DEVICE, message: "Рекордер: поток захвата оборвался" });
        log.error("Сессия: ошибка чтения из источника", { error: dto.cause ?? dto.message });
        return { aborted: true, fatalError: dto };
      }
      if (batch === ABORTED) {
        log.info("Сессия: отмена", { capturedFrames });
        return { aborted: true };
      }
      if (batch === null) {
        log.info("Сессия: источник закончился", { capturedFrames });
        return { aborted: false };
      }

      const frames = Math.floor(batch.length / frameBytes);
      const take = Math.min(frames, limitFrames - capturedFrames);
      const data = take < frames ? batch.subarray(0, take * frameBytes) : batch;
      capturedFrames += take;

      try {
        const completed = await this.deps.chunkWriter.push(data);
        for (const c of completed) this.acceptChunk(c);
      } catch (e) {
        if (e instanceof WriteError) for (const c of e.completed) this.acceptChunk(c);
        const dto = toAppErrorDto(e, { code: APP_ERROR.WRITE, message: "Рекордер: не удалось записать чанк на диск" });
        log.error("Сессия: ошибка записи, прерываем", { error: dto.cause ?? dto.message, details: dto.details });
        return { aborted: true, fatalError: dto };
      }

      this.emitStats(false);
    }
    return { aborted: false };
  }

  /** Готовый чанк: учёт, выгрузка (без ожидания) и запись в журнал по порядку. */
  private acceptChunk(chunk: CompletedChunk): void {
    const session = this.session;
    if (!session) return;
    session.chunkCount += 1;
    session.totalDurationSec += chunk.durationSec;

    const ticket = this.deps.uploads.submit(session, chunk);
    const tracked: TrackedChunk = { chunk, ticket };
    this.tracked.push(tracked);
    this.chunkLogChain = this.chunkLogChain.then(() => this.logChunk(session, tracked));
    this.emitStats(true);
  }

  private async logChunk(session: RecordingSession, tracked: TrackedChunk): Promise<void> {
    const { chunk, ticket } = tracked;
    const outcome = ticket.peek() ?? (await waitForResult(ticket.result, this.config.logGraceMs));
    if (outcome) {
      await this.deps.sessionLog.recordChunk(session, chunk, outcome);
      return;
    }

    await this.deps.sessionLog.recordChunk(session, chunk, { s3ObjectKey: ticket.objectKey, s3Uploaded: false });
    tracked.correction = ticket.result.then(async (r) => {
      if (this.sessionClosed) {
        this.reportLateUpload(session, chunk, r);
        return;
      }
      await this.deps.sessionLog.recordChunkUpload(session, chunk, r);
    });
  }

  private async finalize(session: RecordingSession): Promise<void> {
    const log = this.deps.log;
    const report = await this.deps.uploads.drain(this.config.drainTimeoutMs);
    if (!report.drained) {
      log.warn("Сессия: не все выгрузки завершились", { sessionId: session.sessionId, abandoned: report.abandoned, inFlight: report.inFlight });
    }

    for (const t of this.tracked) {
      if (t.correction && t.ticket.peek()) await t.correction;
    }
    this.sessionClosed = true;
    this.deps.uploads.close();

    session.endedAt = this.deps.now();
    await this.deps.sessionLog.recordSessionEnd(session);
    Object.freeze(session);
  }

  private reportLateUpload(session: RecordingSession, chunk: CompletedChunk, r: UploadResult): void {
    const payload = { sessionId: session.sessionId, chunkIndex: chunk.chunkIndex, status: r.status, s3ObjectKey: r.s3ObjectKey, error: r.error };
    if (r.status === "uploaded") this.deps.log.info("Выгрузка завершилась после конца сессии", payload);
    else this.deps.log.warn("Выгрузка завершилась после конца сессии", payload);
  }

  private async closeStream(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    try {
      await stream.close();
    } catch (e) {
      this.deps.log.warn("Сессия: ошибка при закрытии источника", { error: e });
    }
  }

  private setState(next: SessionState): void {
    if (this.state === next) return;
    this.deps.log.info("Сессия: состояние", { from: this.state, to: next, sessionId: this.session?.sessionId });
    this.state = next;
    this.emitStats(true);
  }

  private emitStats(force: boolean): void {
    if (!this.onStats) return;
    const nowMs = this.deps.now().getTime();
    if (!force && !shouldEmitByInterval({ nowMs, lastAtMs: this.lastStatsAtMs, intervalMs: this.deps.statsIntervalMs ?? 250 })) return;
    this.lastStatsAtMs = nowMs;
    this.onStats(this.getStats());
  }

  private summary(params: { aborted: boolean; fatalError?: AppErrorDto }): SessionSummary {
    const uploads: UploadCounters = { uploaded: 0, failed: 0, skipped: 0, not_attempted: 0, abandoned: 0, pending: 0 };
    for (const t of this.tracked) {
      const r = t.ticket.peek();
      if (r) uploads[r.status] += 1;
      else uploads.pending += 1;
    }
    return {
      state: this.state,
      session: this.session,
      chunks: this.tracked.map((t) => t.chunk),
      uploads,
      logErrors: this.deps.sessionLog.errorCount,
      aborted: params.aborted,
      fatalError: params.fatalError,
    };
  }
}

/** `read()` наперегонки с AbortSignal. Брошенный `read()` не должен дать unhandled rejection. */
async function readOrAbort(stream: AudioCaptureStream, signal: AbortSignal | undefined, log: Logger): Promise<Buffer | null | typeof ABORTED> {
  const read = stream.read();
  if (!signal) return await read;
  const detach = () => {
    read.catch((e: unknown) => log.warn("Сессия: ошибка чтения после отмены", { error: e }));
  };
  if (signal.aborted) {
    detach();
    return ABORTED;
  }
  let onAbort: () => void = () => undefined;
  const aborted = new Promise<typeof ABORTED>((resolve) => {
    onAbort = () => resolve(ABORTED);
    signal.addEventListener("abort", onAbort, { once: true });
  });
  try {
    const out = await Promise.race([read, aborted]);
    if (out === ABORTED) detach();
    return out;
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}

async function waitForResult(result: Promise<UploadResult>, graceMs: number): Promise<UploadResult | null> {
  if (graceMs <= 0) return null;
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), graceMs);
  });
  try {
    return await Promise.race([result, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
