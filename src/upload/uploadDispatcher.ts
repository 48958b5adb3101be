import type { Logger } from "../log/logService";
import type { CompletedChunk, RecordingSession, UploadResult } from "../recording/recordingSessionTypes";
import type { RemoteStorage } from "./remoteStorage";
import { buildObjectKey } from "../domain/policies/objectKey";
import { retryDelayMsPolicy } from "../domain/policies/uploadBackoff";
import { errorMessageOf } from "../shared/appError";

export type UploadDispatcherOptions = {
  workers: number;
  queueCapacity: number;
  maxAttempts: number;
  retryBackoffMs: number;
  /** Префикс ключей объектов. */
  prefix: string;
};

export type UploadDispatcherDeps = {
  /** `null` = хранилище не настроено или выгрузка отключена. */
  storage: RemoteStorage | null;
  log: Logger;
  sleep?: (ms: number) => Promise<void>;
};

/** Квитанция `submit()`: итог приходит в `result`, не блокируя захват. */
export type UploadTicket = {
  chunkIndex: number;
  /** Ключ, под которым чанк будет выгружаться (`null`, если выгрузки не будет). */
  objectKey: string | null;
  result: Promise<UploadResult>;
  /** Итог, если он уже известен. */
  peek(): UploadResult | null;
};

export type DrainReport = {
  /** Очередь опустела и ничего не выгружается. */
  drained: boolean;
  abandoned: number;
  /** Выгрузки, оставшиеся в процессе после таймаута. */
  inFlight: number;
};

type Job = {
  sessionId: string;
  chunk: CompletedChunk;
  key: string;
  resolve: (r: UploadResult) => void;
};

async function defaultSleep(ms: number): Promise<void> {
  return await new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Неблокирующая выгрузка готовых чанков: ограниченная очередь + пул воркеров.
 *
 * Ошибки выгрузки не выходят за пределы диспетчера: они логируются как warn
 * и превращаются в `UploadResult` со статусом `failed`.
 */
export class UploadDispatcher {
  private queue: Job[] = [];
  private inFlight = 0;
  private activeWorkers = 0;
  private closed = false;
  private idleWaiters = new Set<() => void>();

  constructor(
    private options: UploadDispatcherOptions,
    private deps: UploadDispatcherDeps,
  ) {}

  get enabled(): boolean {
    return this.deps.storage !== null;
  }

  get pendingCount(): number {
    return this.queue.length + this.inFlight;
  }

  /** Поставить чанк в очередь. Никогда не ждёт выгрузки. */
  submit(session: RecordingSession, chunk: CompletedChunk): UploadTicket {
    const storage = this.deps.storage;
    if (!storage) return settledTicket(chunk.chunkIndex, null, { status: "not_attempted", s3ObjectKey: null, s3Uploaded: false, attempts: 0 });

    const key = buildObjectKey({ filePath: chunk.filePath, sessionId: session.sessionId, conversationId: session.conversationId, prefix: this.options.prefix });
    if (this.closed) {
      return settledTicket(chunk.chunkIndex, key, { status: "skipped", s3ObjectKey: null, s3Uploaded: false, attempts: 0, error: "диспетчер выгрузки закрыт" });
    }
    if (this.queue.length >= Math.max(1, this.options.queueCapacity)) {
      this.deps.log.warn("Выгрузка: очередь переполнена, чанк пропущен", { chunkIndex: chunk.chunkIndex, queueCapacity: this.options.queueCapacity });
      return settledTicket(chunk.chunkIndex, key, { status: "skipped", s3ObjectKey: null, s3Uploaded: false, attempts: 0, error: "очередь выгрузки переполнена" });
    }

    let settled: UploadResult | null = null;
    const result = new Promise<UploadResult>((resolve) => {
      this.queue.push({
        sessionId: session.sessionId,
        chunk,
        key,
        resolve: (r) => {
          if (settled) return;
          settled = r;
          resolve(r);
        },
      });
    });
    this.pump();
    return { chunkIndex: chunk.chunkIndex, objectKey: key, result, peek: () => settled };
  }

  /**
   * Дождаться пустой очереди и окончания выгрузок, но не дольше `timeoutMs`.
   * По таймауту всё, что ещё в очереди, получает `abandoned`; начатые выгрузки продолжаются.
   */
  async drain(timeoutMs: number): Promise<DrainReport> {
    if (this.isIdle()) return { drained: true, abandoned: 0, inFlight: 0 };

    let resolveDrained: (drained: boolean) => void = () => undefined;
    const done = new Promise<boolean>((resolve) => {
      resolveDrained = resolve;
    });
    const onIdle = () => resolveDrained(true);
    this.idleWaiters.add(onIdle);
    const timer = setTimeout(() => resolveDrained(false), Math.max(0, timeoutMs));
    const drained = await done;
    clearTimeout(timer);
    this.idleWaiters.delete(onIdle);
    if (drained) return { drained: true, abandoned: 0, inFlight: 0 };

    const abandoned = this.abandonQueued("истёк таймаут ожидания выгрузки");
    this.deps.log.warn("Выгрузка: таймаут drain", { timeoutMs, abandoned, inFlight: this.inFlight });
    return { drained: false, abandoned, inFlight: this.inFlight };
  }

  /**
   * Остановить воркеры; то, что не начало выгружаться, получает `abandoned`.
   * Хранилище закрывается: начатые выгрузки обрываются и не держат процесс.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const abandoned = this.abandonQueued("диспетчер выгрузки закрыт");
    if (abandoned > 0) this.deps.log.warn("Выгрузка: диспетчер закрыт с непустой очередью", { abandoned });
    if (this.inFlight > 0) this.deps.log.warn("Выгрузка: незавершённые выгрузки оборваны", { inFlight: this.inFlight });
    this.deps.storage?.close();
  }

  private pump(): void {
    const max = Math.max(1, Math.floor(this.options.workers));
    while (this.activeWorkers < max && this.queue.length > 0 && !this.closed) {
      this.activeWorkers += 1;
      void this.worker().finally(() => {
        this.activeWorkers -= 1;
        this.notifyIdle();
      });
    }
  }

  private async worker(): Promise<void> {
    for (;;) {
      if (this.closed) return;
      const job = this.queue.shift();
      if (!job) return;
      this.inFlight += 1;
      try {
        job.resolve(await this.upload(job));
      } catch (e) {
        this.deps.log.error("Выгрузка: внутренняя ошибка воркера", { chunkIndex: job.chunk.chunkIndex, error: e });
        job.resolve({ status: "failed", s3ObjectKey: job.key, s3Uploaded: false, attempts: 0, error: errorMessageOf(e) });
      } finally {
        this.inFlight -= 1;
      }
    }
  }

  private async upload(job: Job): Promise<UploadResult> {
    const storage = this.deps.storage;
    if (!storage) return { status: "not_attempted", s3ObjectKey: null, s3Uploaded: false, attempts: 0 };
    const maxAttempts = Math.max(1, Math.floor(this.options.maxAttempts));
    const sleep = this.deps.sleep ?? defaultSleep;

    let lastError = "";
    let attempts = 0;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      attempts = attempt;
      try {
        await storage.put(job.key, job.chunk.filePath);
        this.deps.log.info("Выгрузка: чанк выгружен", { bucket: storage.bucket, key: job.key, chunkIndex: job.chunk.chunkIndex, attempt });
        return { status: "uploaded", s3ObjectKey: job.key, s3Uploaded: true, attempts: attempt };
      } catch (e) {
        lastError = errorMessageOf(e);
        this.deps.log.warn("Выгрузка: ошибка", { key: job.key, chunkIndex: job.chunk.chunkIndex, attempt, maxAttempts, error: e });
        if (this.closed) break;
        if (attempt < maxAttempts) await sleep(retryDelayMsPolicy({ attempt, baseMs: this.options.retryBackoffMs }));
      }
    }
    return { status: "failed", s3ObjectKey: job.key, s3Uploaded: false, attempts, error: lastError };
  }

  private abandonQueued(reason: string): number {
    const left = this.queue.splice(0, this.queue.length);
    for (const job of left) job.resolve({ status: "abandoned", s3ObjectKey: null, s3Uploaded: false, attempts: 0, error: reason });
    this.notifyIdle();
    return left.length;
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.inFlight === 0;
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    for (const w of Array.from(this.idleWaiters)) w();
    this.idleWaiters.clear();
  }
}

function settledTicket(chunkIndex: number, objectKey: string | null, r: UploadResult): UploadTicket {
  return { chunkIndex, objectKey, result: Promise.resolve(r), peek: () => r };
}
