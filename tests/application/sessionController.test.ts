import { access, mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SessionController, type SessionConfig } from "../../src/application/recording/sessionController";
import { ChunkWriter, writeChunkFileDurable, type ChunkFileWriter } from "../../src/recording/chunkWriter";
import { SessionLog } from "../../src/recording/sessionLog";
import { reconcileChunkUploads } from "../../src/recording/sessionLogReader";
import type { SessionState } from "../../src/recording/recordingSessionTypes";
import type { RemoteStorage } from "../../src/upload/remoteStorage";
import { UploadDispatcher } from "../../src/upload/uploadDispatcher";
import { LogService } from "../../src/log/logService";
import { AppError } from "../../src/shared/appError";
import { FakeAudioSource, FakeRemoteStorage, T0, T0_STEM, memoryLog } from "../helpers/fakes";

type Harness = {
  controller: SessionController;
  source: FakeAudioSource;
  log: LogService;
  journal: ReturnType<typeof memoryLog>;
};

describe("SessionController", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "recorder-session-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  /** 1000 Гц моно, чанк 1 с, пачки по 250 кадров. */
  function harness(params: {
    source?: FakeAudioSource;
    storage?: RemoteStorage | null;
    config?: Partial<SessionConfig>;
    writeFile?: ChunkFileWriter;
    isStemTaken?: (stem: string) => Promise<boolean>;
    journal?: ReturnType<typeof memoryLog>;
  } = {}): Harness {
    const log = new LogService(5000);
    const journal = params.journal ?? memoryLog();
    const source = params.source ?? new FakeAudioSource({ framesPerRead: 250 });
    const config: SessionConfig = {
      outputDir: dir,
      deviceId: null,
      deviceName: "default",
      conversationId: null,
      sampleRate: 1000,
      channels: 1,
      format: "wav",
      chunkSeconds: 1,
      timestampFormat: "{ts}",
      datetimeFormat: "%y%m%d%H%M%S",
      drainTimeoutMs: 5000,
      logGraceMs: 0,
      ...params.config,
    };
    const controller = new SessionController(config, {
      now: () => T0,
      log,
      audioSource: source,
      chunkWriter: new ChunkWriter({ now: () => T0, log, writeFile: params.writeFile }),
      sessionLog: new SessionLog({ filePath: path.join(dir, "recordings.jsonl"), log, appendLine: journal.appendLine }),
      uploads: new UploadDispatcher(
        { workers: 2, queueCapacity: 16, maxAttempts: 1, retryBackoffMs: 0, prefix: "" },
        { storage: params.storage === undefined ? new FakeRemoteStorage() : params.storage, log },
      ),
      isStemTaken: params.isStemTaken ?? (async () => false),
    });
    return { controller, source, log, journal };
  }

  it("2 секунды при чанке в 1 секунду: два файла, две записи chunk, start и end", async () => {
    const { controller, journal, source } = harness();

    const summary = await controller.run({ durationSec: 2 });

    expect(summary.state).toBe("ended");
    expect(summary.aborted).toBe(false);
    expect(summary.fatalError).toBeUndefined();
    expect(summary.chunks.map((c) => [c.chunkIndex, c.sampleCount])).toEqual([
      [1, 1000],
      [2, 1000],
    ]);
    expect(summary.uploads).toEqual({ uploaded: 2, failed: 0, skipped: 0, not_attempted: 0, abandoned: 0, pending: 0 });
    expect(source.closed).toBe(true);
    expect(source.opened).toEqual([{ device: null, sampleRate: 1000, channels: 1 }]);

    expect((await readdir(dir)).sort()).toEqual([`${T0_STEM}_01.wav`, `${T0_STEM}_02.wav`]);

    const entries = journal.entries();
    const starts = entries.filter((e) => e.type === "session" && e.event === "start");
    const ends = entries.filter((e) => e.type === "session" && e.event === "end");
    expect(starts).toHaveLength(1);
    expect(entries[0]).toEqual(starts[0]);
    expect(entries[entries.length - 1]).toEqual({
      type: "session",
      event: "end",
      session_id: T0_STEM,
      ended_at: "2026-02-23T14:30:22",
      total_duration_sec: 2,
      chunk_count: 2,
    });
    expect(ends).toHaveLength(1);
    expect(entries.filter((e) => e.type === "chunk").map((e) => (e.type === "chunk" ? e.chunk_index : 0))).toEqual([1, 2]);

    expect(reconcileChunkUploads(entries).map((c) => [c.filePath, c.s3ObjectKey, c.s3Uploaded])).toEqual([
      [path.join(dir, `${T0_STEM}_01.wav`), `${T0_STEM}/${T0_STEM}_01.wav`, true],
      [path.join(dir, `${T0_STEM}_02.wav`), `${T0_STEM}/${T0_STEM}_02.wav`, true],
    ]);
    expect(Object.isFrozen(summary.session)).toBe(true);
  });

  it("хранилище недоступно: все чанки s3_uploaded=false, файлы остаются", async () => {
    const storage = new FakeRemoteStorage({ fail: () => true });
    const { controller, journal, log } = harness({ storage });

    const summary = await controller.run({ durationSec: 2 });

    expect(summary.fatalError).toBeUndefined();
    expect(summary.uploads.failed).toBe(2);
    const chunks = reconcileChunkUploads(journal.entries());
    expect(chunks.map((c) => c.s3Uploaded)).toEqual([false, false]);
    for (const c of chunks) await expect(access(c.filePath)).resolves.toBeUndefined();
    expect(log.list().filter((e) => e.level === "warn" && e.message === "Выгрузка: ошибка")).toHaveLength(2);
  });

  it("выгрузка не настроена: ключ null, статус not_attempted", async () => {
    const { controller, journal } = harness({ storage: null });

    const summary = await controller.run({ durationSec: 1 });

    expect(summary.uploads.not_attempted).toBe(1);
    const chunkEntries = journal.entries().filter((e) => e.type === "chunk");
    expect(chunkEntries).toHaveLength(1);
    expect(chunkEntries[0]).toMatchObject({ s3_object_key: null, s3_uploaded: false });
  });

  it("ошибка выгрузки чанка N не блокирует чанк N+1", async () => {
    const storage = new FakeRemoteStorage({ fail: (key) => key.endsWith("_01.wav") });
    const { controller, journal } = harness({ storage });

    const summary = await controller.run({ durationSec: 2 });

    expect(summary.uploads).toMatchObject({ uploaded: 1, failed: 1 });
    expect(reconcileChunkUploads(journal.entries()).map((c) => [c.chunkIndex, c.s3Uploaded])).toEqual([
      [1, false],
      [2, true],
    ]);
  });

  it("отмена посреди чанка: короткий последний чанк всё равно записан и в журнале", async () => {
    const abort = new AbortController();
    const source = new FakeAudioSource({
      framesPerRead: 250,
      onRead: (n) => {
        if (n === 7) abort.abort();
      },
    });
    const { controller, journal } = harness({ source });

    const summary = await controller.run({ signal: abort.signal });

    expect(summary.aborted).toBe(true);
    expect(summary.state).toBe("ended");
    expect(summary.fatalError).toBeUndefined();
    expect(summary.chunks.map((c) => [c.chunkIndex, c.sampleCount, c.durationSec])).toEqual([
      [1, 1000, 1],
      [2, 500, 0.5],
    ]);
    const entries = journal.entries();
    const chunk2 = entries.find((e) => e.type === "chunk" && e.chunk_index === 2);
    expect(chunk2).toMatchObject({ duration_sec: 0.5, sample_count: 500 });
    expect(entries[entries.length - 1]).toMatchObject({ type: "session", event: "end", total_duration_sec: 1.5, chunk_count: 2 });
  });

  it("уже отменённый сигнал: сессия без чанков всё равно закрывается", async () => {
    const abort = new AbortController();
    abort.abort();
    const { controller, journal } = harness();

    const summary = await controller.run({ signal: abort.signal });

    expect(summary.aborted).toBe(true);
    expect(summary.chunks).toEqual([]);
    expect(journal.entries().map((e) => (e.type === "session" ? e.event : e.type))).toEqual(["start", "end"]);
  });

  it("устройство не открылось: E_DEVICE, есть start, нет end", async () => {
    const source = new FakeAudioSource({
      framesPerRead: 250,
      openError: new AppError({ code: "E_DEVICE", message: "Рекордер: устройство занято" }),
    });
    const { controller, journal } = harness({ source });

    const summary = await controller.run({ durationSec: 2 });

    expect(summary.state).toBe("ended");
    expect(summary.fatalError).toEqual({ code: "E_DEVICE", message: "Рекордер: устройство занято" });
    expect(summary.chunks).toEqual([]);
    expect(journal.entries().map((e) => (e.type === "session" ? e.event : e.type))).toEqual(["start"]);
    expect(await readdir(dir)).toEqual([]);
  });

  it("поток оборвался: E_DEVICE, накопленное дописывается", async () => {
    const source = new FakeAudioSource({ framesPerRead: 250, failOnRead: 3 });
    const { controller } = harness({ source });

    const summary = await controller.run({ durationSec: 10 });

    expect(summary.aborted).toBe(true);
    expect(summary.fatalError?.code).toBe("E_DEVICE");
    expect(summary.fatalError?.message).toBe("Рекордер: поток захвата оборвался");
    expect(summary.chunks.map((c) => c.sampleCount)).toEqual([500]);
  });

  it("источник закончился сам: сессия завершается штатно", async () => {
    const source = new FakeAudioSource({ framesPerRead: 250, totalReads: 5 });
    const { controller } = harness({ source });

    const summary = await controller.run();

    expect(summary.aborted).toBe(false);
    expect(summary.chunks.map((c) => c.sampleCount)).toEqual([1000, 250]);
  });

  it("ошибка записи: E_WRITE, сессия прерывается, чанк повторяется при закрытии", async () => {
    let failures = 0;
    const writeFile: ChunkFileWriter = async (filePath, data) => {
      if (filePath.endsWith("_02.wav") && failures === 0) {
        failures += 1;
        throw new Error("ENOSPC: no space left on device");
      }
      await writeChunkFileDurable(filePath, data);
    };
    const { controller, journal } = harness({ writeFile });

    const summary = await controller.run({ durationSec: 3 });

    expect(summary.aborted).toBe(true);
    expect(summary.fatalError?.code).toBe("E_WRITE");
    expect(summary.chunks.map((c) => c.chunkIndex)).toEqual([1, 2]);
    expect(journal.entries()[journal.entries().length - 1]).toMatchObject({ type: "session", event: "end", chunk_count: 2 });
  });

  it("длительность режет последнюю пачку по кадрам", async () => {
    const { controller } = harness();

    const summary = await controller.run({ durationSec: 1.1 });

    expect(summary.chunks.map((c) => c.sampleCount)).toEqual([1000, 100]);
    expect(summary.session?.totalDurationSec).toBeCloseTo(1.1, 9);
  });

  it("занятый stem получает суффикс", async () => {
    const { controller } = harness({ isStemTaken: async (stem) => stem === T0_STEM });

    const summary = await controller.run({ durationSec: 1 });

    expect(summary.session?.sessionId).toBe(`${T0_STEM}-2`);
    expect(summary.chunks[0]?.filePath).toBe(path.join(dir, `${T0_STEM}-2_01.wav`));
  });

  it("с log_grace_ms итог выгрузки попадает прямо в запись chunk", async () => {
    const { controller, journal } = harness({ config: { logGraceMs: 1000 } });

    await controller.run({ durationSec: 2 });

    const entries = journal.entries();
    expect(entries.map((e) => e.type)).toEqual(["session", "chunk", "chunk", "session"]);
    expect(entries.filter((e) => e.type === "chunk").map((e) => (e.type === "chunk" ? e.s3_uploaded : null))).toEqual([true, true]);
  });

  it("без grace запись chunk идёт сразу, итог приходит поправкой chunk_upload", async () => {
    const storage = new FakeRemoteStorage({ delayMs: 20 });
    const { controller, journal } = harness({ storage });

    await controller.run({ durationSec: 2 });

    const entries = journal.entries();
    expect(entries.filter((e) => e.type === "chunk").map((e) => (e.type === "chunk" ? [e.s3_object_key, e.s3_uploaded] : null))).toEqual([
      [`${T0_STEM}/${T0_STEM}_01.wav`, false],
      [`${T0_STEM}/${T0_STEM}_02.wav`, false],
    ]);
    expect(entries.filter((e) => e.type === "chunk_upload")).toHaveLength(2);
    expect(reconcileChunkUploads(entries).map((c) => [c.s3Uploaded, c.uploadStatus])).toEqual([
      [true, "uploaded"],
      [true, "uploaded"],
    ]);
    expect(entries[entries.length - 1]).toMatchObject({ type: "session", event: "end" });
  });

  it("выгрузка, не успевшая к drain, после end идёт только в лог", async () => {
    const storage = new FakeRemoteStorage({ hold: true });
    const { controller, journal, log } = harness({ storage, config: { drainTimeoutMs: 10 } });

    const summary = await controller.run({ durationSec: 1 });

    expect(summary.uploads.pending).toBe(1);
    expect(storage.closed).toBe(true);
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(journal.entries().map((e) => e.type)).toEqual(["session", "chunk", "session"]);
    const late = log.list().filter((e) => e.message === "Выгрузка завершилась после конца сессии");
    expect(late).toHaveLength(1);
    expect(late[0]).toMatchObject({ level: "warn", data: { status: "failed", error: "хранилище закрыто" } });
  });

  it("файл чанка уже на диске и не пуст, когда пишется его строка chunk", async () => {
    const { controller, journal } = harness({ journal: memoryLog({ statChunkFiles: true }) });

    await controller.run({ durationSec: 2 });

    // 44 байта заголовка WAV + 1000 кадров моно s16le
    expect(journal.chunkFileSizes).toEqual([2044, 2044]);
  });

  it("ошибка журнала не останавливает захват и считается в logErrors", async () => {
    const journal = memoryLog({ failOn: (e) => e.type === "chunk" && e.chunk_index === 1 });
    const { controller, log } = harness({ journal });

    const summary = await controller.run({ durationSec: 2 });

    expect(summary.fatalError).toBeUndefined();
    expect(summary.logErrors).toBe(1);
    expect(summary.chunks.map((c) => c.chunkIndex)).toEqual([1, 2]);
    expect((await readdir(dir)).sort()).toEqual([`${T0_STEM}_01.wav`, `${T0_STEM}_02.wav`]);

    const entries = journal.entries();
    expect(entries.flatMap((e) => (e.type === "chunk" ? [e.chunk_index] : []))).toEqual([2]);
    expect(entries[entries.length - 1]).toMatchObject({ type: "session", event: "end", chunk_count: 2 });
    expect(log.list().filter((e) => e.level === "error").map((e) => e.message)).toEqual(["SessionLog: ошибка дозаписи"]);
  });

  it("состояния и статистика", async () => {
    const { controller } = harness();
    const states: SessionState[] = [];
    controller.setOnStats((s) => {
      if (states[states.length - 1] !== s.state) states.push(s.state);
    });

    await controller.run({ durationSec: 1 });

    expect(states).toEqual(["starting", "capturing", "finalizing", "ended"]);
    expect(controller.getState()).toBe("ended");
    expect(controller.getStats()).toMatchObject({ state: "ended", sessionId: T0_STEM, chunksTotal: 1 });
    await expect(controller.run()).rejects.toThrow("сессия уже запускалась");
  });
});
