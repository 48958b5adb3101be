import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ChunkWriter, WriteError, type ChunkFileWriter } from "../../src/recording/chunkWriter";
import type { RecordingSession } from "../../src/recording/recordingSessionTypes";
import { LogService } from "../../src/log/logService";
import { isAppError } from "../../src/shared/appError";
import { T0 } from "../helpers/fakes";

function makeSession(outputDir: string, patch: Partial<RecordingSession> = {}): RecordingSession {
  return {
    sessionId: "s",
    conversationId: null,
    deviceId: null,
    deviceName: "default",
    sampleRate: 1000,
    channels: 1,
    format: "pcm",
    outputDir,
    startedAt: T0,
    endedAt: null,
    totalDurationSec: 0,
    chunkCount: 0,
    ...patch,
  };
}

function frames(n: number, channels = 1): Buffer {
  return Buffer.alloc(n * 2 * channels, 7);
}

/** Писатель в память; `failures` = сколько первых вызовов упадут. */
function memoryWriter(failures = 0): { write: ChunkFileWriter; files: Map<string, Buffer>; calls: string[] } {
  const files = new Map<string, Buffer>();
  const calls: string[] = [];
  let left = failures;
  return {
    files,
    calls,
    write: async (filePath, data) => {
      calls.push(filePath);
      if (left > 0) {
        left -= 1;
        throw new Error("ENOSPC: no space left on device");
      }
      files.set(filePath, data);
    },
  };
}

describe("ChunkWriter", () => {
  let dir = "";
  let log: LogService;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "recorder-chunks-"));
    log = new LogService(1000);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("режет поток ровно по бюджету и дописывает короткий хвост", async () => {
    const mem = memoryWriter();
    const w = new ChunkWriter({ now: () => T0, log, writeFile: mem.write }).open(makeSession(dir), { chunkSeconds: 1 });

    const done = await w.push(frames(2500));
    expect(done.map((c) => [c.chunkIndex, c.sampleCount, c.durationSec])).toEqual([
      [1, 1000, 1],
      [2, 1000, 1],
    ]);
    expect(w.bufferedFrames).toBe(500);
    expect(w.chunkBudgetFrames).toBe(1000);

    const last = await w.close();
    expect(last).toMatchObject({ chunkIndex: 3, sampleCount: 500, durationSec: 0.5, filePath: path.join(dir, "s_03.pcm") });
    expect(Array.from(mem.files.keys())).toEqual([path.join(dir, "s_01.pcm"), path.join(dir, "s_02.pcm"), path.join(dir, "s_03.pcm")]);
    expect(mem.files.get(path.join(dir, "s_03.pcm"))?.length).toBe(1000);
  });

  it("переносит неполный кадр в следующую пачку", async () => {
    const mem = memoryWriter();
    const w = new ChunkWriter({ now: () => T0, log, writeFile: mem.write }).open(makeSession(dir, { channels: 2 }), { chunkSeconds: 1 });

    await w.push(Buffer.alloc(6));
    expect(w.bufferedFrames).toBe(1);
    await w.push(Buffer.alloc(2));
    expect(w.bufferedFrames).toBe(2);
  });

  it("время начала чанка = момент его первого кадра", async () => {
    let t = T0.getTime();
    const mem = memoryWriter();
    const w = new ChunkWriter({ now: () => new Date(t), log, writeFile: mem.write }).open(makeSession(dir), { chunkSeconds: 1 });

    await w.push(frames(1000));
    t += 5000;
    await w.push(frames(10));
    const last = await w.close();
    expect(last?.startedAt.getTime()).toBe(T0.getTime() + 5000);
  });

  it("пишет WAV-заголовок и реальные файлы", async () => {
    const w = new ChunkWriter({ now: () => T0, log }).open(makeSession(path.join(dir, "nested"), { format: "wav" }), { chunkSeconds: 1 });
    const [chunk] = await w.push(frames(1000));
    expect(chunk?.filePath).toBe(path.join(dir, "nested", "s_01.wav"));

    const data = await readFile(path.join(dir, "nested", "s_01.wav"));
    expect(data.length).toBe(44 + 2000);
    expect(data.toString("ascii", 0, 4)).toBe("RIFF");
    expect(data.readUInt32LE(40)).toBe(2000);
    expect(await w.close()).toBeNull();
  });

  it("ошибка записи: WriteError, дальнейший push запрещён, close повторяет чанк", async () => {
    const mem = memoryWriter(1);
    const w = new ChunkWriter({ now: () => T0, log, writeFile: mem.write }).open(makeSession(dir), { chunkSeconds: 1 });

    let caught: unknown;
    try {
      await w.push(frames(1500));
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(WriteError);
    if (!(caught instanceof WriteError)) throw new Error("expected WriteError");
    expect(caught.dto.code).toBe("E_WRITE");
    expect(caught.dto.details).toEqual({ filePath: path.join(dir, "s_01.pcm") });
    expect(caught.completed).toEqual([]);
    expect(log.list().some((e) => e.message === "ChunkWriter: кадры после ошибки записи отброшены" && e.data?.droppedFrames === 500)).toBe(true);

    await expect(w.push(frames(10))).rejects.toSatisfy((e: unknown) => isAppError(e) && e.dto.code === "E_INTERNAL");

    const retried = await w.close();
    expect(retried).toMatchObject({ chunkIndex: 1, sampleCount: 1000 });
    expect(mem.calls).toEqual([path.join(dir, "s_01.pcm"), path.join(dir, "s_01.pcm")]);
  });

  it("чанки, записанные до ошибки в той же пачке, отдаются в WriteError", async () => {
    let calls = 0;
    const w = new ChunkWriter({
      now: () => T0,
      log,
      writeFile: async () => {
        calls += 1;
        if (calls === 2) throw new Error("EIO");
      },
    }).open(makeSession(dir), { chunkSeconds: 1 });

    const e = await w.push(frames(2000)).then(
      () => null,
      (x: unknown) => x,
    );
    if (!(e instanceof WriteError)) throw new Error("expected WriteError");
    expect(e.completed.map((c) => c.chunkIndex)).toEqual([1]);
  });

  it("close без кадров ничего не пишет; после close и до open вызовы запрещены", async () => {
    const mem = memoryWriter();
    const w = new ChunkWriter({ now: () => T0, log, writeFile: mem.write });
    await expect(w.push(frames(1))).rejects.toThrow("ChunkWriter не открыт");

    w.open(makeSession(dir), { chunkSeconds: 1 });
    expect(await w.close()).toBeNull();
    expect(mem.calls).toEqual([]);
    await expect(w.close()).rejects.toThrow("ChunkWriter не открыт");
  });

  it("бюджет WAV-чанка не превышает 32-битный размер RIFF", () => {
    const wav = new ChunkWriter({ now: () => T0, log }).open(makeSession(dir, { format: "wav", sampleRate: 48000, channels: 2 }), { chunkSeconds: 100_000 });
    expect(wav.chunkBudgetFrames).toBe(1_073_741_814);
    expect(log.list().map((e) => e.message)).toContain("ChunkWriter: чанк не помещается в один WAV, длина уменьшена");

    const pcm = new ChunkWriter({ now: () => T0, log }).open(makeSession(dir, { format: "pcm", sampleRate: 48000, channels: 2 }), { chunkSeconds: 100_000 });
    expect(pcm.chunkBudgetFrames).toBe(4_800_000_000);
  });
});
