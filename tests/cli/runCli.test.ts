import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runCli } from "../../src/cli/runCli";

const TONE_CONFIG = `recording:
  backend: tone
  rate: 8000
  frames_per_read: 800
  chunk_size: 0.25
`;

describe("runCli", () => {
  let cwd = "";
  let out: string[] = [];
  let errLines: string[] = [];

  const run = (argv: string[]) => runCli(argv, { cwd, out: (l) => out.push(l), err: (l) => errLines.push(l) });

  beforeEach(async () => {
    cwd = await mkdtemp(path.join(tmpdir(), "recorder-cli-"));
    out = [];
    errLines = [];
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it("help и version", async () => {
    expect(await run(["help"])).toBe(0);
    expect(out[0]?.startsWith("chunk-recorder v0.1.0\n")).toBe(true);
    out = [];
    expect(await run(["version"])).toBe(0);
    expect(out).toEqual(["chunk-recorder v0.1.0"]);
  });

  it("неизвестная команда: код 1 и подсказка", async () => {
    expect(await run(["bogus"])).toBe(1);
    expect(errLines).toEqual(["Рекордер: неизвестная команда: bogus", 'Справка: "chunk-recorder help"']);
    expect(out).toEqual([]);
  });

  it("record на tone, затем sessions", async () => {
    await writeFile(path.join(cwd, ".chunk-recorder.yml"), TONE_CONFIG, "utf8");

    expect(await run(["record", "--duration", "0.5"])).toBe(0);
    expect(out[0]).toMatch(/^Сессия \d{12}: 2 чанк\(ов\), 0.5 с$/);
    expect(out[1]).toBe("Выгрузка: uploaded=0 failed=0 skipped=0 not_attempted=2 abandoned=0 pending=0");
    const files = (await readdir(path.join(cwd, "audio"))).filter((f) => f.endsWith(".wav"));
    expect(files).toHaveLength(2);

    out = [];
    expect(await run(["sessions"])).toBe(0);
    expect(out).toHaveLength(1);
    expect(out[0]).toMatch(/^\d{12}: .+, завершена .+, чанков 2, 0\.5 с, выгружено 0\/2$/);
  });

  it("sessions без журнала: код 1", async () => {
    expect(await run(["sessions"])).toBe(1);
    expect(errLines[0]).toMatch(/ ERROR Рекордер: не удалось прочитать журнал сессий /);
  });

  it("status с настройками по умолчанию", async () => {
    expect(await run(["status"])).toBe(0);
    expect(out).toEqual([
      "Backend: ffmpeg",
      "Устройство: default (default)",
      "Формат: wav, 16000 Гц, каналов: 1, чанк: 120 с",
      `Каталог записей: ${path.join(cwd, "audio")}`,
      `Журнал сессий: ${path.join(cwd, "audio", "recordings.jsonl")}`,
      "Выгрузка: хранилище не настроено",
    ]);
  });

  it("явный --config, которого нет: код 1", async () => {
    expect(await run(["status", "--config", "missing.yml"])).toBe(1);
    expect(errLines).toHaveLength(1);
    expect(errLines[0]?.startsWith("Рекордер: не удалось прочитать конфигурацию")).toBe(true);
  });

  it("проблемы конфигурации видны в stderr", async () => {
    await writeFile(path.join(cwd, ".chunk-recorder.yml"), "recording:\n  backend: alsa\n", "utf8");
    expect(await run(["status"])).toBe(0);
    expect(out[0]).toBe("Backend: ffmpeg");
    expect(errLines).toHaveLength(1);
    expect(errLines[0]?.endsWith(' WARN Конфигурация: recording.backend: неизвестное значение "alsa"')).toBe(true);
  });
});
