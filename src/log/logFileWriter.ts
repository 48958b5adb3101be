import type { LogEntry } from "./logService";
import * as fs from "node:fs/promises";
import * as path from "node:path";

/**
 * Писатель диагностического лога в папку `log.dir`.
 *
 * Пишет “батчами” с небольшой задержкой, чтобы не дёргать диск на каждый log entry
 * (диск в это время занят чанками).
 *
 * Формат файла: компактный `YYYY-MM-DD.log` (одна запись = одна строка).
 */
export class LogFileWriter {
  private readonly enabled: boolean;
  private readonly logsDirPath: string;
  private readonly retentionDays: number;
  private readonly flushDelayMs: number;
  private flushTimer?: ReturnType<typeof setTimeout>;
  private flushChain: Promise<void> = Promise.resolve();
  private pending: LogEntry[] = [];
  private onFlushError?: (e: unknown) => void;

  constructor(params: {
    logsDirPath: string;
    enabled?: boolean;
    retentionDays?: number;
    flushDelayMs?: number;
    onFlushError?: (e: unknown) => void;
  }) {
    this.logsDirPath = params.logsDirPath;
    this.enabled = params.enabled ?? true;
    this.retentionDays = normalizeRetentionDays(params.retentionDays ?? 7);
    this.flushDelayMs = Math.max(0, params.flushDelayMs ?? 500);
    this.onFlushError = params.onFlushError;
  }

  /** Поставить запись в очередь на запись в файл лога. */
  enqueue(entry: LogEntry) {
    if (!this.enabled) return;
    if (!this.logsDirPath) return;

    this.pending.push(entry);
    if (!this.flushTimer) {
      this.flushTimer = setTimeout(() => {
        this.flushTimer = undefined;
        this.flush().catch((e: unknown) => this.onFlushError?.(e));
      }, this.flushDelayMs);
      // Таймер лога не должен держать процесс после завершения сессии.
      this.flushTimer.unref?.();
    }
  }

  /** Записать накопленное. Вызовы сериализуются, чтобы строки не перемешивались. */
  async flush(): Promise<void> {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = undefined;
    }
    const run = this.flushChain.then(() => this.flushPending());
    this.flushChain = run.catch(() => undefined);
    await run;
  }

  private async flushPending(): Promise<void> {
    if (!this.enabled) {
      this.pending = [];
      return;
    }
    const batch = this.pending;
    this.pending = [];
    if (batch.length === 0) return;

    const folder = this.logsDirPath;
    await fs.mkdir(folder, { recursive: true });

    // Группируем по дате (YYYY-MM-DD)
    const byDate = new Map<string, LogEntry[]>();
    for (const e of batch) {
      const d = formatDateYmd(new Date(e.ts));
      const arr = byDate.get(d) ?? [];
      arr.push(e);
      byDate.set(d, arr);
    }

    for (const [ymd, entries] of byDate) {
      const filePath = path.join(folder, `${ymd}.log`);
      const text = entries.map(formatLogLine).join("\n") + "\n";
      await fs.appendFile(filePath, text, { encoding: "utf-8" });
    }

    await this.cleanupOldLogFiles();
  }

  /**
   * Очистить старые лог‑файлы в папке `logsDirPath` согласно `retentionDays`.
   *
   * Правило: храним `retentionDays` дней, включая сегодняшний день.
   * Пример: retentionDays=7 → оставляем сегодня + последние 6 дней, всё старше удаляем.
   */
  async cleanupOldLogFiles(nowMs: number = Date.now()): Promise<void> {
    if (!this.logsDirPath) return;
    const keepDays = this.retentionDays;

    let files: string[];
    try {
      files = await fs.readdir(this.logsDirPath);
    } catch (e) {
      // папки ещё нет: удалять нечего
      if (isNodeErrorCode(e, "ENOENT")) return;
      throw e;
    }
    const nowUtcMidnight = utcMidnightMs(nowMs);
    for (const name of files) {
      const m = /^(\d{4})-(\d{2})-(\d{2})\.log$/.exec(name);
      if (!m) continue;
      const fileUtcMidnight = Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]));
      const ageDays = Math.floor((nowUtcMidnight - fileUtcMidnight) / MS_PER_DAY);
      if (ageDays >= keepDays) {
        await fs.rm(path.join(this.logsDirPath, name), { force: true });
      }
    }
  }
}

const MS_PER_DAY = 24 * 60 * 60_000;

function normalizeRetentionDays(v: unknown): number {
  const n = typeof v === "number" ? v : Number(v);
  if (!Number.isFinite(n)) return 7;
  return Math.min(365, Math.max(1, Math.floor(n)));
}

function isNodeErrorCode(e: unknown, code: string): boolean {
  return typeof e === "object" && e !== null && Reflect.get(e, "code") === code;
}

function utcMidnightMs(ts: number): number {
  const d = new Date(ts);
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
}

function formatDateYmd(d: Date): string {
  const y = String(d.getFullYear());
  const m = String(d.getMonth() + 1).padStart(2, "0");
  const day = String(d.getDate()).padStart(2, "0");
  return `${y}-${m}-${day}`;
}

/** Одна строка лога: `ISO LEVEL message {json}`. Используется и файлом, и консолью. */
export function formatLogLine(e: LogEntry): string {
  const tsIso = new Date(e.ts).toISOString();
  const level = e.level.toUpperCase();
  const msg = String(e.message ?? "");
  if (!e.data || Object.keys(e.data).length === 0) return `${tsIso} ${level} ${msg}`;
  try {
    return `${tsIso} ${level} ${msg} ${JSON.stringify(e.data)}`;
  } catch {
    return `${tsIso} ${level} ${msg} ${String(e.data)}`;
  }
}
