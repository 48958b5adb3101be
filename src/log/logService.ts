import { isSensitiveKeyForLog, redactSecretsInStringForLog, redactUrlForLog } from "./redact";

/** Уровень записи лога. */
export type LogLevel = "info" | "warn" | "error";

/** Одна запись диагностического лога (в памяти и/или в файле). */
export interface LogEntry {
  /** Unix time в мс. */
  ts: number;
  level: LogLevel;
  /** Сообщение (всегда на русском). */
  message: string;
  /** Доп. данные (для диагностики). */
  data?: Record<string, unknown>;
}

/** Узкий интерфейс логгера, который прокидывается в компоненты конвейера. */
export type Logger = {
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
};

const MAX_STRING_CHARS = 4000;
const MAX_ARRAY_ITEMS = 200;
const MAX_OBJECT_KEYS = 200;

/**
 * In-memory лог процесса записи.
 *
 * Используется:
 * - консольный вывод CLI (через callback `onEntry`)
 * - запись в файлы через `LogFileWriter`
 *
 * Это не журнал сессий (`SessionLog`): здесь диагностика, там аудит чанков.
 */
export class LogService implements Logger {
  private readonly maxEntries: number;
  private entries: LogEntry[] = [];
  private sinks: Array<(entry: LogEntry) => void> = [];
  private sinkFailures = 0;

  /** @param onEntry Коллбек на каждую новую запись (например, для записи в файл). */
  constructor(maxEntries: number, onEntry?: (entry: LogEntry) => void) {
    this.maxEntries = Math.max(10, maxEntries);
    if (onEntry) this.sinks.push(onEntry);
  }

  /** Подключить ещё один приёмник записей (консоль, файл). Возвращает отписку. */
  addSink(sink: (entry: LogEntry) => void): () => void {
    this.sinks.push(sink);
    return () => {
      this.sinks = this.sinks.filter((s) => s !== sink);
    };
  }

  /** Сколько раз приёмник бросил исключение (запись при этом не теряется из памяти). */
  get sinkErrorCount(): number {
    return this.sinkFailures;
  }

  list(): LogEntry[] {
    return this.entries.slice();
  }

  /**
   * Создать “логгер в скоупе” (для единообразия сообщений и контекста).
   *
   * Пример:
   *   const log = base.scoped("Выгрузка", { sessionId });
   *   log.warn("не удалось загрузить чанк", { chunkIndex: 3 });
   */
  scoped(scope: string, fixed?: Record<string, unknown>): Logger {
    const prefix = String(scope ?? "").trim();
    const merge = (data?: Record<string, unknown>) => {
      if (!fixed && !data) return undefined;
      return { ...(fixed ?? {}), ...(data ?? {}) };
    };
    const withPrefix = (message: string) => (prefix ? `${prefix}: ${message}` : message);
    return {
      info: (message, data) => this.info(withPrefix(message), merge(data)),
      warn: (message, data) => this.warn(withPrefix(message), merge(data)),
      error: (message, data) => this.error(withPrefix(message), merge(data)),
    };
  }

  info(message: string, data?: Record<string, unknown>) {
    this.push({ ts: Date.now(), level: "info", message, data });
  }

  warn(message: string, data?: Record<string, unknown>) {
    this.push({ ts: Date.now(), level: "warn", message, data });
  }

  error(message: string, data?: Record<string, unknown>) {
    this.push({ ts: Date.now(), level: "error", message, data });
  }

  private push(e: LogEntry) {
    const safe = sanitizeLogEntry(e);
    this.entries.push(safe);
    this.trim();
    for (const sink of this.sinks) {
      try {
        sink(safe);
      } catch {
        // приёмник не роняет захват и выгрузку
        this.sinkFailures++;
      }
    }
  }

  private trim() {
    const overflow = this.entries.length - this.maxEntries;
    if (overflow > 0) this.entries.splice(0, overflow);
  }
}

function sanitizeLogEntry(e: LogEntry): LogEntry {
  return {
    ...e,
    message: sanitizeString(e.message),
    data: e.data ? sanitizeRecord(e.data, 0) : undefined,
  };
}

function sanitizeString(s: string): string {
  const raw = String(s ?? "");
  const maybeUrl = raw.startsWith("http://") || raw.startsWith("https://");
  const step1 = maybeUrl ? redactUrlForLog(raw) : raw;
  const out = redactSecretsInStringForLog(step1);
  if (out.length > MAX_STRING_CHARS) return out.slice(0, MAX_STRING_CHARS) + "...[truncated]";
  return out;
}

function sanitizeRecord(obj: Record<string, unknown>, depth: number): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const keys = Object.keys(obj);
  for (const k of keys.slice(0, MAX_OBJECT_KEYS)) {
    const val = obj[k];
    // Если ключ явно чувствительный, значение не пишем в логи вообще.
    if (typeof val === "string" && isSensitiveKeyForLog(k)) {
      out[k] = "***";
      continue;
    }
    if (typeof val === "string" && /url$/i.test(k)) {
      out[k] = sanitizeString(redactUrlForLog(val));
      continue;
    }
    out[k] = sanitizeUnknown(val, depth + 1);
  }
  if (keys.length > MAX_OBJECT_KEYS) out["[truncated]"] = `${keys.length - MAX_OBJECT_KEYS} keys`;
  return out;
}

function sanitizeUnknown(v: unknown, depth: number): unknown {
  if (depth > 6) return "[truncated]";
  if (v == null) return v;

  if (typeof v === "string") return sanitizeString(v);
  if (typeof v === "number" || typeof v === "boolean") return v;

  // Error: ключевой тип для диагностики. Достаём stack/cause, но санитизируем строки.
  if (v instanceof Error) {
    return {
      name: sanitizeString(v.name || "Error"),
      message: sanitizeString(v.message ?? ""),
      stack: v.stack ? sanitizeString(v.stack) : undefined,
      cause: v.cause != null ? sanitizeUnknown(v.cause, depth + 1) : undefined,
    };
  }

  if (Array.isArray(v)) {
    const out = v.slice(0, MAX_ARRAY_ITEMS).map((x) => sanitizeUnknown(x, depth + 1));
    if (v.length > MAX_ARRAY_ITEMS) out.push("[truncated]");
    return out;
  }

  if (typeof v === "object") return sanitizeRecord(Object.fromEntries(Object.entries(v)), depth);

  return sanitizeString(String(v));
}
