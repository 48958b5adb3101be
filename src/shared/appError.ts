import type { AppErrorDto, ErrorCode } from "./result";

/**
 * Typed error для тех мест, где мы используем `throw`, но хотим переносить код ошибки/контекст.
 *
 * Важно: `message` в AppErrorDto безопасно показывать пользователю (CLI).
 */
export class AppError extends Error {
  readonly dto: AppErrorDto;

  constructor(dto: AppErrorDto) {
    super(dto.message);
    this.name = "AppError";
    this.dto = dto;
  }
}

export function isAppError(e: unknown): e is AppError {
  return e instanceof AppError || (isRecord(e) && e.name === "AppError" && isAppErrorDto(e.dto));
}

export function toAppErrorDto(e: unknown, fallback: { code: ErrorCode; message: string; details?: Record<string, unknown> }): AppErrorDto {
  // В некоторых окружениях (bundler / другой realm) `instanceof` не срабатывает,
  // поэтому поддерживаем структурную проверку на dto.
  if (isAppError(e)) return e.dto;
  if (isRecord(e) && isAppErrorDto(e.dto)) return e.dto;

  const rec = isRecord(e) ? e : {};
  const msg = typeof rec.message === "string" ? rec.message : "";
  const message = msg.startsWith("Рекордер:") ? msg : fallback.message;

  // Причину стараемся сделать диагностируемой (errno code, stack, http status)
  const stack = typeof rec.stack === "string" ? rec.stack : "";
  const code = typeof rec.code === "string" ? rec.code : "";
  const status = typeof rec.$metadata === "object" && rec.$metadata !== null ? httpStatusOf(rec.$metadata) : "";
  const bits = [msg, code ? `code ${code}` : "", status ? `HTTP ${status}` : "", stack].filter(Boolean);
  const cause = bits.length ? bits.join("\n") : String(e ?? "неизвестная ошибка");

  return { code: fallback.code, message, cause, details: fallback.details };
}

/** Короткое описание ошибки для полей лога (`error` в записях журнала). */
export function errorMessageOf(e: unknown): string {
  if (isAppError(e)) return e.dto.cause ? `${e.dto.message}: ${firstLine(e.dto.cause)}` : e.dto.message;
  if (e instanceof Error) return e.message || e.name;
  return String(e ?? "неизвестная ошибка");
}

function firstLine(s: string): string {
  const idx = s.indexOf("\n");
  return idx >= 0 ? s.slice(0, idx) : s;
}

function httpStatusOf(meta: object): string {
  const status: unknown = Reflect.get(meta, "httpStatusCode");
  return typeof status === "number" ? String(status) : "";
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isAppErrorDto(v: unknown): v is AppErrorDto {
  return isRecord(v) && typeof v.message === "string" && typeof v.code === "string";
}
