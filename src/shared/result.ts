export type Result<T> = { ok: true; value: T } | { ok: false; error: AppErrorDto };

export type ErrorCode =
  | "E_VALIDATION"
  | "E_CONFIG"
  | "E_DEVICE"
  | "E_WRITE"
  | "E_UPLOAD"
  | "E_LOG_IO"
  | "E_TIMEOUT"
  | "E_INTERNAL";

/**
 * Унифицированная ошибка уровня приложения.
 *
 * - `message`: безопасно показывать пользователю (CLI)
 * - `cause`: безопасно логировать (уже redacted)
 */
export type AppErrorDto = {
  code: ErrorCode;
  message: string;
  cause?: string;
  details?: Record<string, unknown>;
};

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(error: AppErrorDto): Result<T> {
  return { ok: false, error };
}
