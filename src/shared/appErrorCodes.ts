/**
 * Единый набор кодов ошибок приложения (AppErrorDto.code).
 *
 * Принцип: добавляем коды по мере распространения Result-граней.
 */
export const APP_ERROR = {
  VALIDATION: "E_VALIDATION",
  TIMEOUT: "E_TIMEOUT",
  INTERNAL: "E_INTERNAL",

  CONFIG: "E_CONFIG",

  /** Поток захвата не открылся: фатально, до первого чанка. */
  DEVICE: "E_DEVICE",
  /** Ошибка записи чанка на диск: фатально для сессии. */
  WRITE: "E_WRITE",
  /** Ошибка выгрузки: изолирована в диспетчере, в захват не пробрасывается. */
  UPLOAD: "E_UPLOAD",
  /** Ошибка дозаписи в журнал сессий: громко в лог, захват продолжается. */
  LOG_IO: "E_LOG_IO",
} as const;

export type AppErrorCode = (typeof APP_ERROR)[keyof typeof APP_ERROR];
