import { formatStrftime } from "./strftime";

/**
 * Политика: именование сессий и файлов чанков.
 *
 * stem сессии = шаблон (`{ts}`, `{device_id}`), отрендеренный в момент старта;
 * файл чанка = `<stem>_<NN>.<ext>`.
 */

export const DEFAULT_TIMESTAMP_TEMPLATE = "{ts}";
export const DEFAULT_DATETIME_FORMAT = "%y%m%d%H%M%S";

export function renderSessionStem(params: { template: string; datetimeFormat: string; at: Date; deviceId?: string | null }): string {
  const template = String(params.template ?? "").trim() || DEFAULT_TIMESTAMP_TEMPLATE;
  const ts = formatStrftime(params.at, params.datetimeFormat || DEFAULT_DATETIME_FORMAT);
  const deviceId = String(params.deviceId ?? "").trim() || "default";
  const rendered = template.split("{ts}").join(ts).split("{device_id}").join(deviceId);
  // Запрещённые в именах файлов символы; `/` разрешаем, это подпапка.
  return rendered.replace(/[\\:*?"<>|\u0000-\u001F]+/g, "_").replace(/^\/+/, "") || ts;
}

/** Индекс чанка с ведущим нулём до двух знаков; широкие индексы не обрезаются. */
export function padChunkIndex(index: number): string {
  return String(Math.max(0, Math.floor(index))).padStart(2, "0");
}

export function chunkFileName(params: { stem: string; index: number; ext: string }): string {
  const ext = String(params.ext ?? "").trim().replace(/^\.+/, "") || "wav";
  return `${params.stem}_${padChunkIndex(params.index)}.${ext}`;
}

/**
 * Подобрать свободный stem: `stem`, `stem-2`, `stem-3`, ...
 *
 * `isTaken` проверяет, что по stem уже есть файлы (например первый чанк).
 */
export async function pickFreeSessionStem(stem: string, isTaken: (candidate: string) => Promise<boolean>, maxTries = 1000): Promise<string> {
  if (!(await isTaken(stem))) return stem;
  for (let n = 2; n <= maxTries; n++) {
    const candidate = `${stem}-${n}`;
    if (!(await isTaken(candidate))) return candidate;
  }
  throw new Error(`Рекордер: не удалось подобрать свободный идентификатор сессии для ${stem}`);
}
