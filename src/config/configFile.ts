import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";

import { normalizeSettings, type NormalizedSettings } from "../settingsStore";
import { APP_ERROR } from "../shared/appErrorCodes";
import { toAppErrorDto } from "../shared/appError";
import { err, ok, type Result } from "../shared/result";

export const CONFIG_FILE_NAME = ".chunk-recorder.yml";

export type LoadedConfig = NormalizedSettings & {
  /** Абсолютный путь к файлу конфигурации. */
  path: string;
  /** `false`, если файла нет и взяты настройки по умолчанию. */
  found: boolean;
};

/**
 * Прочитать `.chunk-recorder.yml`.
 *
 * - файла нет → настройки по умолчанию
 * - файл не читается или YAML битый → `E_CONFIG`
 */
export async function loadConfigFile(params: { cwd: string; file?: string }): Promise<Result<LoadedConfig>> {
  const filePath = path.resolve(params.cwd, params.file ?? CONFIG_FILE_NAME);

  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (e) {
    if (errnoCodeOf(e) === "ENOENT" && !params.file) {
      return ok({ ...normalizeSettings({}), path: filePath, found: false });
    }
    return err(toAppErrorDto(e, { code: APP_ERROR.CONFIG, message: "Рекордер: не удалось прочитать конфигурацию", details: { path: filePath } }));
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (e) {
    return err(toAppErrorDto(e, { code: APP_ERROR.CONFIG, message: "Рекордер: конфигурация не является корректным YAML", details: { path: filePath } }));
  }

  return ok({ ...normalizeSettings(raw ?? {}), path: filePath, found: true });
}

function errnoCodeOf(e: unknown): string {
  if (typeof e !== "object" || e === null) return "";
  const code: unknown = Reflect.get(e, "code");
  return typeof code === "string" ? code : "";
}
