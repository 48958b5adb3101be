import { readdir, readFile } from "node:fs/promises";
import * as path from "node:path";

import { parseSessionLog } from "./sessionLogReader";

/**
 * Проверка “stem уже занят”: в каталоге сессии есть файлы `<stem>_*`
 * или журнал сессий уже знает такой `session_id` (сессия без чанков, например
 * упавшая на открытии устройства). Stem может содержать `/` (подкаталоги).
 */
export function createStemTakenCheck(outputDir: string, sessionLogPath?: string): (stem: string) => Promise<boolean> {
  return async (stem) => {
    if (await hasChunkFiles(outputDir, stem)) return true;
    if (!sessionLogPath) return false;
    return (await loggedSessionIds(sessionLogPath)).has(stem);
  };
}

async function hasChunkFiles(outputDir: string, stem: string): Promise<boolean> {
  const full = path.join(outputDir, stem);
  const dir = path.dirname(full);
  const prefix = `${path.basename(full)}_`;
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (e) {
    if (isEnoent(e)) return false;
    throw e;
  }
  return names.some((n) => n.startsWith(prefix));
}

async function loggedSessionIds(sessionLogPath: string): Promise<Set<string>> {
  let text: string;
  try {
    text = await readFile(sessionLogPath, "utf8");
  } catch (e) {
    if (isEnoent(e)) return new Set();
    throw e;
  }
  return new Set(parseSessionLog(text).entries.map((e) => e.session_id));
}

function isEnoent(e: unknown): boolean {
  return typeof e === "object" && e !== null && Reflect.get(e, "code") === "ENOENT";
}
