import * as path from "node:path";

import { loadConfigFile } from "../config/configFile";
import { createRecorderContext, type RecorderContext } from "../runtime/recorderContext";
import { applyRecordOverrides, parseArgs, type CliCommand } from "./parseArgs";
import { recordCommand, sessionsCommand, statusCommand } from "./commands";

export const VERSION = "0.1.0";

export type CliIo = {
  cwd: string;
  out: (line: string) => void;
  err: (line: string) => void;
  /** Отмена записи (SIGINT/SIGTERM). */
  signal?: AbortSignal;
};

const HELP = `chunk-recorder v${VERSION}

Запись звука чанками фиксированной длины с журналом сессий и выгрузкой в S3.

Использование:
  chunk-recorder <команда> [флаги]

Команды:
  record      Записать одну сессию
                --duration N           длительность, с (по умолчанию до Ctrl+C)
                --output DIR           каталог записей
                --rate HZ              частота дискретизации
                --channels N           число каналов
                --chunk-seconds N      длина чанка, с
                --device ID            устройство захвата
                --device-name NAME     имя устройства для журнала
                --format wav|pcm       формат файлов
                --backend ffmpeg|tone  backend захвата
                --conversation-id ID   идентификатор разговора (часть ключа в S3)
                --no-upload            не выгружать в этом запуске
                --timestamp-format T   шаблон имени сессии ({ts}, {device_id})
                --datetime-format F    strftime-формат для {ts}
                --log-file NAME        журнал сессий (относительно каталога записей)
  status      Показать настройки и проверить доступ к bucket
  sessions    Сводка по журналу сессий
                --log-file PATH        журнал сессий
  help        Эта справка
  version     Версия

Общие флаги:
  --config PATH   файл конфигурации (по умолчанию .chunk-recorder.yml)
  --verbose       подробный лог в stderr
`;

/** Точка входа CLI без побочных эффектов процесса: возвращает код выхода. */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    io.err(parsed.error.message);
    io.err('Справка: "chunk-recorder help"');
    return 1;
  }
  const cmd = parsed.value;
  if (cmd.command === "help") {
    io.out(HELP);
    return 0;
  }
  if (cmd.command === "version") {
    io.out(`chunk-recorder v${VERSION}`);
    return 0;
  }

  const loaded = await loadConfigFile({ cwd: io.cwd, file: cmd.options.config });
  if (!loaded.ok) {
    io.err(`${loaded.error.message}: ${loaded.error.cause ?? ""}`.trim());
    return 1;
  }

  const applied = cmd.command === "record" ? applyRecordOverrides(loaded.value.settings, cmd.options) : { settings: loaded.value.settings, problems: [] };
  const ctx = createRecorderContext({
    settings: applied.settings,
    cwd: io.cwd,
    verbose: cmd.options.verbose,
    run: cmd.command === "record" ? { conversationId: cmd.options.conversationId ?? null } : undefined,
    consoleWrite: io.err,
    configProblems: [...loaded.value.problems, ...applied.problems],
  });
  ctx.logService.info("Рекордер: запуск", { command: cmd.command, version: VERSION, config: loaded.value.found ? loaded.value.path : null });

  try {
    return await dispatch(cmd, ctx, io);
  } finally {
    await ctx.dispose();
  }
}

async function dispatch(cmd: Exclude<CliCommand, { command: "help" } | { command: "version" }>, ctx: RecorderContext, io: CliIo): Promise<number> {
  switch (cmd.command) {
    case "record":
      return await recordCommand(ctx, { durationSec: cmd.options.durationSec, signal: io.signal }, io);
    case "status":
      return await statusCommand(ctx, io);
    case "sessions": {
      const logFile = cmd.options.logFile ? path.resolve(io.cwd, cmd.options.logFile) : ctx.sessionLogPath;
      return await sessionsCommand(ctx, { logFile }, io);
    }
  }
}
