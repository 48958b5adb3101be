import * as path from "node:path";
import type { DependencyContainer } from "tsyringe";

import type { RecorderSettings } from "../types";
import type { RemoteStorage } from "../upload/remoteStorage";
import { LogFileWriter } from "../log/logFileWriter";
import { LogService, type LogEntry } from "../log/logService";
import { createConsoleSink } from "../log/consoleSink";
import { SessionController } from "../application/recording/sessionController";
import { errorMessageOf } from "../shared/appError";
import { createRecorderContainer, type RecorderRunOptions } from "./di/recorderContainer";

/**
 * Composition Root для CLI.
 *
 * - собирает лог (память + консоль + файлы)
 * - создаёт DI container с настройками запуска
 * - отдаёт готовые компоненты командам
 */
export type RecorderContext = {
  container: DependencyContainer;
  settings: RecorderSettings;
  logService: LogService;
  logFileWriter: LogFileWriter | null;
  /** Абсолютный путь журнала сессий (JSONL). */
  sessionLogPath: string;
  outputDir: string;
  createSessionController: () => SessionController;
  remoteStorage: () => RemoteStorage | null;
  /** Дописать файлы лога; вызывать перед выходом. */
  dispose: () => Promise<void>;
};

export function createRecorderContext(params: {
  settings: RecorderSettings;
  cwd: string;
  verbose: boolean;
  run?: Partial<RecorderRunOptions>;
  /** Куда писать консольные строки лога (по умолчанию stderr). */
  consoleWrite?: (line: string) => void;
  /** Проблемы нормализации настроек: пишутся в лог как warn. */
  configProblems?: string[];
}): RecorderContext {
  const { settings, cwd } = params;

  const logsDir = settings.log.dir ? path.resolve(cwd, settings.log.dir) : "";
  const consoleSink = createConsoleSink({ verbose: params.verbose, write: params.consoleWrite });
  const logFileWriter = logsDir
    ? new LogFileWriter({
        logsDirPath: logsDir,
        retentionDays: settings.log.retentionDays,
        onFlushError: (e) => consoleSink({ ts: Date.now(), level: "error", message: "Лог: не удалось записать файл лога", data: { error: errorMessageOf(e) } }),
      })
    : null;

  const logService = new LogService(settings.log.maxEntries, (entry: LogEntry) => {
    logFileWriter?.enqueue(entry);
  });
  logService.addSink(consoleSink);

  for (const problem of params.configProblems ?? []) logService.warn(`Конфигурация: ${problem}`);

  const container = createRecorderContainer({
    settings,
    logService,
    cwd,
    run: { conversationId: params.run?.conversationId ?? null },
  });

  return {
    container,
    settings,
    logService,
    logFileWriter,
    sessionLogPath: container.resolve<string>("recording.sessionLogPath"),
    outputDir: container.resolve<string>("recording.outputDir"),
    createSessionController: () => container.resolve(SessionController),
    remoteStorage: () => container.resolve<RemoteStorage | null>("upload.remoteStorage"),
    dispose: async () => {
      await logFileWriter?.flush();
    },
  };
}
