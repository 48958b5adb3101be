import "reflect-metadata";
import * as path from "node:path";
import { container, type DependencyContainer } from "tsyringe";

import type { RecorderSettings, RecordingBackendId } from "../../types";
import type { LogService } from "../../log/logService";
import type { AudioSource } from "../../recording/audioSource";
import type { RemoteStorage } from "../../upload/remoteStorage";
import { createAudioSourceRegistry, type AudioSourceFactory } from "../../recording/backends/audioSources";
import { ChunkWriter } from "../../recording/chunkWriter";
import { SessionLog } from "../../recording/sessionLog";
import { createStemTakenCheck } from "../../recording/sessionStemLookup";
import { S3RemoteStorage } from "../../upload/s3RemoteStorage";
import { UploadDispatcher } from "../../upload/uploadDispatcher";
import { SessionController } from "../../application/recording/sessionController";

export type RecorderRunOptions = {
  conversationId: string | null;
};

/**
 * Tsyringe container для одного запуска рекордера (child container).
 *
 * Без декораторов/emitDecoratorMetadata: зависимости регистрируем явно.
 * Тесты подменяют регистрации (`recording.audioSource`, `upload.remoteStorage`, `clock.now`) через `register()`.
 */
export function createRecorderContainer(params: {
  settings: RecorderSettings;
  logService: LogService;
  cwd: string;
  run: RecorderRunOptions;
}): DependencyContainer {
  const c = container.createChildContainer();

  c.register<RecorderSettings>("recorder.settings", { useValue: params.settings });
  c.register<LogService>("recorder.logService", { useValue: params.logService });
  c.register<RecorderRunOptions>("recorder.run", { useValue: params.run });
  c.register<() => Date>("clock.now", { useValue: () => new Date() });

  const outputDir = path.resolve(params.cwd, params.settings.recording.outputDir);
  c.register<string>("recording.outputDir", { useValue: outputDir });
  c.register<string>("recording.sessionLogPath", { useValue: path.resolve(outputDir, params.settings.log.file) });

  // Backend захвата выбирается конфигурацией, а не проверкой типов в рантайме.
  c.register<Record<RecordingBackendId, AudioSourceFactory>>("recording.audioSourceRegistry", {
    useFactory: (cc) => createAudioSourceRegistry({ log: cc.resolve<LogService>("recorder.logService") }),
  });
  c.register<AudioSource>("recording.audioSource", {
    useFactory: (cc) => {
      const settings = cc.resolve<RecorderSettings>("recorder.settings");
      const registry = cc.resolve<Record<RecordingBackendId, AudioSourceFactory>>("recording.audioSourceRegistry");
      return registry[settings.recording.backend](settings.recording);
    },
  });

  c.register<RemoteStorage | null>("upload.remoteStorage", {
    useFactory: (cc) => {
      const settings = cc.resolve<RecorderSettings>("recorder.settings");
      if (!settings.upload.enabled || !settings.s3) return null;
      return new S3RemoteStorage(settings.s3);
    },
  });

  c.register(ChunkWriter, {
    useFactory: (cc) => new ChunkWriter({ now: cc.resolve<() => Date>("clock.now"), log: cc.resolve<LogService>("recorder.logService") }),
  });
  c.register(SessionLog, {
    useFactory: (cc) => new SessionLog({ filePath: cc.resolve<string>("recording.sessionLogPath"), log: cc.resolve<LogService>("recorder.logService") }),
  });
  c.register(UploadDispatcher, {
    useFactory: (cc) => {
      const settings = cc.resolve<RecorderSettings>("recorder.settings");
      return new UploadDispatcher(
        {
          workers: settings.upload.workers,
          queueCapacity: settings.upload.queueCapacity,
          maxAttempts: settings.upload.maxAttempts,
          retryBackoffMs: settings.upload.retryBackoffMs,
          prefix: settings.s3?.prefix ?? "",
        },
        {
          storage: cc.resolve<RemoteStorage | null>("upload.remoteStorage"),
          log: cc.resolve<LogService>("recorder.logService"),
        },
      );
    },
  });

  // Новый контроллер (и новый конвейер) на каждый resolve: контроллер одноразовый.
  c.register(SessionController, {
    useFactory: (cc) => {
      const settings = cc.resolve<RecorderSettings>("recorder.settings");
      const run = cc.resolve<RecorderRunOptions>("recorder.run");
      const dir = cc.resolve<string>("recording.outputDir");
      return new SessionController(
        {
          outputDir: dir,
          deviceId: settings.recording.device,
          deviceName: settings.recording.deviceName,
          conversationId: run.conversationId,
          sampleRate: settings.recording.sampleRate,
          channels: settings.recording.channels,
          format: settings.recording.format,
          chunkSeconds: settings.recording.chunkSeconds,
          timestampFormat: settings.recording.timestampFormat,
          datetimeFormat: settings.recording.datetimeFormat,
          drainTimeoutMs: settings.upload.drainTimeoutMs,
          logGraceMs: settings.upload.logGraceMs,
        },
        {
          now: cc.resolve<() => Date>("clock.now"),
          log: cc.resolve<LogService>("recorder.logService"),
          audioSource: cc.resolve<AudioSource>("recording.audioSource"),
          chunkWriter: cc.resolve(ChunkWriter),
          sessionLog: cc.resolve(SessionLog),
          uploads: cc.resolve(UploadDispatcher),
          isStemTaken: createStemTakenCheck(dir, cc.resolve<string>("recording.sessionLogPath")),
        },
      );
    },
  });

  return c;
}
