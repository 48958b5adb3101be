import type { AudioFileFormat, RecorderSettings, RecordingBackendId } from "../types";
import { fitChunkToFormat, type NormalizedSettings } from "../settingsStore";
import { APP_ERROR } from "../shared/appErrorCodes";
import { err, ok, type Result } from "../shared/result";

export type CommonOptions = {
  verbose: boolean;
  /** Путь к файлу конфигурации (по умолчанию `.chunk-recorder.yml` в cwd). */
  config?: string;
};

export type RecordOptions = CommonOptions & {
  durationSec?: number;
  outputDir?: string;
  rate?: number;
  channels?: number;
  chunkSeconds?: number;
  device?: string;
  deviceName?: string;
  format?: AudioFileFormat;
  backend?: RecordingBackendId;
  conversationId?: string;
  noUpload: boolean;
  timestampFormat?: string;
  datetimeFormat?: string;
  logFile?: string;
};

export type SessionsOptions = CommonOptions & {
  logFile?: string;
};

export type CliCommand =
  | { command: "record"; options: RecordOptions }
  | { command: "status"; options: CommonOptions }
  | { command: "sessions"; options: SessionsOptions }
  | { command: "help" }
  | { command: "version" };

type FlagSpec = { kind: "bool" } | { kind: "string" } | { kind: "number"; min?: number; max?: number; integer?: boolean };

const COMMON_FLAGS: Record<string, FlagSpec> = {
  verbose: { kind: "bool" },
  config: { kind: "string" },
};

const RECORD_FLAGS: Record<string, FlagSpec> = {
  ...COMMON_FLAGS,
  duration: { kind: "number", min: 0 },
  output: { kind: "string" },
  rate: { kind: "number", min: 1000, max: 384_000, integer: true },
  channels: { kind: "number", min: 1, max: 32, integer: true },
  "chunk-seconds": { kind: "number", min: 0.1, max: 24 * 60 * 60 },
  device: { kind: "string" },
  "device-name": { kind: "string" },
  format: { kind: "string" },
  backend: { kind: "string" },
  "conversation-id": { kind: "string" },
  "no-upload": { kind: "bool" },
  "timestamp-format": { kind: "string" },
  "datetime-format": { kind: "string" },
  "log-file": { kind: "string" },
};

const SESSIONS_FLAGS: Record<string, FlagSpec> = {
  ...COMMON_FLAGS,
  "log-file": { kind: "string" },
};

type FlagValues = Map<string, string | number | boolean>;

/** Разобрать argv (без `node` и имени скрипта). */
export function parseArgs(argv: string[]): Result<CliCommand> {
  const [command, ...rest] = argv;
  switch (command) {
    case "record": {
      const flags = parseFlags(rest, RECORD_FLAGS);
      if (!flags.ok) return flags;
      const v = flags.value;
      const format = str(v, "format");
      if (format !== undefined && format !== "wav" && format !== "pcm") return invalid(`--format: ожидается wav или pcm, получено ${format}`);
      const backend = str(v, "backend");
      if (backend !== undefined && backend !== "ffmpeg" && backend !== "tone") return invalid(`--backend: ожидается ffmpeg или tone, получено ${backend}`);
      return ok({
        command: "record",
        options: {
          ...common(v),
          durationSec: num(v, "duration"),
          outputDir: str(v, "output"),
          rate: num(v, "rate"),
          channels: num(v, "channels"),
          chunkSeconds: num(v, "chunk-seconds"),
          device: str(v, "device"),
          deviceName: str(v, "device-name"),
          format,
          backend,
          conversationId: str(v, "conversation-id"),
          noUpload: v.get("no-upload") === true,
          timestampFormat: str(v, "timestamp-format"),
          datetimeFormat: str(v, "datetime-format"),
          logFile: str(v, "log-file"),
        },
      });
    }
    case "status": {
      const flags = parseFlags(rest, COMMON_FLAGS);
      if (!flags.ok) return flags;
      return ok({ command: "status", options: common(flags.value) });
    }
    case "sessions": {
      const flags = parseFlags(rest, SESSIONS_FLAGS);
      if (!flags.ok) return flags;
      return ok({ command: "sessions", options: { ...common(flags.value), logFile: str(flags.value, "log-file") } });
    }
    case "help":
    case "--help":
    case "-h":
    case undefined:
      return ok({ command: "help" });
    case "version":
    case "--version":
    case "-v":
      return ok({ command: "version" });
    default:
      return invalid(`неизвестная команда: ${command}`);
  }
}

/**
 * Наложить флаги `record` поверх настроек из файла.
 * Длина чанка после наложения проверяется так же, как в `normalizeSettings`.
 */
export function applyRecordOverrides(settings: RecorderSettings, o: RecordOptions): NormalizedSettings {
  const problems: string[] = [];
  const recording = fitChunkToFormat(
    {
      ...settings.recording,
      outputDir: o.outputDir ?? settings.recording.outputDir,
      sampleRate: o.rate ?? settings.recording.sampleRate,
      channels: o.channels ?? settings.recording.channels,
      chunkSeconds: o.chunkSeconds ?? settings.recording.chunkSeconds,
      device: o.device ?? settings.recording.device,
      deviceName: o.deviceName ?? settings.recording.deviceName,
      format: o.format ?? settings.recording.format,
      backend: o.backend ?? settings.recording.backend,
      timestampFormat: o.timestampFormat ?? settings.recording.timestampFormat,
      datetimeFormat: o.datetimeFormat ?? settings.recording.datetimeFormat,
    },
    problems,
  );
  const next: RecorderSettings = {
    ...settings,
    recording,
    upload: { ...settings.upload, enabled: o.noUpload ? false : settings.upload.enabled },
    log: { ...settings.log, file: o.logFile ?? settings.log.file },
  };
  return { settings: next, problems };
}

function parseFlags(args: string[], flagDefs: Record<string, FlagSpec>): Result<FlagValues> {
  const out: FlagValues = new Map();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith("--")) return invalid(`неожиданный аргумент: ${arg}`);
    const eq = arg.indexOf("=");
    const name = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
    const def = flagDefs[name];
    if (!def) return invalid(`неизвестный флаг: --${name}`);

    if (def.kind === "bool") {
      if (eq >= 0) return invalid(`флаг --${name} не принимает значение`);
      out.set(name, true);
      continue;
    }

    let raw: string;
    if (eq >= 0) raw = arg.slice(eq + 1);
    else {
      const next = args[i + 1];
      if (next === undefined) return invalid(`флагу --${name} нужно значение`);
      raw = next;
      i += 1;
    }

    if (def.kind === "string") {
      out.set(name, raw);
      continue;
    }
    const n = raw.trim() ? Number(raw) : NaN;
    if (!Number.isFinite(n)) return invalid(`--${name}: ожидается число, получено ${raw}`);
    if (def.integer && !Number.isInteger(n)) return invalid(`--${name}: ожидается целое число, получено ${raw}`);
    if (def.min !== undefined && n < def.min) return invalid(`--${name}: значение должно быть не меньше ${def.min}`);
    if (def.max !== undefined && n > def.max) return invalid(`--${name}: значение должно быть не больше ${def.max}`);
    out.set(name, n);
  }
  return ok(out);
}

function common(v: FlagValues): CommonOptions {
  return { verbose: v.get("verbose") === true, config: str(v, "config") };
}

function str(v: FlagValues, name: string): string | undefined {
  const x = v.get(name);
  return typeof x === "string" ? x : undefined;
}

function num(v: FlagValues, name: string): number | undefined {
  const x = v.get(name);
  return typeof x === "number" ? x : undefined;
}

function invalid<T>(message: string): Result<T> {
  return err({ code: APP_ERROR.VALIDATION, message: `Рекордер: ${message}` });
}
