/**
 * Policy: аргументы ffmpeg для захвата устройства в сырой PCM (s16le в stdout).
 *
 * Чистая функция: только формирует args.
 */
export type FfmpegInputFormat = "pulse" | "alsa" | "avfoundation" | "dshow";

export function defaultFfmpegInputFormat(platform: NodeJS.Platform): FfmpegInputFormat {
  if (platform === "darwin") return "avfoundation";
  if (platform === "win32") return "dshow";
  return "pulse";
}

/** Имя входа ffmpeg для устройства (`default`, `hw:1`, `:0`, `audio=Mic`). */
export function ffmpegInputName(format: FfmpegInputFormat, device: string | null): string {
  const d = String(device ?? "").trim();
  if (format === "avfoundation") return d ? (d.startsWith(":") ? d : `:${d}`) : ":default";
  if (format === "dshow") return d.startsWith("audio=") ? d : `audio=${d || "default"}`;
  return d || "default";
}

export function ffmpegCaptureArgsPolicy(params: { inputFormat: FfmpegInputFormat; device: string | null; sampleRate: number; channels: number }): string[] {
  const args = ["-hide_banner", "-nostats", "-loglevel", "error"];
  // буфер на входе, чтобы драйвер не дропал кадры при кратких пиках нагрузки
  args.push("-thread_queue_size", "1024", "-f", params.inputFormat, "-i", ffmpegInputName(params.inputFormat, params.device));
  args.push("-ac", String(Math.max(1, Math.floor(params.channels))), "-ar", String(Math.max(1, Math.floor(params.sampleRate))));
  args.push("-f", "s16le", "-acodec", "pcm_s16le", "pipe:1");
  return args;
}
