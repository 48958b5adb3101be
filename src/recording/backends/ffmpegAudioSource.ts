import { spawn, type ChildProcess } from "node:child_process";

import type { AudioCaptureParams, AudioCaptureStream, AudioSource } from "../audioSource";
import type { Logger } from "../../log/logService";
import type { FfmpegInputFormat } from "../../domain/policies/ffmpegCaptureArgs";
import { defaultFfmpegInputFormat, ffmpegCaptureArgsPolicy } from "../../domain/policies/ffmpegCaptureArgs";
import { bytesPerFrame } from "../../domain/policies/chunkBudget";
import { dbLevelFromS16le } from "../../domain/policies/pcmLevel";
import { appendTail, trimForLogPolicy } from "../../domain/policies/logText";
import { commandExists } from "../../os/commandExists";
import { AppError } from "../../shared/appError";
import { APP_ERROR } from "../../shared/appErrorCodes";

export type FfmpegAudioSourceOptions = {
  inputFormat: FfmpegInputFormat | "auto";
  framesPerRead: number;
  log: Logger;
  /** Бинарь ffmpeg (по умолчанию из PATH). */
  ffmpegPath?: string;
  platform?: NodeJS.Platform;
};

/** Сколько байт PCM держим в памяти, прежде чем поставить stdout на паузу. */
const MAX_BUFFERED_BYTES = 4 * 1024 * 1024;
/** Если ffmpeg умер за это время, источник считаем неоткрывшимся. */
const STARTUP_PROBE_MS = 300;

async function waitMs(ms: number): Promise<void> {
  return await new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Захват через системный ffmpeg: устройство → s16le в stdout.
 */
export class FfmpegAudioSource implements AudioSource {
  readonly id = "ffmpeg" as const;

  constructor(private options: FfmpegAudioSourceOptions) {}

  async open(params: AudioCaptureParams): Promise<AudioCaptureStream> {
    const log = this.options.log;
    const bin = this.options.ffmpegPath ?? "ffmpeg";
    if (!(await commandExists(bin))) {
      throw new AppError({ code: APP_ERROR.DEVICE, message: "Рекордер: не найден ffmpeg (установите ffmpeg)", details: { bin } });
    }

    const inputFormat =
      this.options.inputFormat === "auto" ? defaultFfmpegInputFormat(this.options.platform ?? process.platform) : this.options.inputFormat;
    const args = ffmpegCaptureArgsPolicy({ inputFormat, device: params.device, sampleRate: params.sampleRate, channels: params.channels });
    log.info("ffmpeg: запуск захвата", { bin, args: args.join(" ") });

    const proc = spawn(bin, args, { stdio: ["pipe", "pipe", "pipe"] });
    const stream = new FfmpegCaptureStream(proc, {
      readBytes: Math.max(1, Math.floor(this.options.framesPerRead)) * bytesPerFrame(params.channels),
      frameBytes: bytesPerFrame(params.channels),
      log,
    });

    const exitedQuickly = await Promise.race([stream.exited.then(() => true), waitMs(STARTUP_PROBE_MS).then(() => false)]);
    if (exitedQuickly) {
      const stderrTail = trimForLogPolicy(stream.stderrTail, 1200);
      log.warn("ffmpeg: упал сразу (невалидное устройство/формат входа?)", { inputFormat, device: params.device, stderrTail });
      throw new AppError({
        code: APP_ERROR.DEVICE,
        message: "Рекордер: не удалось открыть устройство захвата",
        cause: stderrTail || undefined,
        details: { inputFormat, device: params.device },
      });
    }

    log.info("ffmpeg: захват стартовал", { inputFormat, device: params.device, pid: proc.pid });
    return stream;
  }
}

class FfmpegCaptureStream implements AudioCaptureStream {
  stderrTail = "";
  readonly exited: Promise<void>;

  private chunks: Buffer[] = [];
  private buffered = 0;
  private ended = false;
  private stopRequested = false;
  private lastLevel = 0;
  private waiter: (() => void) | null = null;

  constructor(
    private proc: ChildProcess,
    private params: { readBytes: number; frameBytes: number; log: Logger },
  ) {
    this.exited = new Promise<void>((resolve) => {
      proc.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
        this.ended = true;
        const payload = { code, signal, stderrTail: trimForLogPolicy(this.stderrTail, 1600) };
        if (this.stopRequested) this.params.log.info("ffmpeg: завершён (stop)", payload);
        else this.params.log.warn("ffmpeg: завершился сам", payload);
        this.notify();
        resolve();
      });
      proc.once("error", (e: Error) => {
        this.params.log.error("ffmpeg: ошибка процесса", { error: e });
        this.ended = true;
        this.notify();
        resolve();
      });
    });

    proc.stderr?.on("data", (buf: Buffer) => {
      this.stderrTail = appendTail(this.stderrTail, String(buf ?? ""), 2000);
    });
    proc.stdout?.on("data", (chunk: Buffer) => {
      if (this.stopRequested) return;
      this.chunks.push(chunk);
      this.buffered += chunk.length;
      if (this.buffered > MAX_BUFFERED_BYTES) proc.stdout?.pause();
      this.notify();
    });
  }

  async read(): Promise<Buffer | null> {
    while (this.buffered < this.params.readBytes && !this.ended) {
      this.proc.stdout?.resume();
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
    // в конце потока отдаём остаток, но только целыми кадрами
    const want = this.ended ? this.buffered - (this.buffered % this.params.frameBytes) : this.params.readBytes;
    if (want <= 0) return null;
    const out = this.take(want);
    this.lastLevel = dbLevelFromS16le(out);
    if (this.buffered <= MAX_BUFFERED_BYTES) this.proc.stdout?.resume();
    return out;
  }

  level(): number {
    return this.lastLevel;
  }

  async close(): Promise<void> {
    const proc = this.proc;
    if (this.ended) return;
    this.stopRequested = true;

    try {
      if (proc.stdin && !proc.stdin.destroyed) {
        proc.stdin.write("q");
        proc.stdin.end();
      }
    } catch (e) {
      this.params.log.warn("ffmpeg: не удалось отправить 'q' в stdin", { error: e });
    }
    // stdout больше не читаем: без resume процесс может встать на полном пайпе
    proc.stdout?.resume();
    proc.kill("SIGINT");

    await Promise.race([this.exited, waitMs(8000)]);
    if (proc.exitCode === null && proc.signalCode === null) {
      proc.kill("SIGKILL");
      await Promise.race([this.exited, waitMs(2000)]);
    }
    this.ended = true;
    this.notify();
  }

  private notify(): void {
    const w = this.waiter;
    this.waiter = null;
    w?.();
  }

  private take(bytes: number): Buffer {
    const all = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.buffered);
    const out = all.subarray(0, bytes);
    const rest = all.subarray(bytes);
    this.chunks = rest.length ? [rest] : [];
    this.buffered = rest.length;
    return Buffer.from(out);
  }
}
