import type { RecorderSettings, RecordingBackendId } from "../../types";
import type { Logger } from "../../log/logService";
import type { AudioSource } from "../audioSource";
import { FfmpegAudioSource } from "./ffmpegAudioSource";
import { ToneAudioSource } from "./toneAudioSource";

export type AudioSourceFactory = (settings: RecorderSettings["recording"]) => AudioSource;

/** Реестр backend'ов захвата: конкретная реализация выбирается по `recording.backend`. */
export function createAudioSourceRegistry(params: { log: Logger }): Record<RecordingBackendId, AudioSourceFactory> {
  return {
    ffmpeg: (rec) =>
      new FfmpegAudioSource({
        inputFormat: rec.ffmpegInputFormat,
        framesPerRead: rec.framesPerRead,
        log: params.log,
      }),
    tone: (rec) => new ToneAudioSource({ framesPerRead: rec.framesPerRead, realtime: true }),
  };
}
