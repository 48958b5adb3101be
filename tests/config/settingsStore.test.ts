import { describe, expect, it } from "vitest";
import { DEFAULT_SETTINGS, normalizeSettings } from "../../src/settingsStore";

describe("normalizeSettings", () => {
  it("пустой конфиг даёт значения по умолчанию без проблем", () => {
    expect(normalizeSettings({})).toEqual({ settings: DEFAULT_SETTINGS, problems: [] });
    expect(normalizeSettings(undefined).settings).toEqual(DEFAULT_SETTINGS);
  });

  it("принимает строки-числа, дробную длину чанка и формат с точкой", () => {
    const { settings, problems } = normalizeSettings({
      recording: { rate: "48000", channels: 2, chunk_size: 0.5, file_extension: ".PCM", device: 3, backend: "tone" },
    });
    expect(problems).toEqual([]);
    expect(settings.recording).toMatchObject({
      backend: "tone",
      sampleRate: 48000,
      channels: 2,
      chunkSeconds: 0.5,
      format: "pcm",
      device: "3",
    });
  });

  it("ограничивает числа пределами", () => {
    const { settings } = normalizeSettings({
      recording: { chunk_seconds: 0.01, frames_per_read: 1 },
      upload: { workers: 100, queue_capacity: 0, max_attempts: "3.9" },
    });
    expect(settings.recording.chunkSeconds).toBe(0.1);
    expect(settings.recording.framesPerRead).toBe(16);
    expect(settings.upload.workers).toBe(16);
    expect(settings.upload.queueCapacity).toBe(1);
    expect(settings.upload.maxAttempts).toBe(3);
  });

  it("WAV-чанк длиннее 32-битного размера RIFF укорачивается с записью в problems", () => {
    const wav = normalizeSettings({ recording: { rate: 48000, channels: 2, chunk_size: 28800 } });
    expect(wav.settings.recording.chunkSeconds).toBe(22369);
    expect(wav.problems).toEqual(["recording.chunk_size: 28800 с не помещается в один WAV при 48000 Гц, каналов: 2; уменьшено до 22369 с"]);

    const pcm = normalizeSettings({ recording: { rate: 48000, channels: 2, chunk_size: 28800, file_extension: "pcm" } });
    expect(pcm.settings.recording.chunkSeconds).toBe(28800);
    expect(pcm.problems).toEqual([]);
  });

  it("неполная секция s3 отключает выгрузку", () => {
    const { settings, problems } = normalizeSettings({ s3: { bucket: "b" } });
    expect(settings.s3).toBeNull();
    expect(problems).toEqual(["s3: не заданы endpoint_url, access_key, secret_key; выгрузка отключена"]);
  });

  it("некорректный endpoint_url отключает выгрузку", () => {
    const { settings, problems } = normalizeSettings({
      s3: { bucket: "b", endpoint_url: "not a url", access_key: "test-access", secret_key: "test-secret" },
    });
    expect(settings.s3).toBeNull();
    expect(problems).toEqual(["s3: некорректный endpoint_url; выгрузка отключена"]);
  });

  it("полная секция s3", () => {
    const { settings } = normalizeSettings({
      s3: {
        bucket: "audio",
        endpoint_url: "http://127.0.0.1:9000",
        access_key: "test-access",
        secret_key: "test-secret",
        prefix: "/rec/",
        verify_ssl: false,
      },
    });
    expect(settings.s3).toEqual({
      bucket: "audio",
      endpointUrl: "http://127.0.0.1:9000",
      accessKey: "test-access",
      secretKey: "test-secret",
      region: null,
      prefix: "rec",
      verifySsl: false,
      pathStyle: true,
    });
  });

  it("битая секция игнорируется, остальные живут", () => {
    const { settings, problems } = normalizeSettings({ upload: "oops", recording: { channels: 2 } });
    expect(settings.upload).toEqual(DEFAULT_SETTINGS.upload);
    expect(settings.recording.channels).toBe(2);
    expect(problems).toHaveLength(1);
    expect(problems[0]?.startsWith("секция upload проигнорирована: ")).toBe(true);
  });

  it("неизвестные значения перечислений заменяются значениями по умолчанию", () => {
    const { settings, problems } = normalizeSettings({ recording: { backend: "portaudio", file_extension: "mp3", input_format: "jack" } });
    expect(settings.recording.backend).toBe("ffmpeg");
    expect(settings.recording.format).toBe("wav");
    expect(settings.recording.ffmpegInputFormat).toBe("auto");
    expect(problems).toEqual([
      'recording.backend: неизвестное значение "portaudio"',
      'recording.file_extension: неподдерживаемый формат "mp3"',
      'recording.input_format: неизвестное значение "jack"',
    ]);
  });

  it("корень не объект", () => {
    expect(normalizeSettings("x").problems).toEqual(["корень конфигурации должен быть объектом"]);
  });
});
