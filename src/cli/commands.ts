import type { RecorderContext } from "../runtime/recorderContext";
import type { SessionSummary } from "../application/recording/sessionController";
import { readSessionLog, summarizeSessions } from "../recording/sessionLogReader";
import { redactUrlForLog } from "../log/redact";
import { roundDurationSec } from "../domain/policies/chunkBudget";

export type CommandOutput = {
  /** Полезный вывод команды (stdout). */
  out: (line: string) => void;
};

/** `record`: одна сессия записи. Код выхода 1 только при фатальной ошибке сессии. */
export async function recordCommand(
  ctx: RecorderContext,
  params: { durationSec?: number; signal?: AbortSignal },
  io: CommandOutput,
): Promise<number> {
  const controller = ctx.createSessionController();
  // ход записи в --verbose: смена состояния или числа чанков
  let lastProgress = "";
  controller.setOnStats((s) => {
    const key = `${s.state}:${s.chunksTotal}`;
    if (key === lastProgress) return;
    lastProgress = key;
    ctx.logService.info(`Запись: ${s.state}`, {
      sessionId: s.sessionId,
      chunks: s.chunksTotal,
      elapsedSec: roundDurationSec(s.elapsedMs / 1000),
      nextChunkSec: s.nextChunkInMs === undefined ? undefined : roundDurationSec(s.nextChunkInMs / 1000),
      levelDb: Math.round(s.levelDb),
    });
  });
  const summary = await controller.run({ durationSec: params.durationSec, signal: params.signal });
  for (const line of formatSessionSummary(summary)) io.out(line);
  if (summary.fatalError) {
    ctx.logService.error(summary.fatalError.message, { code: summary.fatalError.code, cause: summary.fatalError.cause });
    return 1;
  }
  return 0;
}

export function formatSessionSummary(summary: SessionSummary): string[] {
  const s = summary.session;
  if (!s) return ["Сессия не создана"];
  const u = summary.uploads;
  const lines = [
    `Сессия ${s.sessionId}: ${s.chunkCount} чанк(ов), ${roundDurationSec(s.totalDurationSec)} с${summary.aborted ? " (прервана)" : ""}`,
    `Выгрузка: uploaded=${u.uploaded} failed=${u.failed} skipped=${u.skipped} not_attempted=${u.not_attempted} abandoned=${u.abandoned} pending=${u.pending}`,
  ];
  for (const c of summary.chunks) lines.push(`  ${String(c.chunkIndex).padStart(2, "0")} ${c.filePath} ${roundDurationSec(c.durationSec)} с`);
  if (summary.logErrors > 0) lines.push(`Журнал сессий: ${summary.logErrors} ошибок записи`);
  if (summary.fatalError) lines.push(`Ошибка: ${summary.fatalError.message} [${summary.fatalError.code}]`);
  return lines;
}

/** `status`: куда пишем и доступно ли хранилище. */
export async function statusCommand(ctx: RecorderContext, io: CommandOutput): Promise<number> {
  const rec = ctx.settings.recording;
  io.out(`Backend: ${rec.backend}`);
  io.out(`Устройство: ${rec.device ?? "default"} (${rec.deviceName})`);
  io.out(`Формат: ${rec.format}, ${rec.sampleRate} Гц, каналов: ${rec.channels}, чанк: ${rec.chunkSeconds} с`);
  io.out(`Каталог записей: ${ctx.outputDir}`);
  io.out(`Журнал сессий: ${ctx.sessionLogPath}`);

  const s3 = ctx.settings.s3;
  if (!ctx.settings.upload.enabled) {
    io.out("Выгрузка: отключена");
    return 0;
  }
  const storage = ctx.remoteStorage();
  if (!s3 || !storage) {
    io.out("Выгрузка: хранилище не настроено");
    return 0;
  }
  io.out(`Хранилище: ${redactUrlForLog(s3.endpointUrl)} bucket=${storage.bucket}${s3.prefix ? ` prefix=${s3.prefix}` : ""}`);
  const check = await storage.checkBucket().finally(() => storage.close());
  if (check.ok) {
    io.out("Bucket: доступен");
    return 0;
  }
  io.out(`Bucket: недоступен (${check.error.message})`);
  ctx.logService.warn("Статус: bucket недоступен", { bucket: storage.bucket, cause: check.error.cause });
  return 1;
}

/** `sessions`: сводка по журналу после сведения поправок выгрузки. */
export async function sessionsCommand(ctx: RecorderContext, params: { logFile: string }, io: CommandOutput): Promise<number> {
  const read = await readSessionLog(params.logFile);
  if (!read.ok) {
    ctx.logService.error(read.error.message, { cause: read.error.cause, logFile: params.logFile });
    return 1;
  }
  const { entries, malformedLines } = read.value;
  if (malformedLines.length > 0) {
    ctx.logService.warn("Журнал сессий: пропущены битые строки", { lines: malformedLines.slice(0, 50), count: malformedLines.length });
  }
  const rows = summarizeSessions(entries);
  if (rows.length === 0) {
    io.out("Сессий нет");
    return 0;
  }
  for (const r of rows) {
    const state = r.ended ? `завершена ${r.endedAt ?? ""}` : "не завершена";
    const conversation = r.conversationId ? ` [${r.conversationId}]` : "";
    io.out(`${r.sessionId}${conversation}: ${r.startedAt ?? "?"}, ${state}, чанков ${r.chunkCount}, ${r.totalDurationSec} с, выгружено ${r.uploadedCount}/${r.chunkCount}`);
  }
  return 0;
}
