#!/usr/bin/env node
import "reflect-metadata";

import { runCli } from "./src/cli/runCli";

/**
 * CLI “chunk-recorder”.
 *
 * SIGINT/SIGTERM: первая отмена завершает сессию штатно (последний чанк дописывается),
 * повторная обрывает процесс.
 */
function main(): void {
  const abort = new AbortController();
  let interrupts = 0;
  const onSignal = (signal: NodeJS.Signals) => {
    interrupts += 1;
    if (interrupts > 1) {
      process.stderr.write(`Повторный ${signal}: выходим без завершения сессии\n`);
      process.exit(130);
    }
    process.stderr.write(`${signal}: завершаем сессию...\n`);
    abort.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  runCli(process.argv.slice(2), {
    cwd: process.cwd(),
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
    signal: abort.signal,
  }).then(
    (code) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      process.exitCode = code;
    },
    (e: unknown) => {
      process.stderr.write(`Рекордер: внутренняя ошибка: ${e instanceof Error ? (e.stack ?? e.message) : String(e)}\n`);
      process.exitCode = 1;
    },
  );
}

main();
