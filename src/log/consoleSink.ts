import type { LogEntry } from "./logService";
import { formatLogLine } from "./logFileWriter";

/**
 * Приёмник лога для CLI: warn/error всегда в stderr, info только в verbose-режиме.
 *
 * stdout оставляем под полезный вывод команд (`sessions`, `status`).
 */
export function createConsoleSink(params: { verbose: boolean; write?: (line: string) => void }): (entry: LogEntry) => void {
  const write = params.write ?? ((line: string) => process.stderr.write(line + "\n"));
  return (entry) => {
    if (entry.level === "info" && !params.verbose) return;
    write(formatLogLine(entry));
  };
}
