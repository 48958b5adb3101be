import { describe, expect, it } from "vitest";
import { createConsoleSink } from "../../src/log/consoleSink";
import { formatLogLine } from "../../src/log/logFileWriter";
import type { LogEntry } from "../../src/log/logService";

describe("createConsoleSink", () => {
  const info: LogEntry = { ts: Date.UTC(2026, 1, 23, 10, 0, 0), level: "info", message: "старт" };
  const warn: LogEntry = { ts: Date.UTC(2026, 1, 23, 10, 0, 1), level: "warn", message: "медленно", data: { n: 1 } };

  it("без verbose пишет только warn/error", () => {
    const lines: string[] = [];
    const sink = createConsoleSink({ verbose: false, write: (l) => lines.push(l) });
    sink(info);
    sink(warn);
    expect(lines).toEqual(['2026-02-23T10:00:01.000Z WARN медленно {"n":1}']);
  });

  it("в verbose пишет и info", () => {
    const lines: string[] = [];
    const sink = createConsoleSink({ verbose: true, write: (l) => lines.push(l) });
    sink(info);
    expect(lines).toEqual([formatLogLine(info)]);
    expect(lines[0]).toBe("2026-02-23T10:00:00.000Z INFO старт");
  });
});
