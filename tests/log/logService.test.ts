import { describe, expect, it } from "vitest";
import { LogService, type LogEntry } from "../../src/log/logService";

describe("LogService", () => {
  it("scoped() добавляет префикс и фиксированные поля", () => {
    const log = new LogService(100);
    log.scoped("Выгрузка", { sessionId: "s1" }).warn("чанк не загружен", { chunkIndex: 2 });

    const [e] = log.list();
    expect(e?.level).toBe("warn");
    expect(e?.message).toBe("Выгрузка: чанк не загружен");
    expect(e?.data).toEqual({ sessionId: "s1", chunkIndex: 2 });
  });

  it("держит не больше maxEntries (минимум 10)", () => {
    const log = new LogService(1);
    for (let i = 0; i < 15; i++) log.info(`m${i}`);
    const list = log.list();
    expect(list).toHaveLength(10);
    expect(list[0]?.message).toBe("m5");
  });

  it("маскирует секреты в сообщении и данных", () => {
    const log = new LogService(100);
    log.error("ошибка: secret_key=test-secret", {
      secret_key: "test-secret",
      endpointUrl: "https://s3.local/b?X-Amz-Signature=abc&x=1",
      nested: { access_key: "test-access" },
    });
    const [e] = log.list();
    expect(e?.message).toBe("ошибка: secret_key=***");
    expect(e?.data).toEqual({
      secret_key: "***",
      endpointUrl: "https://s3.local/b?X-Amz-Signature=***&x=1",
      nested: { access_key: "***" },
    });
  });

  it("раскрывает Error в данных", () => {
    const log = new LogService(100);
    log.warn("сбой", { error: new Error("boom") });
    const data = log.list()[0]?.data;
    expect(data?.error).toMatchObject({ name: "Error", message: "boom" });
  });

  it("отдаёт записи приёмникам; сбой приёмника не мешает остальным", () => {
    const seen: LogEntry[] = [];
    const log = new LogService(100, () => {
      throw new Error("sink down");
    });
    const off = log.addSink((e) => seen.push(e));
    log.info("a");
    off();
    log.info("b");

    expect(seen.map((e) => e.message)).toEqual(["a"]);
    expect(log.sinkErrorCount).toBe(2);
    expect(log.list().map((e) => e.message)).toEqual(["a", "b"]);
  });
});
