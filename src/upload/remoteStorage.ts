import type { Result } from "../shared/result";

/** Удалённое объектное хранилище, куда уходят готовые чанки. */
export interface RemoteStorage {
  readonly bucket: string;
  /** Выгрузить локальный файл под ключом `key`. Ошибка = reject. */
  put(key: string, localPath: string): Promise<void>;
  /** Проверить доступ к bucket (для `status`). */
  checkBucket(): Promise<Result<void>>;
  /** Закрыть соединения; незавершённые `put()` обрываются. */
  close(): void;
}
