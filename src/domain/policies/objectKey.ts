/**
 * Политика: ключ объекта в хранилище.
 *
 * `[prefix/]conversation_id/session_id/filename` или `[prefix/]session_id/filename`.
 */

export function normalizeKeySegment(value: string): string {
  return String(value ?? "")
    .replace(/\\/g, "/")
    .split("/")
    .filter((part) => part.length > 0)
    .join("/");
}

/** Имя файла без каталогов (разделители обеих ОС). */
export function baseNameOf(filePath: string): string {
  const parts = String(filePath ?? "").split(/[\\/]/);
  return parts[parts.length - 1] ?? "";
}

export function buildObjectKey(params: { filePath: string; sessionId: string; conversationId?: string | null; prefix?: string }): string {
  const parts: string[] = [];
  const prefix = normalizeKeySegment(params.prefix ?? "");
  if (prefix) parts.push(prefix);
  const conversation = normalizeKeySegment(params.conversationId ?? "");
  if (conversation) parts.push(conversation);
  parts.push(normalizeKeySegment(params.sessionId));
  parts.push(baseNameOf(params.filePath));
  return parts.join("/");
}
