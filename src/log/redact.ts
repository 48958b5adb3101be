const SENSITIVE_KEYS = new Set([
  "access_key",
  "accesskey",
  "accesskeyid",
  "secret_key",
  "secretkey",
  "secretaccesskey",
  "session_token",
  "sessiontoken",
  "token",
  "password",
  "pass",
  "apikey",
  "api_key",
  "x-amz-signature",
  "x-amz-credential",
  "x-amz-security-token",
]);

const QUERY_SECRET_RE =
  /([?#&](?:access_key|secret_key|session_token|token|password|pass|api[_-]?key|x-amz-signature|x-amz-credential|x-amz-security-token)=)([^&#\s]+)/gi;

/**
 * Замаскировать чувствительные данные в URL (query, userinfo).
 *
 * Пример: `https://s3.local/b/k?X-Amz-Signature=abc&x=1` → `...?X-Amz-Signature=***&x=1`
 */
export function redactUrlForLog(url: string): string {
  const raw = String(url ?? "");
  if (!raw) return raw;

  try {
    // `URL()` требует абсолютный URL; для относительных просто вывалимся в резерв.
    const u = new URL(raw);
    // Важно: не итерируем `searchParams` “вживую” во время `set()`, чтобы не терять элементы.
    for (const k of Array.from(u.searchParams.keys())) {
      if (SENSITIVE_KEYS.has(k.toLowerCase())) u.searchParams.set(k, "***");
    }
    if (u.password) u.password = "***";
    return u.toString();
  } catch {
    return raw.replace(QUERY_SECRET_RE, "$1***");
  }
}

/**
 * Замаскировать чувствительные значения в произвольной строке (для логов).
 *
 * Поддерживает:
 * - `... secret_key=...`
 * - `Authorization: AWS4-HMAC-SHA256 Credential=...`
 * - `Authorization: Bearer ...`
 */
export function redactSecretsInStringForLog(input: string): string {
  const s = String(input ?? "");
  if (!s) return s;

  let out = s;
  out = out.replace(QUERY_SECRET_RE, "$1***");
  // key=value / key: value в “обычном” тексте (например в сообщениях ошибок SDK).
  out = out.replace(
    /\b(access_key|secret_key|secretAccessKey|accessKeyId|session_token|sessionToken|password|api[_-]?key)\b\s*[:=]\s*([^\s,;&#]+)/gi,
    "$1=***",
  );
  out = out.replace(/(\bAuthorization:\s*(?:Bearer|Basic|AWS4-HMAC-SHA256)\s+)([^\r\n]+)/gi, "$1***");
  return out;
}

/** Ключ объекта, значение которого в лог не пишем вообще. */
export function isSensitiveKeyForLog(k: string): boolean {
  const key = String(k ?? "").toLowerCase();
  return SENSITIVE_KEYS.has(key) || key === "authorization";
}
