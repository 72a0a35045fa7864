/**
 * Denylist-based redaction utility for logs and evidence.
 *
 * Keys on the denylist are recursively masked before any data leaves
 * the process boundary (structured logs, artifact files, CLI output).
 * Email addresses are PII and are masked wherever they appear as values.
 */

/** Default key patterns that must never appear in output. */
export const REDACT_DENYLIST_KEYS: readonly string[] = [
  'password',
  'secret',
  'token',
  'api_key',
  'apikey',
  'access_key',
  'private_key',
  'authorization',
  'credential',
  'x-api-key',
  'admin_key',
  'client_secret',
  'refresh_token',
  'session_token',
];

/** Keys that look sensitive but hold counts or ids, never secrets. */
const REDACT_ALLOWLIST_KEYS: ReadonlySet<string> = new Set([
  'api_key_id',
  'api_key_name',
  'opaque_key_id',
  'token_type',
]);

/** Regex patterns that match sensitive values regardless of key name. */
const REDACT_VALUE_PATTERNS: readonly RegExp[] = [
  /-----BEGIN (?:RSA |EC )?PRIVATE KEY-----/,
  /sk-ant-[a-zA-Z0-9_-]{16,}/,           // Anthropic-style key
  /sk-[a-zA-Z0-9]{32,}/,                 // OpenAI-style key
  /key_[a-zA-Z0-9]{32,}/,                // Generic admin key
  /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/, // Email (PII)
];

const REDACTED = '[REDACTED]';

function keyMatchesDenylist(key: string): boolean {
  const lower = key.toLowerCase();
  if (REDACT_ALLOWLIST_KEYS.has(lower)) return false;
  if (lower.endsWith('_tokens') || lower.endsWith('_token_count')) return false;
  return REDACT_DENYLIST_KEYS.some((dk) => lower.includes(dk));
}

function valueMatchesPattern(value: string): boolean {
  return REDACT_VALUE_PATTERNS.some((p) => p.test(value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-redact a value: any key on the denylist is replaced with
 * `[REDACTED]`, any string value matching a sensitive pattern is
 * replaced with `[REDACTED]`.  Returns a new value (never mutates).
 */
export function redact(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;

  if (typeof obj === 'string') {
    return valueMatchesPattern(obj) ? REDACTED : obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => redact(item));
  }

  if (!isRecord(obj)) return obj;

  return redactRecord(obj);
}

/** `redact` for a record, keeping the record type. */
export function redactRecord(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    out[key] = keyMatchesDenylist(key) ? REDACTED : redact(value);
  }
  return out;
}

/**
 * Redact a string by replacing inline secret patterns.
 */
export function redactString(input: string): string {
  let result = input;
  result = result.replace(/-----BEGIN (?:RSA |EC )?PRIVATE KEY-----/g, REDACTED);
  result = result.replace(/sk-ant-[a-zA-Z0-9_-]{16,}/g, REDACTED);
  result = result.replace(/sk-[a-zA-Z0-9]{32,}/g, REDACTED);
  result = result.replace(/key_[a-zA-Z0-9]{32,}/g, REDACTED);
  result = result.replace(/[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, REDACTED);
  result = result.replace(/[a-zA-Z0-9_]+_key\s*[:=]\s*['"]?[a-zA-Z0-9_-]{16,}['"]?/gi, REDACTED);
  result = result.replace(/[a-zA-Z0-9_]+_secret\s*[:=]\s*['"]?[a-zA-Z0-9_-]{16,}['"]?/gi, REDACTED);
  return result;
}
