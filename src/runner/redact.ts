/**
 * Denylist-based redaction utility for logs and error output.
 *
 * Keys on the denylist are recursively masked before any data leaves
 * the process boundary (structured logs, run summaries, CLI output).
 * Mirror URLs may carry basic-auth credentials; those are masked too.
 */

/** Default key patterns that must never appear in output. */
export const REDACT_DENYLIST_KEYS: readonly string[] = [
  'password',
  'passwd',
  'secret',
  'token',
  'api_key',
  'apikey',
  'private_key',
  'authorization',
  'credential',
];

const URL_CREDENTIALS = /([a-z][a-z0-9+.-]*:\/\/)[^\s/:@]+:[^\s/@]+@/gi;

/** Regex patterns that match sensitive values regardless of key name. */
const REDACT_VALUE_PATTERNS: readonly RegExp[] = [
  /-----BEGIN (?:RSA |EC |OPENSSH )?PRIVATE KEY-----/,
  /ghp_[0-9a-zA-Z]{36}/,                 // GitHub PAT
];

const REDACTED = '[REDACTED]';

function keyMatchesDenylist(key: string): boolean {
  const lower = key.toLowerCase();
  return REDACT_DENYLIST_KEYS.some((dk) => lower.includes(dk));
}

function valueMatchesPattern(value: string): boolean {
  return REDACT_VALUE_PATTERNS.some((p) => p.test(value));
}

/**
 * Deep-redact a value: any key on the denylist is replaced with
 * `[REDACTED]`, any string matching a sensitive pattern is replaced
 * whole, and URL credentials are masked in place. Returns a new value
 * (never mutates).
 */
export function redact(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;

  if (typeof obj === 'string') {
    return valueMatchesPattern(obj) ? REDACTED : maskUrlCredentials(obj);
  }

  if (typeof obj !== 'object') return obj;

  if (Array.isArray(obj)) {
    return obj.map((item) => redact(item));
  }

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (keyMatchesDenylist(key)) {
      out[key] = REDACTED;
    } else {
      out[key] = redact(value);
    }
  }
  return out;
}

function maskUrlCredentials(input: string): string {
  return input.replace(URL_CREDENTIALS, `$1${REDACTED}@`);
}

/**
 * Redact a string by replacing inline secret patterns.
 */
export function redactString(input: string): string {
  let result = maskUrlCredentials(input);
  result = result.replace(/-----BEGIN (?:RSA |EC |OPENSSH )?PRIVATE KEY-----/g, REDACTED);
  result = result.replace(/ghp_[0-9a-zA-Z]{36}/g, REDACTED);
  result = result.replace(/[a-zA-Z0-9_]+_(?:key|token|secret)\s*[:=]\s*['"]?[a-zA-Z0-9_-]{16,}['"]?/gi, REDACTED);
  return result;
}
