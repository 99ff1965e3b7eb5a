/**
 * Denylist-based redaction for logs, run records and error envelopes.
 *
 * Publisher and release-host output can echo credentials back (upload
 * tokens, `gh` auth tokens), so every string that reaches a log file goes
 * through here first.
 */

/** Key fragments whose values are always masked. */
export const REDACT_DENYLIST_KEYS: readonly string[] = [
  'password',
  'secret',
  'token',
  'api_key',
  'apikey',
  'private_key',
  'authorization',
  'credential',
  'twine_password',
  'gh_token',
  'github_token',
  'npm_token',
];

/** Inline patterns replaced inside otherwise harmless strings. */
const INLINE_PATTERNS: readonly RegExp[] = [
  /-----BEGIN (?:RSA |EC |OPENSSH )?PRIVATE KEY-----/g,
  /gh[pousr]_[0-9a-zA-Z]{36}/g,           // GitHub tokens
  /github_pat_[0-9a-zA-Z_]{22,}/g,        // GitHub fine-grained PAT
  /pypi-[0-9a-zA-Z_-]{32,}/g,             // PyPI API token
  /npm_[0-9a-zA-Z]{36}/g,                 // npm token
  /[a-zA-Z0-9_]+_(?:token|secret|password)\s*[:=]\s*['"]?[^\s'"]{8,}['"]?/gi,
];

const REDACTED = '[REDACTED]';

function keyMatchesDenylist(key: string): boolean {
  const lower = key.toLowerCase();
  return REDACT_DENYLIST_KEYS.some((dk) => lower.includes(dk));
}

/**
 * Redact a string by replacing inline secret patterns. The rest of the
 * string is kept so command output stays readable.
 */
export function redactString(input: string): string {
  let result = input;
  for (const pattern of INLINE_PATTERNS) {
    result = result.replace(pattern, REDACTED);
  }
  return result;
}

/**
 * Deep-redact a value: denylisted keys are masked, strings are scrubbed with
 * `redactString`. Returns a new value (never mutates).
 */
export function redact(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;

  if (typeof obj === 'string') return redactString(obj);

  if (typeof obj !== 'object') return obj;

  if (Array.isArray(obj)) {
    return obj.map((item) => redact(item));
  }

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    out[key] = keyMatchesDenylist(key) ? REDACTED : redact(value);
  }
  return out;
}
