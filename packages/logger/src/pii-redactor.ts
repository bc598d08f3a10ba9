/**
 * Secret and PII redaction for log output. Notification recipients and
 * extracted document text routinely carry e-mail addresses and phone numbers,
 * so free-text values are scrubbed as well as credential-bearing keys.
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values should always be redacted (matched case-insensitively).
 */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "authorization",
  "cookie",
  "accesskeyid",
  "secretaccesskey",
  "cohereapikey",
  "databaseurl",
  "redisurl",
]);

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

/** International-format numbers only; bare digit runs are drawing and invoice numbers. */
const PHONE_REGEX = /\+\d{1,3}[\s-]?\d{3,5}[\s-]?\d{3,5}(?:[\s-]?\d{1,5})?/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact a single key/value pair: sensitive keys lose their whole value,
 * strings lose any e-mail address or phone number they contain.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return value.replace(EMAIL_REGEX, REDACTED).replace(PHONE_REGEX, REDACTED);
  }

  return value;
}

/** Apply `redactValue` to every top-level property of a log record. */
export function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = redactValue(key, value);
  }
  return out;
}

const SENSITIVE_PATHS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "accessKeyId",
  "secretAccessKey",
  "cohereApiKey",
  "databaseUrl",
  "redisUrl",
];

/**
 * Paths for pino's `redact` option: each sensitive key at top level and one
 * level of nesting (e.g. `storage.secretAccessKey`).
 */
export const REDACT_PATHS: string[] = [...SENSITIVE_PATHS, ...SENSITIVE_PATHS.map((p) => `*.${p}`)];
