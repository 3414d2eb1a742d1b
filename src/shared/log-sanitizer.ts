/**
 * Log Sanitizer
 * =============
 * Makes values safe to write to the logs.
 *
 * - Credentials never reach a log line: password/hash/token/secret keys are
 *   redacted, and so are bearer headers and JWT-shaped strings inside text.
 * - Output stays JSON-safe and bounded (long strings, arrays and objects are
 *   truncated).
 */
export type SanitizeForLoggingOptions = {
  maxDepth?: number;
  maxStringLength?: number;
  maxArrayLength?: number;
  maxObjectKeys?: number;
};

const DEFAULTS: Required<SanitizeForLoggingOptions> = {
  maxDepth: 6,
  maxStringLength: 2_000,
  maxArrayLength: 50,
  maxObjectKeys: 200,
};

export const REDACTED = "[REDACTED]";

const REDACT_KEY_PATTERNS: ReadonlyArray<RegExp> = [
  /^authorization$/i,
  /^cookie$/i,
  /^set-cookie$/i,
  /token/i,
  /secret/i,
  /password/i,
  /^hash$/i,
  /credential/i,
  /api[_-]?key/i,
];

const JWT_LIKE = /\beyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]*/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) {return false;}
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function shouldRedactKey(key: string): boolean {
  return REDACT_KEY_PATTERNS.some((re) => re.test(key));
}

function truncateString(value: string, maxLen: number): string {
  if (value.length <= maxLen) {return value;}
  return `${value.slice(0, maxLen)}…(truncated ${value.length - maxLen} chars)`;
}

function sanitizeString(value: string, maxLen: number): string {
  let s = value;
  s = s.replace(/\bBearer\s+[A-Za-z0-9._~+/=-]+/gi, `Bearer ${REDACTED}`);
  s = s.replace(JWT_LIKE, REDACTED);
  s = s.replace(/\bscrypt\$[^\s"']+/g, REDACTED);
  return truncateString(s, maxLen);
}

function sanitizeValue(
  value: unknown,
  opts: Required<SanitizeForLoggingOptions>,
  depth: number
): unknown {
  if (value === null || value === undefined) {return value;}
  if (depth > opts.maxDepth) {return "[Truncated depth]";}

  if (typeof value === "string") {return sanitizeString(value, opts.maxStringLength);}
  if (typeof value === "number") {return Number.isFinite(value) ? value : String(value);}
  if (typeof value === "boolean") {return value;}
  if (typeof value === "bigint") {return value.toString();}
  if (typeof value === "symbol") {return value.toString();}
  if (typeof value === "function") {return "[Function]";}

  if (value instanceof Date) {return value.toISOString();}
  if (value instanceof Error) {
    return {
      name: value.name,
      message: sanitizeString(value.message, opts.maxStringLength),
    };
  }

  if (Array.isArray(value)) {
    const max = Math.max(0, opts.maxArrayLength);
    const sliced = value.slice(0, max).map((v: unknown) => sanitizeValue(v, opts, depth + 1));
    if (value.length <= max) {return sliced;}
    return [...sliced, `…(${value.length - max} more)`];
  }

  if (isPlainObject(value)) {
    const entries = Object.entries(value);
    const max = Math.max(0, opts.maxObjectKeys);

    const out: Record<string, unknown> = {};
    for (const [k, v] of entries.slice(0, max)) {
      out[k] = shouldRedactKey(k) ? REDACTED : sanitizeValue(v, opts, depth + 1);
    }

    if (entries.length > max) {
      out._truncated_keys = entries.length - max;
    }

    return out;
  }

  return sanitizeString(String(value), opts.maxStringLength);
}

export function sanitizeForLogging(
  value: unknown,
  options?: SanitizeForLoggingOptions
): unknown {
  const opts: Required<SanitizeForLoggingOptions> = {
    ...DEFAULTS,
    ...(options ?? {}),
  };
  return sanitizeValue(value, opts, 0);
}
