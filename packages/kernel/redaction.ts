/**
 * Sensitive Data Redaction Engine
 *
 * Turns arbitrary values into JSON-safe data and replaces the values of
 * sensitive keys. Used both for the library's own diagnostics and for the
 * payload of every telemetry event before it is queued.
 */

/** Key fragments whose values are never shipped. Matched case-insensitively as substrings. */
export const DEFAULT_REDACT_KEYS: readonly string[] = [
  'password',
  'token',
  'secret',
  'key',
  'apikey',
  'api_key',
  'authorization',
  'auth',
  'credential',
  'credentials',
];

export const REDACTED = '***REDACTED***';

// Values that are secrets regardless of the key they sit under
const SENSITIVE_VALUE_PATTERNS: readonly RegExp[] = [
  /^Bearer\s+[A-Za-z0-9._~+/=-]+$/,                         // Bearer token
  /^[A-Za-z0-9_-]+\.eyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]*$/,    // JWT
  /^-----BEGIN (RSA |EC |DSA |OPENSSH )?PRIVATE KEY-----/,   // PEM keys
];

/** JSON-safe output of {@link sanitizeForLogging} */
export type SanitizedData =
  | string
  | number
  | boolean
  | null
  | SanitizedData[]
  | { [key: string]: SanitizedData };

export interface SanitizeOptions {
  /** Key fragments to redact; defaults to {@link DEFAULT_REDACT_KEYS} */
  denyList?: readonly string[];
  maxDepth?: number;
  /** Also redact values that look like credentials (default true) */
  maskValues?: boolean;
}

/**
 * Check if a key name denotes sensitive data
 */
export function isSensitiveKey(key: string, denyList: readonly string[] = DEFAULT_REDACT_KEYS): boolean {
  const lower = key.toLowerCase();
  return denyList.some(fragment => fragment.length > 0 && lower.includes(fragment.toLowerCase()));
}

export function isSensitiveValue(value: unknown): boolean {
  if (typeof value !== 'string') {
    return false;
  }
  return SENSITIVE_VALUE_PATTERNS.some(pattern => pattern.test(value));
}

/**
 * Recursively sanitize a value.
 * Dates become ISO strings, errors become `{name, message}`, Maps become
 * objects, Sets become arrays, `undefined` object members are dropped and
 * non-finite numbers are stringified.
 */
export function sanitizeForLogging(data: unknown, options: SanitizeOptions = {}): SanitizedData {
  const denyList = options.denyList ?? DEFAULT_REDACT_KEYS;
  const maxDepth = options.maxDepth ?? 10;
  const maskValues = options.maskValues ?? true;
  const seen = new WeakSet<object>();

  const walkEntries = (entries: Iterable<[string, unknown]>, depth: number): SanitizedData => {
    const sanitized: Record<string, SanitizedData> = {};
    for (const [key, value] of entries) {
      if (value === undefined) continue;
      sanitized[key] = isSensitiveKey(key, denyList) ? REDACTED : walk(value, depth + 1);
    }
    return sanitized;
  };

  const walk = (value: unknown, depth: number): SanitizedData => {
    if (value === null || value === undefined) {
      return null;
    }

    switch (typeof value) {
      case 'string':
        return maskValues && isSensitiveValue(value) ? REDACTED : value;
      case 'number':
        return Number.isFinite(value) ? value : String(value);
      case 'boolean':
        return value;
      case 'bigint':
        return value.toString();
      case 'function':
        return '[Function]';
      case 'symbol':
        return '[Symbol]';
      default:
        break;
    }

    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
    }
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    if (value instanceof RegExp) {
      return value.toString();
    }

    if (typeof value !== 'object') {
      return String(value);
    }
    if (depth > maxDepth) {
      return '[Max Depth Exceeded]';
    }
    if (seen.has(value)) {
      return '[Circular]';
    }
    seen.add(value);

    try {
      if (Array.isArray(value)) {
        return value.map(item => walk(item, depth + 1));
      }
      if (value instanceof Set) {
        return [...value].map(item => walk(item, depth + 1));
      }
      if (value instanceof Map) {
        return walkEntries(
          [...value.entries()].map(([k, v]): [string, unknown] => [String(k), v]),
          depth,
        );
      }
      return walkEntries(Object.entries(value), depth);
    } finally {
      seen.delete(value);
    }
  };

  return walk(data, 0);
}

/**
 * Sanitize a flat record (log metadata, event data).
 * Always returns an object; a non-object input is wrapped under `value`.
 */
export function sanitizeRecord(
  data: Record<string, unknown> | undefined,
  options: SanitizeOptions = {}
): Record<string, SanitizedData> {
  if (!data) return {};
  const result = sanitizeForLogging(data, options);
  if (typeof result === 'object' && result !== null && !Array.isArray(result)) {
    return result;
  }
  return { value: result };
}
