import crypto from 'node:crypto';

/**
 * Canonical JSON: sorted keys, compact separators, ASCII-only output.
 * SECURITY: Plan hashes and signed payloads are computed over this form, so any
 * two semantically equal values must produce byte-identical strings.
 *
 * Throws TypeError for values JSON cannot represent exactly (NaN, Infinity,
 * undefined, bigint, functions, symbols, class instances).
 */
export function canonicalize(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  switch (typeof value) {
    case 'string':
      return escapeNonAscii(JSON.stringify(value));
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      if (!Number.isFinite(value)) {
        throw new TypeError(`Cannot canonicalize non-finite number: ${value}`);
      }
      return JSON.stringify(value);
    case 'object':
      break;
    default:
      throw new TypeError(`Cannot canonicalize value of type ${typeof value}`);
  }

  if (Array.isArray(value)) {
    return '[' + value.map((item: unknown) => canonicalize(item)).join(',') + ']';
  }

  if (!isRecord(value)) {
    throw new TypeError('Cannot canonicalize non-plain object');
  }

  const pairs = Object.keys(value)
    .sort()
    .map((key) => escapeNonAscii(JSON.stringify(key)) + ':' + canonicalize(value[key]));
  return '{' + pairs.join(',') + '}';
}

// Surrogate pairs are escaped one code unit at a time
function escapeNonAscii(json: string): string {
  return json.replace(/[\u0080-\uffff]/g, (ch) => '\\u' + ch.charCodeAt(0).toString(16).padStart(4, '0'));
}

/**
 * True for plain objects (object literals, JSON.parse output, Object.create(null)).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Compute SHA-256 hash of a string, returning hex-encoded result.
 */
export function computeHash(data: string | Buffer): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

/**
 * Generate a unique envelope ID.
 */
export function generateId(): string {
  return crypto.randomUUID();
}

/**
 * Generate a single-use approval nonce (128 random bits, hex).
 */
export function generateNonce(): string {
  return crypto.randomBytes(16).toString('hex');
}

/**
 * Current time as integer epoch seconds.
 */
export function epochSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Redact sensitive values from args for logging.
 * SECURITY: Prevents secrets from appearing in audit logs.
 */
export function redactSecrets(obj: unknown, maxLength = 200): string {
  const sensitivePatterns = [
    /password/i,
    /passphrase/i,
    /secret/i,
    /token/i,
    /api[_-]?key/i,
    /auth/i,
    /credential/i,
    /bearer/i,
  ];

  function redact(value: unknown, key?: string): unknown {
    if (key && sensitivePatterns.some((p) => p.test(key))) {
      return '[REDACTED]';
    }

    if (typeof value === 'string') {
      // Redact anything that looks like a token or key
      if (/^(sk-|pk-|xox[pboa]-|ghp_|gho_|Bearer\s)/i.test(value)) {
        return '[REDACTED]';
      }
      return truncate(value, maxLength);
    }

    if (Array.isArray(value)) {
      return value.slice(0, 10).map((v: unknown) => redact(v));
    }

    if (value !== null && typeof value === 'object') {
      const result: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(value)) {
        result[k] = redact(v, k);
      }
      return result;
    }

    return value;
  }

  return JSON.stringify(redact(obj)) ?? 'null';
}

/**
 * Truncate a string to a maximum length.
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength) + `...[truncated ${str.length - maxLength} chars]`;
}
