/**
 * Hashing, identifiers and log sanitization.
 *
 * Uses the Node.js built-in crypto module only.
 */

import { createHash, randomBytes } from 'node:crypto';

/**
 * SHA-256 of the input as lowercase hex. Used as a content checksum for
 * bucket documents written through the promotion journal.
 */
export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Generate a UUID v7 (time-sortable, RFC 9562). Entry ids sort in the
 * order the turns were appended.
 */
export function uuidv7(now: number = Date.now()): string {
  const ts = now.toString(16).padStart(12, '0').slice(-12);
  const rnd = randomBytes(10).toString('hex');
  const variant = ((parseInt(rnd.slice(3, 4), 16) & 0x3) | 0x8).toString(16);
  return `${ts.slice(0, 8)}-${ts.slice(8, 12)}-7${rnd.slice(0, 3)}-${variant}${rnd.slice(4, 7)}-${rnd.slice(7, 19)}`;
}

const SECRET_PATTERNS: ReadonlyArray<{ regex: RegExp; replacement: string }> = [
  { regex: /sk-[a-zA-Z0-9-_]{20,}/g, replacement: '[REDACTED_API_KEY]' },
  {
    regex: /api[_-]?key["\s:=]+["']?[a-zA-Z0-9-_]{16,}["']?/gi,
    replacement: '[REDACTED_API_KEY]',
  },
  { regex: /bearer\s+[a-zA-Z0-9-_.]+/gi, replacement: 'Bearer [REDACTED_TOKEN]' },
  { regex: /password["\s:=]+["']?[^"'\s]{1,}["']?/gi, replacement: '[REDACTED_PASSWORD]' },
];

const SENSITIVE_KEYS = new Set([
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'authorization',
  'auth',
]);

/**
 * Strip secrets from a value before it reaches a log line. Strings are
 * scanned for key/token patterns; object keys named like credentials are
 * replaced wholesale.
 */
export function sanitizeForLogging(input: unknown): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (typeof input === 'string') {
    let sanitized = input;
    for (const { regex, replacement } of SECRET_PATTERNS) {
      sanitized = sanitized.replace(regex, replacement);
    }
    return sanitized;
  }

  if (Array.isArray(input)) {
    return input.map(sanitizeForLogging);
  }

  if (input instanceof Error) {
    return input;
  }

  if (typeof input === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      sanitized[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? '[REDACTED]' : sanitizeForLogging(value);
    }
    return sanitized;
  }

  return input;
}
