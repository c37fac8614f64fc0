/**
 * Typed error class for hash decoding and construction.
 *
 * @ai_context Errors are compared by `code`, never by identity:
 * - CORRUPT: byte length disagrees with the declared fields, or the text is not valid base64
 * - VERSION: the version byte is not the supported format
 * - FUNCTION: the PRF identifier is not HMAC-SHA256
 * - PARAMETER: iteration count or salt length is out of range
 * - RANDOM_SOURCE: the secure random source could not supply salt bytes
 */

export type HashErrorCode =
  | 'CORRUPT'
  | 'VERSION'
  | 'FUNCTION'
  | 'PARAMETER'
  | 'RANDOM_SOURCE';

const DEFAULT_MESSAGES: Record<HashErrorCode, string> = {
  CORRUPT: 'malformed hashed value',
  VERSION: 'unknown hashed format version',
  FUNCTION: 'unknown hash function',
  PARAMETER: 'invalid hash function parameter',
  RANDOM_SOURCE: 'cannot make salt value',
};

export class HashError extends Error {
  readonly code: HashErrorCode;

  constructor(code: HashErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? DEFAULT_MESSAGES[code], options);
    this.name = 'HashError';
    this.code = code;
  }
}

/**
 * Narrow an unknown value to a HashError, optionally of a specific kind.
 */
export function isHashError(value: unknown, code?: HashErrorCode): value is HashError {
  if (!(value instanceof HashError)) return false;
  return code === undefined || value.code === code;
}
