/**
 * @idhash/core
 *
 * Reads, writes and verifies password hashes in the version 1 identity
 * format (PBKDF2-HMAC-SHA256, base64 of a fixed big-endian layout), so a
 * replacement server can keep authenticating existing users.
 *
 * @ai_context Everything here is synchronous and free of shared state,
 * except salt generation, which reads the injected RandomSource. The
 * `*Async` variants compute the same values while yielding to the event loop.
 */

export {
  FORMAT_VERSION,
  PRF_HMAC_SHA256,
  DEFAULT_ITERATIONS,
  DEFAULT_SALT_LENGTH,
  SUBKEY_LENGTH,
  MIN_ITERATIONS,
  MAX_ITERATIONS,
  MIN_SALT_LENGTH,
  MAX_SALT_LENGTH,
  HEADER_LENGTH,
} from './constants.js';
export { HashError, isHashError } from './errors.js';
export type { HashErrorCode } from './errors.js';
export {
  HashedPassword,
  assertIterations,
  newFromPassword,
  newFromPasswordAsync,
  newFromComponents,
  encodeBinary,
  decodeBinary,
  encodeText,
  decodeText,
  tryDecodeText,
} from './hashed-password.js';
export type { HashComponents } from './codec.js';
export { deriveSubkey, deriveSubkeyAsync } from './kdf.js';
export type { PasswordInput } from './kdf.js';
export { constantTimeEqual } from './constant-time.js';
export { secureRandomSource } from './random.js';
export type { RandomSource } from './random.js';
export {
  verifyPassword,
  verifyPasswordAsync,
  verifyEncodedHash,
  verifyEncodedHashAsync,
} from './verify.js';
export type { VerificationResult } from './verify.js';
export { hashPassword, needsRehash } from './password.js';
export type { HashOptions } from './password.js';
