/**
 * Fixed parameters of the version 1 identity hash format.
 *
 * Format: { 0x01, prf (uint32), iterations (uint32), saltLength (uint32), salt, subkey }
 * All uint32 fields are big-endian.
 */

/** Only supported format version byte */
export const FORMAT_VERSION = 1;

/** PRF identifier for HMAC-SHA256 */
export const PRF_HMAC_SHA256 = 1;

/** Default iteration count used by the framework that writes these hashes */
export const DEFAULT_ITERATIONS = 10_000;

/** Default salt length in bytes (128 bits) */
export const DEFAULT_SALT_LENGTH = 16;

/** Subkey length in bytes, fixed by the PRF (SHA-256 digest size) */
export const SUBKEY_LENGTH = 32;

export const MIN_ITERATIONS = 1;
export const MAX_ITERATIONS = 100_000;

export const MIN_SALT_LENGTH = 1;
export const MAX_SALT_LENGTH = 64;

/** version[1] + prf[4] + iterations[4] + saltLength[4] */
export const HEADER_LENGTH = 1 + 3 * 4;
