/**
 * String-in, string-out password hashing in the version 1 identity format.
 *
 * Output is the base64 text stored in the user table's hash column, so
 * values written here are readable by the framework that originally
 * produced them, and vice versa.
 */

import { DEFAULT_ITERATIONS } from './constants.js';
import { newFromPasswordAsync, tryDecodeText } from './hashed-password.js';
import type { PasswordInput } from './kdf.js';
import type { RandomSource } from './random.js';

/** Default hashing parameters (the framework's own defaults) */
const DEFAULTS = {
  iterations: DEFAULT_ITERATIONS,
} as const;

export interface HashOptions {
  /** PBKDF2 iteration count, 1..100000. Default: 10000 */
  iterations?: number;
  /** Secure random source for the salt. Default: platform CSPRNG */
  random?: RandomSource;
}

/**
 * Hash a password with a fresh random salt.
 * Returns the base64 text form.
 */
export async function hashPassword(
  password: PasswordInput,
  options?: HashOptions,
): Promise<string> {
  const iterations = options?.iterations ?? DEFAULTS.iterations;
  const record = await newFromPasswordAsync(password, iterations, options?.random);
  return record.toText();
}

/**
 * Check if a stored hash needs rehashing (unreadable, or iteration count
 * differs from the current target).
 */
export function needsRehash(
  storedHash: string,
  options?: Pick<HashOptions, 'iterations'>,
): boolean {
  const record = tryDecodeText(storedHash);
  if (!record) return true;

  const iterations = options?.iterations ?? DEFAULTS.iterations;
  return record.iterations !== iterations;
}
