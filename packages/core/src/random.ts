/**
 * Salt generation from a cryptographically secure random source.
 *
 * @ai_context The source is injectable so callers (and tests) can supply
 * their own CSPRNG. A failing source is an error, never a reason to fall
 * back to Math.random or similar.
 */

import { randomBytes } from '@noble/hashes/utils';
import { DEFAULT_SALT_LENGTH } from './constants.js';
import { HashError } from './errors.js';

/** Produces `length` cryptographically secure random bytes, or throws */
export type RandomSource = (length: number) => Uint8Array;

/** Platform CSPRNG (crypto.getRandomValues) */
export const secureRandomSource: RandomSource = length => randomBytes(length);

export function readSalt(source: RandomSource, length: number = DEFAULT_SALT_LENGTH): Uint8Array {
  let bytes: unknown;
  try {
    bytes = source(length);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new HashError('RANDOM_SOURCE', `cannot make salt value: ${reason}`, { cause: error });
  }
  if (!(bytes instanceof Uint8Array) || bytes.length !== length) {
    throw new HashError('RANDOM_SOURCE', `cannot make salt value: expected ${length} random bytes`);
  }
  return new Uint8Array(bytes);
}
