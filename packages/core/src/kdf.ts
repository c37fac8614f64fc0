/**
 * PBKDF2-HMAC-SHA256 key derivation (pure JavaScript via @noble/hashes).
 *
 * The output length is fixed at the SHA-256 digest size, which is what
 * fixes the subkey length in the binary format. Cost is linear in
 * `iterations`.
 */

import { pbkdf2, pbkdf2Async } from '@noble/hashes/pbkdf2';
import { sha256 } from '@noble/hashes/sha256';
import { SUBKEY_LENGTH } from './constants.js';

/** Plaintext password; strings are UTF-8 encoded before derivation */
export type PasswordInput = string | Uint8Array;

export function deriveSubkey(
  password: PasswordInput,
  salt: Uint8Array,
  iterations: number,
): Uint8Array {
  return pbkdf2(sha256, password, salt, { c: iterations, dkLen: SUBKEY_LENGTH });
}

/**
 * Same result as `deriveSubkey`, but yields to the event loop between
 * blocks so large iteration counts don't stall a server.
 */
export function deriveSubkeyAsync(
  password: PasswordInput,
  salt: Uint8Array,
  iterations: number,
): Promise<Uint8Array> {
  return pbkdf2Async(sha256, password, salt, { c: iterations, dkLen: SUBKEY_LENGTH });
}
