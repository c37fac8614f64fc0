/**
 * Password verification against a decoded record or a stored text value.
 *
 * @ai_context `verifyEncodedHash` must take about as long for a malformed
 * stored value as for a well-formed one with a wrong password. When decoding
 * fails it derives a decoy key at the default cost and compares it against a
 * separately allocated decoy subkey (never against itself), then reports
 * `verified: false` with the decode error for logging. Callers must treat
 * that error exactly like a failed verification for access control.
 */

import { DEFAULT_ITERATIONS, DEFAULT_SALT_LENGTH, SUBKEY_LENGTH } from './constants.js';
import { HashError, isHashError } from './errors.js';
import { constantTimeEqual } from './constant-time.js';
import { deriveSubkey, deriveSubkeyAsync } from './kdf.js';
import type { PasswordInput } from './kdf.js';
import { decodeText } from './hashed-password.js';
import type { HashedPassword } from './hashed-password.js';

export interface VerificationResult {
  verified: boolean;
  /** Why the stored value could not be decoded. For diagnostics only. */
  error?: HashError;
}

const DECOY_SALT = new Uint8Array(DEFAULT_SALT_LENGTH);
const DECOY_SUBKEY = new Uint8Array(SUBKEY_LENGTH).fill(0xa5);

export function verifyPassword(record: HashedPassword, password: PasswordInput): boolean {
  return record.verify(password);
}

export function verifyPasswordAsync(record: HashedPassword, password: PasswordInput): Promise<boolean> {
  return record.verifyAsync(password);
}

export function verifyEncodedHash(storedHash: string, password: PasswordInput): VerificationResult {
  const decoded = decodeOrError(storedHash);
  if (decoded instanceof HashError) {
    // Decoy work at the cost of a real verification
    constantTimeEqual(DECOY_SUBKEY, deriveSubkey(password, DECOY_SALT, DEFAULT_ITERATIONS));
    return { verified: false, error: decoded };
  }
  return { verified: verifyPassword(decoded, password) };
}

export async function verifyEncodedHashAsync(
  storedHash: string,
  password: PasswordInput,
): Promise<VerificationResult> {
  const decoded = decodeOrError(storedHash);
  if (decoded instanceof HashError) {
    // Decoy work at the cost of a real verification
    constantTimeEqual(DECOY_SUBKEY, await deriveSubkeyAsync(password, DECOY_SALT, DEFAULT_ITERATIONS));
    return { verified: false, error: decoded };
  }
  return { verified: await verifyPasswordAsync(decoded, password) };
}

// --- Internal helpers ---

function decodeOrError(storedHash: string): HashedPassword | HashError {
  try {
    return decodeText(storedHash);
  } catch (error) {
    if (isHashError(error)) return error;
    throw error;
  }
}
