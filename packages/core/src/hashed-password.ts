/**
 * HashedPassword — the in-memory form of a stored password hash.
 *
 * @ai_context One immutable type with two constructors (from a password,
 * from components) and two codecs (binary, base64 text). Instances are only
 * ever produced fully valid: decoding throws before a record exists, and
 * the byte accessors hand out copies so nothing outside can mutate them.
 */

import {
  DEFAULT_ITERATIONS,
  DEFAULT_SALT_LENGTH,
  FORMAT_VERSION,
  MAX_ITERATIONS,
  MIN_ITERATIONS,
  PRF_HMAC_SHA256,
} from './constants.js';
import { HashError, isHashError } from './errors.js';
import { base64ToBytes, bytesToBase64 } from './base64.js';
import { packComponents, unpackComponents } from './codec.js';
import type { HashComponents } from './codec.js';
import { constantTimeEqual } from './constant-time.js';
import { deriveSubkey, deriveSubkeyAsync } from './kdf.js';
import type { PasswordInput } from './kdf.js';
import { readSalt, secureRandomSource } from './random.js';
import type { RandomSource } from './random.js';

export class HashedPassword implements HashComponents {
  readonly version = FORMAT_VERSION;
  readonly prf = PRF_HMAC_SHA256;
  readonly iterations: number;
  private readonly saltBytes: Uint8Array;
  private readonly subkeyBytes: Uint8Array;

  private constructor(salt: Uint8Array, iterations: number, subkey: Uint8Array) {
    this.iterations = iterations;
    this.saltBytes = new Uint8Array(salt);
    this.subkeyBytes = new Uint8Array(subkey);
  }

  get salt(): Uint8Array {
    return new Uint8Array(this.saltBytes);
  }

  get subkey(): Uint8Array {
    return new Uint8Array(this.subkeyBytes);
  }

  /**
   * Assemble a record from components obtained elsewhere.
   * Ranges are NOT validated here; check untrusted input first (or go
   * through `fromBinary`, which does).
   */
  static fromComponents(salt: Uint8Array, iterations: number, subkey: Uint8Array): HashedPassword {
    return new HashedPassword(salt, iterations, subkey);
  }

  static fromPassword(
    password: PasswordInput,
    iterations: number = DEFAULT_ITERATIONS,
    random: RandomSource = secureRandomSource,
  ): HashedPassword {
    assertIterations(iterations);
    const salt = readSalt(random, DEFAULT_SALT_LENGTH);
    return new HashedPassword(salt, iterations, deriveSubkey(password, salt, iterations));
  }

  static async fromPasswordAsync(
    password: PasswordInput,
    iterations: number = DEFAULT_ITERATIONS,
    random: RandomSource = secureRandomSource,
  ): Promise<HashedPassword> {
    assertIterations(iterations);
    const salt = readSalt(random, DEFAULT_SALT_LENGTH);
    const subkey = await deriveSubkeyAsync(password, salt, iterations);
    return new HashedPassword(salt, iterations, subkey);
  }

  static fromBinary(bytes: Uint8Array): HashedPassword {
    const { salt, iterations, subkey } = unpackComponents(bytes);
    return new HashedPassword(salt, iterations, subkey);
  }

  static fromText(text: string): HashedPassword {
    return HashedPassword.fromBinary(base64ToBytes(text));
  }

  toBinary(): Uint8Array {
    return packComponents(this);
  }

  /** Base64 form, as stored in the user table */
  toText(): string {
    return bytesToBase64(this.toBinary());
  }

  toString(): string {
    return this.toText();
  }

  toJSON(): string {
    return this.toText();
  }

  /** True iff `password` derives this record's subkey (constant-time compare) */
  verify(password: PasswordInput): boolean {
    const candidate = deriveSubkey(password, this.saltBytes, this.iterations);
    return constantTimeEqual(this.subkeyBytes, candidate);
  }

  async verifyAsync(password: PasswordInput): Promise<boolean> {
    const candidate = await deriveSubkeyAsync(password, this.saltBytes, this.iterations);
    return constantTimeEqual(this.subkeyBytes, candidate);
  }

  equals(other: HashedPassword): boolean {
    return this.iterations === other.iterations
      && constantTimeEqual(this.saltBytes, other.saltBytes)
      && constantTimeEqual(this.subkeyBytes, other.subkeyBytes);
  }
}

/**
 * Throw PARAMETER unless `iterations` is an integer the format can carry
 * and a decoder will accept.
 */
export function assertIterations(iterations: number): void {
  if (!Number.isInteger(iterations) || iterations < MIN_ITERATIONS || iterations > MAX_ITERATIONS) {
    throw new HashError(
      'PARAMETER',
      `iterations must be an integer in [${MIN_ITERATIONS}, ${MAX_ITERATIONS}], got ${iterations}`,
    );
  }
}

// --- Function-style API ---

export function newFromPassword(
  password: PasswordInput,
  iterations?: number,
  random?: RandomSource,
): HashedPassword {
  return HashedPassword.fromPassword(password, iterations, random);
}

export function newFromPasswordAsync(
  password: PasswordInput,
  iterations?: number,
  random?: RandomSource,
): Promise<HashedPassword> {
  return HashedPassword.fromPasswordAsync(password, iterations, random);
}

export function newFromComponents(salt: Uint8Array, iterations: number, subkey: Uint8Array): HashedPassword {
  return HashedPassword.fromComponents(salt, iterations, subkey);
}

export function encodeBinary(record: HashedPassword): Uint8Array {
  return record.toBinary();
}

export function decodeBinary(bytes: Uint8Array): HashedPassword {
  return HashedPassword.fromBinary(bytes);
}

export function encodeText(record: HashedPassword): string {
  return record.toText();
}

export function decodeText(text: string): HashedPassword {
  return HashedPassword.fromText(text);
}

/**
 * Decode text, or null if it is not a valid hash.
 * Errors other than HashError are not expected here and propagate.
 */
export function tryDecodeText(text: string): HashedPassword | null {
  try {
    return decodeText(text);
  } catch (error) {
    if (isHashError(error)) return null;
    throw error;
  }
}
