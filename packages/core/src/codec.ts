/**
 * Binary pack/unpack of the version 1 hash layout:
 *
 *   version[1]=0x01, prf[4]=0x01, iterations[4], saltLength[4], salt[n], subkey[32]
 *
 * All 32-bit ints are big-endian. There are no optional fields, so a value
 * that unpacks successfully packs back to the identical bytes.
 */

import {
  FORMAT_VERSION,
  HEADER_LENGTH,
  MAX_ITERATIONS,
  MAX_SALT_LENGTH,
  MIN_ITERATIONS,
  MIN_SALT_LENGTH,
  PRF_HMAC_SHA256,
  SUBKEY_LENGTH,
} from './constants.js';
import { HashError } from './errors.js';

const PRF_OFFSET = 1;
const ITERATIONS_OFFSET = 5;
const SALT_LENGTH_OFFSET = 9;

/** The variable parts of a hash; version and PRF are fixed by the format */
export interface HashComponents {
  readonly iterations: number;
  readonly salt: Uint8Array;
  readonly subkey: Uint8Array;
}

export function packComponents(components: HashComponents): Uint8Array {
  const { iterations, salt, subkey } = components;
  const out = new Uint8Array(HEADER_LENGTH + salt.length + subkey.length);
  const view = new DataView(out.buffer);
  view.setUint8(0, FORMAT_VERSION);
  view.setUint32(PRF_OFFSET, PRF_HMAC_SHA256);
  view.setUint32(ITERATIONS_OFFSET, iterations);
  view.setUint32(SALT_LENGTH_OFFSET, salt.length);
  out.set(salt, HEADER_LENGTH);
  out.set(subkey, HEADER_LENGTH + salt.length);
  return out;
}

/**
 * Validate a packed value and copy its components out.
 * Every check runs before anything is extracted; the returned salt and
 * subkey never share memory with `bytes`.
 */
export function unpackComponents(bytes: Uint8Array): HashComponents {
  if (bytes.length < HEADER_LENGTH) {
    throw new HashError('CORRUPT');
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  if (view.getUint8(0) !== FORMAT_VERSION) {
    throw new HashError('VERSION');
  }
  if (view.getUint32(PRF_OFFSET) !== PRF_HMAC_SHA256) {
    throw new HashError('FUNCTION');
  }
  const iterations = view.getUint32(ITERATIONS_OFFSET);
  if (iterations < MIN_ITERATIONS || iterations > MAX_ITERATIONS) {
    throw new HashError('PARAMETER');
  }
  const saltLength = view.getUint32(SALT_LENGTH_OFFSET);
  if (saltLength < MIN_SALT_LENGTH || saltLength > MAX_SALT_LENGTH) {
    throw new HashError('PARAMETER');
  }
  if (bytes.length !== HEADER_LENGTH + saltLength + SUBKEY_LENGTH) {
    throw new HashError('CORRUPT');
  }

  const subkeyOffset = HEADER_LENGTH + saltLength;
  return {
    iterations,
    salt: new Uint8Array(bytes.subarray(HEADER_LENGTH, subkeyOffset)),
    subkey: new Uint8Array(bytes.subarray(subkeyOffset)),
  };
}
