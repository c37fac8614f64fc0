/**
 * Strict standard base64 (RFC 4648, padded), as stored in the user table's
 * password hash column.
 *
 * `atob` alone is too forgiving: it accepts missing padding and strips
 * whitespace, so the text is checked against the canonical shape first.
 */

import { HashError } from './errors.js';

const ALPHABET = /^[A-Za-z0-9+/]$/;

export function bytesToBase64(bytes: Uint8Array): string {
  const binStr = Array.from(bytes, b => String.fromCharCode(b)).join('');
  return btoa(binStr);
}

export function base64ToBytes(text: string): Uint8Array {
  const offset = findIllegalByte(text);
  if (offset !== -1) {
    throw new HashError('CORRUPT', `password encoding: illegal base64 data at input byte ${offset}`);
  }
  const binStr = atob(text);
  return Uint8Array.from(binStr, c => c.charCodeAt(0));
}

/**
 * Offset of the first character that breaks the padded base64 shape,
 * the input length if it ends mid-quantum, or -1 if the text is well-formed.
 */
function findIllegalByte(text: string): number {
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch !== '=') {
      if (!ALPHABET.test(ch)) return i;
      continue;
    }
    // Padding may only close the final quantum: "xx==" or "xxx="
    const position = i % 4;
    if (position === 2 && text.charAt(i + 1) === '=') {
      return i + 2 === text.length ? -1 : i + 2;
    }
    if (position === 3) {
      return i + 1 === text.length ? -1 : i + 1;
    }
    return i;
  }
  return text.length % 4 === 0 ? -1 : text.length;
}
