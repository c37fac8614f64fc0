/**
 * Constant-time comparison — prevents timing attacks on hash verification.
 *
 * Always walks the longer input; a length mismatch is folded into the
 * result instead of returning early.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  const length = Math.max(a.length, b.length);
  let result = a.length ^ b.length;
  for (let index = 0; index < length; index++) {
    result |= (a[index] ?? 0) ^ (b[index] ?? 0);
  }
  return result === 0;
}
