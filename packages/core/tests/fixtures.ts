/** Stored hashes written by the original framework, with their passwords. */
export const STORED_USERS = [
  {
    name: 'josephine@example.com',
    passwordHash: 'AQAAAAEAACcQAAAAEO4k5r1SgFuCYAS8xfu/Mnu5iZUqh+DgSRU4IyJpD+mVo4KdbI1BwiF3KcY1V6AapQ==',
    password: 'In2Egypt!',
  },
  {
    name: 'jake@example.com',
    passwordHash: 'AQAAAAEAACcQAAAAEHhGT2mW9BMcWhMNA4lNj80h8OULQyuvqbSR99lZ+GWsuhA2H6HLxcZI8+RhtxV5FA==',
    password: 'REdNuIlsAnyejH3',
  },
] as const;

/** Header bytes: version, prf, iterations, saltLength (big-endian) */
export function header(version: number, prf: number, iterations: number, saltLength: number): number[] {
  return [
    version,
    ...uint32(prf),
    ...uint32(iterations),
    ...uint32(saltLength),
  ];
}

function uint32(value: number): number[] {
  return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff];
}

/** Fixed-output random source for deterministic salts */
export function fixedRandom(byte: number) {
  return (length: number) => new Uint8Array(length).fill(byte);
}
