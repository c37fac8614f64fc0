import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { decodeText } from '@idhash/core';
import { PasswordAuthenticator, UserExistsError } from '../src/authenticator.js';
import { MemoryUserStore } from '../src/stores.js';
import { LEGACY_HASH, LEGACY_PASSWORD } from './helpers.js';

describe('PasswordAuthenticator', () => {
  let userStore: MemoryUserStore;
  let authenticator: PasswordAuthenticator;

  beforeEach(() => {
    userStore = new MemoryUserStore();
    authenticator = new PasswordAuthenticator({ userStore, iterations: 100 });
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('constructor', () => {
    it('throws for an out-of-range iteration count', () => {
      expect(() => new PasswordAuthenticator({ userStore, iterations: 0 })).toThrow(
        'idhash: invalid `iterations` option: iterations must be an integer in [1, 100000], got 0',
      );
      expect(() => new PasswordAuthenticator({ userStore, iterations: 200_000 })).toThrow(/^idhash:/);
    });

    it('defaults to the framework iteration count', async () => {
      const defaults = new PasswordAuthenticator({ userStore });
      const { passwordHash } = await defaults.register('user-1', 'pw');
      expect(decodeText(passwordHash).iterations).toBe(10_000);
    });
  });

  describe('register', () => {
    it('stores a hash in the version 1 format', async () => {
      const result = await authenticator.register('user-1', 'correct-password');
      const stored = await userStore.get('user-1');

      expect(stored?.passwordHash).toBe(result.passwordHash);
      expect(decodeText(result.passwordHash).iterations).toBe(100);
    });

    it('throws UserExistsError for an existing user', async () => {
      await authenticator.register('user-1', 'pw');
      await expect(authenticator.register('user-1', 'other')).rejects.toBeInstanceOf(UserExistsError);
    });

    it('lets only one of two concurrent registrations for the same ID win', async () => {
      const outcomes = await Promise.allSettled([
        authenticator.register('bob', 'first'),
        authenticator.register('bob', 'second'),
      ]);

      expect(outcomes.map(o => o.status).sort()).toEqual(['fulfilled', 'rejected']);
      const rejected = outcomes.find(o => o.status === 'rejected');
      expect(rejected?.status === 'rejected' && rejected.reason).toBeInstanceOf(UserExistsError);

      const winner = outcomes[0]?.status === 'fulfilled' ? 'first' : 'second';
      const loser = winner === 'first' ? 'second' : 'first';
      expect((await authenticator.authenticate('bob', winner)).verified).toBe(true);
      expect((await authenticator.authenticate('bob', loser)).verified).toBe(false);
    });

    it('uses the configured random source', async () => {
      const seeded = new PasswordAuthenticator({
        userStore,
        iterations: 100,
        random: length => new Uint8Array(length).fill(1),
      });
      const { passwordHash } = await seeded.register('user-1', 'pw');
      expect(decodeText(passwordHash).salt).toEqual(new Uint8Array(16).fill(1));
    });
  });

  describe('authenticate', () => {
    it('verifies the correct password', async () => {
      await authenticator.register('user-1', 'correct-password');
      expect(await authenticator.authenticate('user-1', 'correct-password')).toEqual({
        userId: 'user-1',
        verified: true,
        rehashed: false,
      });
    });

    it('rejects a wrong password', async () => {
      await authenticator.register('user-1', 'correct-password');
      const result = await authenticator.authenticate('user-1', 'wrong-password');
      expect(result.verified).toBe(false);
    });

    it('rejects an unknown user without logging', async () => {
      const result = await authenticator.authenticate('nobody', 'pw');
      expect(result).toEqual({ userId: 'nobody', verified: false, rehashed: false });
      expect(console.error).not.toHaveBeenCalled();
    });

    it('logs and rejects an unreadable stored hash', async () => {
      await userStore.save({ userId: 'user-1', passwordHash: LEGACY_HASH + '??', updatedAt: '' });
      const result = await authenticator.authenticate('user-1', LEGACY_PASSWORD);

      expect(result.verified).toBe(false);
      expect(console.error).toHaveBeenCalledWith(
        '[idhash] Unreadable stored hash:',
        'user-1',
        expect.objectContaining({ code: 'CORRUPT' }),
      );
    });

    it('upgrades a legacy hash to the configured iteration count', async () => {
      await authenticator.importHash('user-1', LEGACY_HASH);

      const result = await authenticator.authenticate('user-1', LEGACY_PASSWORD);
      expect(result).toEqual({ userId: 'user-1', verified: true, rehashed: true });

      const stored = await userStore.get('user-1');
      expect(stored?.passwordHash).not.toBe(LEGACY_HASH);
      expect(decodeText(stored?.passwordHash ?? '').iterations).toBe(100);
      expect((await authenticator.authenticate('user-1', LEGACY_PASSWORD)).rehashed).toBe(false);
    });

    it('leaves legacy hashes alone when upgrades are off', async () => {
      const keep = new PasswordAuthenticator({ userStore, iterations: 100, upgradeHashes: false });
      await keep.importHash('user-1', LEGACY_HASH);

      expect(await keep.authenticate('user-1', LEGACY_PASSWORD)).toEqual({
        userId: 'user-1',
        verified: true,
        rehashed: false,
      });
      expect((await userStore.get('user-1'))?.passwordHash).toBe(LEGACY_HASH);
    });
  });

  describe('changePassword', () => {
    it('replaces the hash after verifying the current password', async () => {
      await authenticator.register('user-1', 'old-password');
      expect(await authenticator.changePassword('user-1', 'old-password', 'new-password')).toBe(true);

      expect((await authenticator.authenticate('user-1', 'new-password')).verified).toBe(true);
      expect((await authenticator.authenticate('user-1', 'old-password')).verified).toBe(false);
    });

    it('returns false and keeps the hash for a wrong current password', async () => {
      const { passwordHash } = await authenticator.register('user-1', 'old-password');
      expect(await authenticator.changePassword('user-1', 'wrong', 'new-password')).toBe(false);
      expect((await userStore.get('user-1'))?.passwordHash).toBe(passwordHash);
    });

    it('returns false for an unknown user', async () => {
      expect(await authenticator.changePassword('nobody', 'a', 'b')).toBe(false);
    });
  });

  describe('importHash', () => {
    it('stores a legacy value that decodes', async () => {
      await authenticator.importHash('user-1', LEGACY_HASH);
      expect((await userStore.get('user-1'))?.passwordHash).toBe(LEGACY_HASH);
    });

    it('refuses to replace an existing user', async () => {
      await authenticator.register('admin', 'admin-secret');
      await expect(authenticator.importHash('admin', LEGACY_HASH)).rejects.toBeInstanceOf(UserExistsError);

      expect((await authenticator.authenticate('admin', 'admin-secret')).verified).toBe(true);
      expect((await authenticator.authenticate('admin', LEGACY_PASSWORD)).verified).toBe(false);
    });

    it('rejects a malformed value with its HashError', async () => {
      await expect(authenticator.importHash('user-1', 'AQ==')).rejects.toMatchObject({ code: 'CORRUPT' });
      expect(await userStore.get('user-1')).toBeNull();
    });
  });

  describe('remove', () => {
    it('deletes the user', async () => {
      await authenticator.register('user-1', 'pw');
      await authenticator.remove('user-1');
      expect((await authenticator.authenticate('user-1', 'pw')).verified).toBe(false);
    });
  });
});
