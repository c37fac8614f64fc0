/**
 * PasswordAuthenticator — server-side password login against legacy hashes.
 *
 * @ai_context Stored values are the framework's base64 version 1 hashes and
 * stay readable by it: new and upgraded hashes are written in the same
 * format. Every authentication path (unknown user, unreadable hash, wrong
 * password) costs about one key derivation and returns `verified: false`,
 * so callers can't tell them apart from the outside. Unreadable hashes are
 * logged for operators.
 *
 * Flow:
 *   register → authenticate (→ upgrade hash if parameters changed)
 *   changePassword re-verifies the current password first.
 */

import {
  DEFAULT_ITERATIONS,
  assertIterations,
  decodeText,
  hashPassword,
  needsRehash,
  secureRandomSource,
  verifyEncodedHashAsync,
} from '@idhash/core';
import type { RandomSource } from '@idhash/core';

import type {
  PasswordAuthenticatorConfig,
  UserStore,
  AuthenticationResult,
  RegistrationResult,
} from './types.js';

/** Placeholder compared against when the user does not exist */
const MISSING_USER_HASH = '';

export class UserExistsError extends Error {
  readonly userId: string;

  constructor(userId: string) {
    super(`User already exists: ${userId}`);
    this.name = 'UserExistsError';
    this.userId = userId;
  }
}

export class PasswordAuthenticator {
  private userStore: UserStore;
  private iterations: number;
  private upgradeHashes: boolean;
  private random: RandomSource;

  constructor(config: PasswordAuthenticatorConfig) {
    this.userStore = config.userStore;
    this.iterations = config.iterations ?? DEFAULT_ITERATIONS;
    this.upgradeHashes = config.upgradeHashes ?? true;
    this.random = config.random ?? secureRandomSource;

    try {
      assertIterations(this.iterations);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`idhash: invalid \`iterations\` option: ${reason}`, { cause: error });
    }
  }

  /**
   * Create a user with a freshly hashed password.
   * Throws UserExistsError if the user already exists.
   */
  async register(userId: string, password: string): Promise<RegistrationResult> {
    if (await this.userStore.get(userId)) {
      throw new UserExistsError(userId);
    }
    const passwordHash = await this.hash(password);
    // A concurrent registration may have claimed the ID while hashing
    const created = await this.userStore.create({ userId, passwordHash, updatedAt: new Date().toISOString() });
    if (!created) {
      throw new UserExistsError(userId);
    }
    return { userId, passwordHash };
  }

  /**
   * Check a password. On success, upgrades the stored hash when its
   * iteration count differs from the configured one.
   */
  async authenticate(userId: string, password: string): Promise<AuthenticationResult> {
    const user = await this.userStore.get(userId);
    const storedHash = user?.passwordHash ?? MISSING_USER_HASH;

    const { verified, error } = await verifyEncodedHashAsync(storedHash, password);
    if (error && user) {
      console.error('[idhash] Unreadable stored hash:', userId, error);
    }
    if (!user || !verified) {
      return { userId, verified: false, rehashed: false };
    }

    let rehashed = false;
    if (this.upgradeHashes && needsRehash(storedHash, { iterations: this.iterations })) {
      await this.userStore.save({
        ...user,
        passwordHash: await this.hash(password),
        updatedAt: new Date().toISOString(),
      });
      rehashed = true;
    }
    return { userId, verified: true, rehashed };
  }

  /**
   * Replace the password after verifying the current one.
   * Returns false (and changes nothing) if the current password is wrong.
   */
  async changePassword(userId: string, currentPassword: string, newPassword: string): Promise<boolean> {
    const { verified } = await this.authenticate(userId, currentPassword);
    if (!verified) return false;

    const user = await this.userStore.get(userId);
    if (!user) return false;

    await this.userStore.save({
      ...user,
      passwordHash: await this.hash(newPassword),
      updatedAt: new Date().toISOString(),
    });
    return true;
  }

  /**
   * Store a hash exported from the framework's user table for a new user.
   * The value must decode; it is stored in canonical form.
   * Throws HashError for malformed values and UserExistsError if the ID is
   * taken (an import never replaces an existing password).
   */
  async importHash(userId: string, passwordHash: string): Promise<void> {
    const record = decodeText(passwordHash);
    const created = await this.userStore.create({
      userId,
      passwordHash: record.toText(),
      updatedAt: new Date().toISOString(),
    });
    if (!created) {
      throw new UserExistsError(userId);
    }
  }

  async remove(userId: string): Promise<void> {
    await this.userStore.delete(userId);
  }

  private hash(password: string): Promise<string> {
    return hashPassword(password, { iterations: this.iterations, random: this.random });
  }
}
