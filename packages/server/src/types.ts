/**
 * Type definitions for @idhash/server
 *
 * These types define the user-store abstraction. Apps provide their own
 * UserStore implementation so the library works with any backend
 * (the framework's own user table, file JSON, SQLite, Redis, etc).
 */

import type { RandomSource } from '@idhash/core';

/** Configuration for PasswordAuthenticator */
export interface PasswordAuthenticatorConfig {
  /** User store implementation */
  userStore: UserStore;
  /** PBKDF2 iteration count for new and upgraded hashes (default: 10000, max: 100000) */
  iterations?: number;
  /**
   * Re-hash on successful login when the stored iteration count differs
   * from `iterations` (default: true).
   */
  upgradeHashes?: boolean;
  /** Secure random source for salts (default: platform CSPRNG) */
  random?: RandomSource;
}

/** A stored user row, as far as password authentication is concerned */
export interface UserRecord {
  /** User ID (e.g. the normalised user name or e-mail) */
  userId: string;
  /** Base64 password hash in the version 1 identity format */
  passwordHash: string;
  /** ISO timestamp of the last hash write */
  updatedAt: string;
}

/** Result of registering a user */
export interface RegistrationResult {
  userId: string;
  passwordHash: string;
}

/** Result of an authentication attempt */
export interface AuthenticationResult {
  userId: string;
  verified: boolean;
  /** True when the stored hash was upgraded to the current parameters */
  rehashed: boolean;
}

/**
 * User store abstraction — apps implement this for their storage backend.
 */
export interface UserStore {
  /** Get a user by ID. Returns null if missing. */
  get(userId: string): Promise<UserRecord | null>;
  /** Insert or replace a user */
  save(user: UserRecord): Promise<void>;
  /**
   * Insert a user only if the ID is free, as one atomic step.
   * Returns false (and writes nothing) if the user already exists.
   */
  create(user: UserRecord): Promise<boolean>;
  /** Delete a user (no-op if missing) */
  delete(userId: string): Promise<void>;
  /** All stored users */
  list(): Promise<UserRecord[]>;
}
