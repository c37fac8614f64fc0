/**
 * Built-in user store implementations.
 *
 * For production with multiple server instances, implement the UserStore
 * interface against the shared user table instead.
 */

import { readFile, writeFile } from 'fs/promises';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import type { UserRecord, UserStore } from './types.js';

// ============================================================
// Async Mutex — serializes read-modify-write file operations
// ============================================================

/** Queues the file store's load → mutate → persist sequences one after another. */
class AsyncMutex {
  private queue: Array<() => void> = [];
  private locked = false;

  acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Hand the lock directly to the next waiter (stays locked)
      next();
    } else {
      this.locked = false;
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

// ============================================================
// In-Memory Store (good for development and tests)
// ============================================================

export class MemoryUserStore implements UserStore {
  private users = new Map<string, UserRecord>();

  async get(userId: string): Promise<UserRecord | null> {
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  async save(user: UserRecord): Promise<void> {
    this.users.set(user.userId, { ...user });
  }

  async create(user: UserRecord): Promise<boolean> {
    if (this.users.has(user.userId)) return false;
    this.users.set(user.userId, { ...user });
    return true;
  }

  async delete(userId: string): Promise<void> {
    this.users.delete(userId);
  }

  async list(): Promise<UserRecord[]> {
    return Array.from(this.users.values(), u => ({ ...u }));
  }
}

// ============================================================
// File-Based Store (good for single-server, persistent)
// ============================================================

const userRecordSchema = z.object({
  userId: z.string().min(1),
  passwordHash: z.string(),
  updatedAt: z.string(),
});

const userFileSchema = z.record(z.string(), userRecordSchema);

type UserFile = z.infer<typeof userFileSchema>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * File-based user store. Users are stored in a JSON object keyed by user ID.
 *
 * Uses an internal async mutex to serialize concurrent read-modify-write
 * operations within the same process. Not suitable for multi-process servers.
 */
export class FileUserStore implements UserStore {
  private filePath: string;
  private mutex = new AsyncMutex();

  constructor(filePath: string) {
    this.filePath = filePath;
    const dir = dirname(filePath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  }

  private async load(): Promise<UserFile> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      // File not yet created — valid initial state
      if (isMissingFile(err)) return {};
      // Anything else (permission denied, etc.) must surface
      throw err;
    }
    const parsed = userFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`idhash: invalid user file ${this.filePath}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async persist(data: UserFile): Promise<void> {
    await writeFile(this.filePath, JSON.stringify(data, null, 2));
  }

  async get(userId: string): Promise<UserRecord | null> {
    return this.mutex.run(async () => (await this.load())[userId] ?? null);
  }

  async save(user: UserRecord): Promise<void> {
    await this.mutex.run(async () => {
      const data = await this.load();
      data[user.userId] = { ...user };
      await this.persist(data);
    });
  }

  async create(user: UserRecord): Promise<boolean> {
    return this.mutex.run(async () => {
      const data = await this.load();
      if (user.userId in data) return false;
      data[user.userId] = { ...user };
      await this.persist(data);
      return true;
    });
  }

  async delete(userId: string): Promise<void> {
    await this.mutex.run(async () => {
      const data = await this.load();
      if (!(userId in data)) return;
      delete data[userId];
      await this.persist(data);
    });
  }

  async list(): Promise<UserRecord[]> {
    return this.mutex.run(async () => Object.values(await this.load()));
  }
}
