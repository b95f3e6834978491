import type { KeyValueStore } from './store.js';

interface Entry {
  value: string;
  expiresAt: number;
}

export interface MemoryStoreOptions {
  /** Clock in epoch ms (default: Date.now) */
  now?: () => number;
}

/**
 * Single-process store. Expired entries are dropped when next touched.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly entries: Map<string, Entry> = new Map();
  private readonly now: () => number;

  constructor(options: MemoryStoreOptions = {}) {
    this.now = options.now ?? (() => Date.now());
  }

  async createIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.live(key)) return false;
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
    return true;
  }

  async get(key: string): Promise<string | undefined> {
    return this.live(key)?.value;
  }

  async compareAndSet(key: string, expected: string, next: string, ttlMs: number): Promise<boolean> {
    const entry = this.live(key);
    if (!entry || entry.value !== expected) return false;
    this.entries.set(key, { value: next, expiresAt: this.now() + ttlMs });
    return true;
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  /** Number of live entries */
  get size(): number {
    let count = 0;
    for (const key of [...this.entries.keys()]) {
      if (this.live(key)) count++;
    }
    return count;
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
