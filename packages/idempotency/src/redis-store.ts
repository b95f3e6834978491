/**
 * Redis-backed store
 *
 * Claims use `SET key value PX ttl NX`; compare-and-set runs as a Lua script
 * so the read and the write happen in one server-side step.
 */

import { Redis } from 'ioredis';
import { StoreUnavailableError, createLogger, type Logger, type StoreConfig } from '@reqsafe/kernel';
import { MemoryKeyValueStore } from './memory-store.js';
import type { KeyValueStore } from './store.js';

/**
 * The ioredis commands the store issues. `Redis` satisfies it.
 */
export interface RedisCommandClient {
  set(key: string, value: string, millisecondsToken: 'PX', milliseconds: number, nx: 'NX'): Promise<'OK' | null>;
  get(key: string): Promise<string | null>;
  del(key: string): Promise<number>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
  disconnect(): void;
}

export const COMPARE_AND_SET_SCRIPT =
  "if redis.call('GET', KEYS[1]) == ARGV[1] then " +
  "redis.call('SET', KEYS[1], ARGV[2], 'PX', ARGV[3]) return 1 end return 0";

export class RedisKeyValueStore implements KeyValueStore {
  constructor(private readonly client: RedisCommandClient) {}

  async createIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    const reply = await this.command('SET NX', () => this.client.set(key, value, 'PX', ttlMs, 'NX'));
    return reply === 'OK';
  }

  async get(key: string): Promise<string | undefined> {
    const value = await this.command('GET', () => this.client.get(key));
    return value ?? undefined;
  }

  async compareAndSet(key: string, expected: string, next: string, ttlMs: number): Promise<boolean> {
    const reply = await this.command('EVAL', () =>
      this.client.eval(COMPARE_AND_SET_SCRIPT, 1, key, expected, next, String(ttlMs))
    );
    return reply === 1;
  }

  async delete(key: string): Promise<void> {
    await this.command('DEL', () => this.client.del(key));
  }

  close(): void {
    this.client.disconnect();
  }

  private async command<T>(name: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      throw new StoreUnavailableError(`Redis ${name} failed`, { cause: error });
    }
  }
}

/**
 * Build the store named by configuration
 */
export function createKeyValueStore(
  config: StoreConfig,
  logger: Logger = createLogger('reqsafe-store')
): KeyValueStore {
  switch (config.backend) {
    case 'redis': {
      const client = new Redis(config.redisUrl, {
        maxRetriesPerRequest: 1,
        lazyConnect: true,
        enableReadyCheck: true,
      });
      logger.info({ backend: 'redis' }, 'Store backend configured');
      return new RedisKeyValueStore(client);
    }
    case 'memory':
    default:
      logger.info({ backend: 'memory' }, 'Store backend configured');
      return new MemoryKeyValueStore();
  }
}
