/**
 * Key-value store contract the guard relies on
 *
 * `createIfAbsent` and `compareAndSet` must be atomic with respect to every
 * other caller of the same store, across processes where the store is shared.
 */
export interface KeyValueStore {
  /** Write `value` only if `key` holds nothing live. Resolves true when written. */
  createIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  get(key: string): Promise<string | undefined>;
  /** Replace the value only if it still equals `expected`, resetting the TTL */
  compareAndSet(key: string, expected: string, next: string, ttlMs: number): Promise<boolean>;
  delete(key: string): Promise<void>;
}
