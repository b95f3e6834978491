/**
 * @reqsafe/idempotency
 * At-most-once execution of keyed operations over a shared key-value store
 *
 * @example
 * ```typescript
 * import { IdempotencyGuard, MemoryKeyValueStore } from '@reqsafe/idempotency';
 *
 * const guard = new IdempotencyGuard(new MemoryKeyValueStore());
 * const charge = await guard.run('charge', 'abc', undefined, () => payments.create(order));
 * ```
 *
 * @packageDocumentation
 */

export type { KeyValueStore } from './store.js';
export { MemoryKeyValueStore } from './memory-store.js';
export type { MemoryStoreOptions } from './memory-store.js';
export { RedisKeyValueStore, COMPARE_AND_SET_SCRIPT, createKeyValueStore } from './redis-store.js';
export type { RedisCommandClient } from './redis-store.js';
export { parseRecord, serializeRecord, encodeResult, decodeResult } from './record.js';
export type { IdempotencyRecord, RecordStatus } from './record.js';
export { IdempotencyGuard, IDEMPOTENCY_DEFAULTS, applyDefaults, storeKeyFor } from './guard.js';
export type { IdempotencyGuardOptions, IdempotencySettings, RunOptions, Operation } from './guard.js';
