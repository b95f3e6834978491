/**
 * Idempotency guard
 *
 * Runs an operation at most once per (scope, key) while its record lives.
 * The first caller claims the key and executes; duplicates replay the
 * recorded outcome, wait for it, or are turned away, depending on policy.
 */

import { randomUUID } from 'node:crypto';
import { setTimeout as delay } from 'node:timers/promises';
import {
  IdempotencyConflictError,
  IdempotencyInProgressError,
  IdempotencyReplayedFailureError,
  LIMITS,
  MissingIdempotencyKeyError,
  StoreUnavailableError,
  createLogger,
  toStoredFailure,
  type ConflictPolicy,
  type IdempotencyConfig,
  type Logger,
  type MissingKeyPolicy,
} from '@reqsafe/kernel';
import { decodeResult, encodeResult, parseRecord, serializeRecord, type IdempotencyRecord } from './record.js';
import type { KeyValueStore } from './store.js';

export interface IdempotencyGuardOptions {
  /** TTL of in-progress and completed records, in ms */
  ttlMs?: number;
  /** TTL of failed records, in ms. The key can be retried once it lapses. */
  failureTtlMs?: number;
  conflictPolicy?: ConflictPolicy;
  /** How long a blocked duplicate waits for the owner, in ms */
  waitTimeoutMs?: number;
  pollIntervalMs?: number;
  missingKeyPolicy?: MissingKeyPolicy;
  /** Namespace of store keys */
  keyPrefix?: string;
  logger?: Logger;
}

export type IdempotencySettings = Required<Omit<IdempotencyGuardOptions, 'logger'>>;

export const IDEMPOTENCY_DEFAULTS: Readonly<IdempotencySettings> = {
  ttlMs: 300_000,
  failureTtlMs: 30_000,
  conflictPolicy: 'block',
  waitTimeoutMs: 5_000,
  pollIntervalMs: 50,
  missingKeyPolicy: 'ignore',
  keyPrefix: 'idem',
};

export interface RunOptions {
  /** Aborts this caller's wait for another owner. Never affects the owner. */
  signal?: AbortSignal;
}

export type Operation<T> = () => Promise<T> | T;

type Observed<T> = { settled: true; value: T } | { settled: false };

export function applyDefaults(options: IdempotencyGuardOptions): IdempotencySettings {
  return {
    ttlMs: options.ttlMs ?? IDEMPOTENCY_DEFAULTS.ttlMs,
    failureTtlMs: options.failureTtlMs ?? IDEMPOTENCY_DEFAULTS.failureTtlMs,
    conflictPolicy: options.conflictPolicy ?? IDEMPOTENCY_DEFAULTS.conflictPolicy,
    waitTimeoutMs: options.waitTimeoutMs ?? IDEMPOTENCY_DEFAULTS.waitTimeoutMs,
    pollIntervalMs: options.pollIntervalMs ?? IDEMPOTENCY_DEFAULTS.pollIntervalMs,
    missingKeyPolicy: options.missingKeyPolicy ?? IDEMPOTENCY_DEFAULTS.missingKeyPolicy,
    keyPrefix: options.keyPrefix ?? IDEMPOTENCY_DEFAULTS.keyPrefix,
  };
}

/**
 * Store key for a scope and caller key. Both parts are URI-encoded so a `:`
 * inside either cannot make two pairs collide.
 */
export function storeKeyFor(prefix: string, scope: string, key: string): string {
  return `${prefix}:${encodeURIComponent(scope)}:${encodeURIComponent(key)}`;
}

function describeFailure(error: unknown): string {
  const failure = toStoredFailure(error);
  return `${failure.name}: ${failure.message}`;
}

export class IdempotencyGuard {
  private readonly settings: IdempotencySettings;
  private readonly logger: Logger;

  constructor(
    private readonly store: KeyValueStore,
    options: IdempotencyGuardOptions = {}
  ) {
    this.settings = applyDefaults(options);
    this.logger = options.logger ?? createLogger('reqsafe-idempotency');
    this.logger.info(
      {
        conflictPolicy: this.settings.conflictPolicy,
        missingKeyPolicy: this.settings.missingKeyPolicy,
        ttlMs: this.settings.ttlMs,
        waitTimeoutMs: this.settings.waitTimeoutMs,
      },
      'Idempotency guard configured'
    );
  }

  static fromConfig(store: KeyValueStore, config: IdempotencyConfig, logger?: Logger): IdempotencyGuard {
    return new IdempotencyGuard(store, { ...config, logger });
  }

  get options(): Readonly<IdempotencySettings> {
    return { ...this.settings };
  }

  /**
   * Execute `operation` once for this scope and key
   *
   * @param scope - Namespace of the key, e.g. an operation name or route
   * @param key - Caller-supplied idempotency key; empty means none
   * @param ttlMs - Record TTL for this call; `undefined` keeps the configured one
   * @returns The owner's result, or the recorded result for duplicates
   * @throws MissingIdempotencyKeyError, IdempotencyInProgressError,
   *   IdempotencyConflictError, IdempotencyReplayedFailureError, StoreUnavailableError,
   *   or whatever `operation` throws when this call owns the key
   */
  async run<T>(
    scope: string,
    key: string | null | undefined,
    ttlMs: number | undefined,
    operation: Operation<T>,
    options: RunOptions = {}
  ): Promise<T> {
    if (key === undefined || key === null || key === '') {
      if (this.settings.missingKeyPolicy === 'reject') {
        throw new MissingIdempotencyKeyError(scope);
      }
      this.logger.debug({ scope }, 'No idempotency key, running unguarded');
      return operation();
    }
    if (key.length > LIMITS.maxIdempotencyKeyLength) {
      throw new MissingIdempotencyKeyError(
        scope,
        `Idempotency key for "${scope}" is longer than ${LIMITS.maxIdempotencyKeyLength} characters`
      );
    }

    const ttl = ttlMs ?? this.settings.ttlMs;
    const storeKey = storeKeyFor(this.settings.keyPrefix, scope, key);

    for (let attempt = 1; attempt <= LIMITS.maxClaimAttempts; attempt++) {
      const claim: IdempotencyRecord = { status: 'in_progress', owner: randomUUID(), createdAt: Date.now() };
      const claimed = serializeRecord(claim);

      if (await this.call('createIfAbsent', () => this.store.createIfAbsent(storeKey, claimed, ttl))) {
        this.logger.debug({ scope, key, owner: claim.owner }, 'Idempotency key claimed');
        return this.execute(scope, key, storeKey, claim, claimed, ttl, operation);
      }

      const observed = await this.observe<T>(scope, key, storeKey, options.signal);
      if (observed.settled) {
        return observed.value;
      }
      this.logger.debug({ scope, key, attempt }, 'Idempotency record vanished, claiming again');
    }

    throw new IdempotencyConflictError(
      scope,
      key,
      `Idempotency record for key "${key}" disappeared ${LIMITS.maxClaimAttempts} times`
    );
  }

  private async execute<T>(
    scope: string,
    key: string,
    storeKey: string,
    claim: IdempotencyRecord,
    claimed: string,
    ttl: number,
    operation: Operation<T>
  ): Promise<T> {
    let result: string;
    try {
      result = encodeResult(await operation());
    } catch (error) {
      await this.recordFailure(scope, key, storeKey, claim, claimed, error);
      throw error;
    }

    const completed = serializeRecord({ owner: claim.owner, createdAt: claim.createdAt, status: 'completed', result });
    await this.transition(scope, key, storeKey, claimed, completed, ttl);
    // Owner sees the same decoded value as every replay
    return decodeResult<T>(result);
  }

  private async recordFailure(
    scope: string,
    key: string,
    storeKey: string,
    claim: IdempotencyRecord,
    claimed: string,
    error: unknown
  ): Promise<void> {
    const failed = serializeRecord({
      owner: claim.owner,
      createdAt: claim.createdAt,
      status: 'failed',
      error: toStoredFailure(error),
    });
    try {
      await this.transition(scope, key, storeKey, claimed, failed, this.settings.failureTtlMs);
    } catch (storeError) {
      throw new StoreUnavailableError(
        `Could not record the failure of idempotency key "${key}" (${describeFailure(error)})`,
        { cause: storeError }
      );
    }
  }

  private async transition(
    scope: string,
    key: string,
    storeKey: string,
    claimed: string,
    next: string,
    ttl: number
  ): Promise<void> {
    const swapped = await this.call('compareAndSet', () => this.store.compareAndSet(storeKey, claimed, next, ttl));
    if (!swapped) {
      this.logger.warn({ scope, key }, 'Idempotency record changed under its owner, outcome not recorded');
    }
  }

  /**
   * Follow a record some other execution owns until it settles
   */
  private async observe<T>(
    scope: string,
    key: string,
    storeKey: string,
    signal: AbortSignal | undefined
  ): Promise<Observed<T>> {
    const deadline = Date.now() + this.settings.waitTimeoutMs;

    for (;;) {
      const raw = await this.call('get', () => this.store.get(storeKey));
      if (raw === undefined) {
        return { settled: false };
      }

      const record = parseRecord(raw);
      switch (record.status) {
        case 'completed':
          this.logger.debug({ scope, key }, 'Replaying recorded result');
          return { settled: true, value: decodeResult<T>(record.result) };
        case 'failed':
          this.logger.debug({ scope, key }, 'Replaying recorded failure');
          throw new IdempotencyReplayedFailureError(key, record.error);
        case 'in_progress': {
          if (this.settings.conflictPolicy === 'reject') {
            throw new IdempotencyInProgressError(scope, key);
          }
          const remaining = deadline - Date.now();
          if (remaining <= 0) {
            this.logger.debug({ scope, key }, 'Gave up waiting for idempotency owner');
            throw new IdempotencyConflictError(
              scope,
              key,
              `Request with idempotency key "${key}" still in progress after ${this.settings.waitTimeoutMs}ms`
            );
          }
          signal?.throwIfAborted();
          await delay(Math.min(this.settings.pollIntervalMs, remaining), undefined, { signal });
        }
      }
    }
  }

  private async call<R>(operation: string, run: () => Promise<R>): Promise<R> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      throw new StoreUnavailableError(`Idempotency store ${operation} failed`, { cause: error });
    }
  }
}
