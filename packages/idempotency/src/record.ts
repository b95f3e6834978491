/**
 * Idempotency record codec
 *
 * Records are JSON strings so that compare-and-set can compare them byte for byte.
 */

import { z } from 'zod';
import { EncodeError, StoreUnavailableError, type StoredFailure } from '@reqsafe/kernel';

interface RecordBase {
  /** Random id of the execution that claimed the key */
  owner: string;
  /** Epoch ms of the claim */
  createdAt: number;
}

export type IdempotencyRecord =
  | (RecordBase & { status: 'in_progress' })
  | (RecordBase & { status: 'completed'; result: string })
  | (RecordBase & { status: 'failed'; error: StoredFailure });

export type RecordStatus = IdempotencyRecord['status'];

const base = { owner: z.string().min(1), createdAt: z.number() };

const recordSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('in_progress'), ...base }),
  z.object({ status: z.literal('completed'), result: z.string(), ...base }),
  z.object({
    status: z.literal('failed'),
    error: z.object({ name: z.string(), message: z.string(), code: z.string().optional() }),
    ...base,
  }),
]);

export function serializeRecord(record: IdempotencyRecord): string {
  return JSON.stringify(record);
}

/**
 * @throws StoreUnavailableError when the stored value is not a record
 */
export function parseRecord(raw: string): IdempotencyRecord {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new StoreUnavailableError('Stored idempotency record is not JSON', { cause: error });
  }
  const parsed = recordSchema.safeParse(json);
  if (!parsed.success) {
    throw new StoreUnavailableError('Stored idempotency record is malformed', { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Serialize an operation result. Wrapped in `{ value }` so `undefined` survives.
 *
 * @throws EncodeError for values JSON cannot hold (bigint, cycles)
 */
export function encodeResult(value: unknown): string {
  try {
    return JSON.stringify({ value });
  } catch (error) {
    throw new EncodeError('Operation result is not JSON-serializable', { cause: error });
  }
}

export function decodeResult<T>(raw: string): T {
  const stored = JSON.parse(raw) as { value: T };
  return stored.value;
}
