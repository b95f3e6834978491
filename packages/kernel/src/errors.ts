/**
 * reqsafe error taxonomy
 *
 * Every failure the token service or the idempotency guard reports is a
 * SafetyError subclass. Use `err.code` to branch without parsing messages;
 * `err.httpStatus` is what the Express host answers with.
 */

import type { ConfigIssue } from './types.js';

export const ERROR_CODES = {
  E_ENCODE: 'E_ENCODE',
  E_DECODE: 'E_DECODE',
  E_MALFORMED_TOKEN: 'E_MALFORMED_TOKEN',
  E_INVALID_SIGNATURE: 'E_INVALID_SIGNATURE',
  E_TOKEN_EXPIRED: 'E_TOKEN_EXPIRED',
  E_IDEMPOTENCY_CONFLICT: 'E_IDEMPOTENCY_CONFLICT',
  E_IDEMPOTENCY_IN_PROGRESS: 'E_IDEMPOTENCY_IN_PROGRESS',
  E_IDEMPOTENCY_REPLAYED_FAILURE: 'E_IDEMPOTENCY_REPLAYED_FAILURE',
  E_MISSING_IDEMPOTENCY_KEY: 'E_MISSING_IDEMPOTENCY_KEY',
  E_STORE_UNAVAILABLE: 'E_STORE_UNAVAILABLE',
  E_CONFIG: 'E_CONFIG',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export type DecodeErrorCode =
  | typeof ERROR_CODES.E_DECODE
  | typeof ERROR_CODES.E_MALFORMED_TOKEN
  | typeof ERROR_CODES.E_INVALID_SIGNATURE
  | typeof ERROR_CODES.E_TOKEN_EXPIRED;

/**
 * HTTP status codes for each error
 */
export const ERROR_HTTP_STATUS: Record<ErrorCode, number> = {
  [ERROR_CODES.E_ENCODE]: 500,
  [ERROR_CODES.E_DECODE]: 401,
  [ERROR_CODES.E_MALFORMED_TOKEN]: 401,
  [ERROR_CODES.E_INVALID_SIGNATURE]: 401,
  [ERROR_CODES.E_TOKEN_EXPIRED]: 401,
  [ERROR_CODES.E_IDEMPOTENCY_CONFLICT]: 409,
  [ERROR_CODES.E_IDEMPOTENCY_IN_PROGRESS]: 409,
  [ERROR_CODES.E_IDEMPOTENCY_REPLAYED_FAILURE]: 422,
  [ERROR_CODES.E_MISSING_IDEMPOTENCY_KEY]: 400,
  [ERROR_CODES.E_STORE_UNAVAILABLE]: 503,
  [ERROR_CODES.E_CONFIG]: 500,
};

export class SafetyError extends Error {
  readonly code: ErrorCode;
  readonly httpStatus: number;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SafetyError';
    this.code = code;
    this.httpStatus = ERROR_HTTP_STATUS[code];
  }
}

export function isSafetyError(error: unknown): error is SafetyError {
  return error instanceof SafetyError;
}

// -----------------------------------------------------------------------------
// Token errors
// -----------------------------------------------------------------------------

/**
 * Claims could not be serialized or the configured key cannot sign
 */
export class EncodeError extends SafetyError {
  constructor(message: string, options?: ErrorOptions) {
    super(ERROR_CODES.E_ENCODE, message, options);
    this.name = 'EncodeError';
  }
}

/**
 * Base of every decode failure. Thrown as-is when no subtype applies
 * (unusable verification key, claims failing a payload schema, `nbf` in the future).
 */
export class DecodeError extends SafetyError {
  declare readonly code: DecodeErrorCode;

  constructor(message: string, options?: ErrorOptions, code: DecodeErrorCode = ERROR_CODES.E_DECODE) {
    super(code, message, options);
    this.name = 'DecodeError';
  }
}

export class MalformedTokenError extends DecodeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options, ERROR_CODES.E_MALFORMED_TOKEN);
    this.name = 'MalformedTokenError';
  }
}

export class InvalidSignatureError extends DecodeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options, ERROR_CODES.E_INVALID_SIGNATURE);
    this.name = 'InvalidSignatureError';
  }
}

export class ExpiredError extends DecodeError {
  /** `exp` claim of the rejected token, in seconds */
  readonly expiredAt: number;

  constructor(expiredAt: number, options?: ErrorOptions) {
    super(`Token expired at ${new Date(expiredAt * 1000).toISOString()}`, options, ERROR_CODES.E_TOKEN_EXPIRED);
    this.name = 'ExpiredError';
    this.expiredAt = expiredAt;
  }
}

export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError;
}

// -----------------------------------------------------------------------------
// Idempotency errors
// -----------------------------------------------------------------------------

/**
 * Failure detail persisted with a `failed` idempotency record
 */
export interface StoredFailure {
  name: string;
  message: string;
  code?: string;
}

/**
 * A duplicate waited past its timeout, or the record kept vanishing under it
 */
export class IdempotencyConflictError extends SafetyError {
  readonly scope: string;
  readonly key: string;

  constructor(scope: string, key: string, message: string) {
    super(ERROR_CODES.E_IDEMPOTENCY_CONFLICT, message);
    this.name = 'IdempotencyConflictError';
    this.scope = scope;
    this.key = key;
  }
}

/**
 * A duplicate arrived while the owner was still running (reject policy)
 */
export class IdempotencyInProgressError extends SafetyError {
  readonly scope: string;
  readonly key: string;

  constructor(scope: string, key: string) {
    super(ERROR_CODES.E_IDEMPOTENCY_IN_PROGRESS, `Request with idempotency key "${key}" is already in progress`);
    this.name = 'IdempotencyInProgressError';
    this.scope = scope;
    this.key = key;
  }
}

/**
 * The owning execution failed; duplicates observe that failure until the record expires
 */
export class IdempotencyReplayedFailureError extends SafetyError {
  readonly failure: StoredFailure;

  constructor(key: string, failure: StoredFailure) {
    super(
      ERROR_CODES.E_IDEMPOTENCY_REPLAYED_FAILURE,
      `Request with idempotency key "${key}" previously failed: ${failure.name}: ${failure.message}`
    );
    this.name = 'IdempotencyReplayedFailureError';
    this.failure = failure;
  }
}

export class MissingIdempotencyKeyError extends SafetyError {
  readonly scope: string;

  constructor(scope: string, message = `Idempotency key is required for "${scope}"`) {
    super(ERROR_CODES.E_MISSING_IDEMPOTENCY_KEY, message);
    this.name = 'MissingIdempotencyKeyError';
    this.scope = scope;
  }
}

/**
 * The key-value store failed. Never retried by the guard.
 */
export class StoreUnavailableError extends SafetyError {
  constructor(message: string, options?: ErrorOptions) {
    super(ERROR_CODES.E_STORE_UNAVAILABLE, message, options);
    this.name = 'StoreUnavailableError';
  }
}

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export class ConfigError extends SafetyError {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    const message = issues.map((i) => `${i.field}: ${i.message}`).join('; ');
    super(ERROR_CODES.E_CONFIG, `Invalid configuration: ${message}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Reduce any thrown value to the shape persisted with a failed record
 */
export function toStoredFailure(error: unknown): StoredFailure {
  if (error instanceof SafetyError) {
    return { name: error.name, message: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}
