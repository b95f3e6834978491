/**
 * @reqsafe/kernel
 * Error taxonomy, results, configuration and logging shared by every package
 *
 * @packageDocumentation
 */

export type { JsonPrimitive, JsonValue, JsonArray, JsonObject, ConfigIssue } from './types.js';

export {
  TOKEN_ALGORITHMS,
  HMAC_ALGORITHMS,
  HEADERS,
  LIMITS,
  SECONDS_PER_MINUTE,
  isHmacAlgorithm,
} from './constants.js';
export type { TokenAlgorithm, HmacAlgorithm } from './constants.js';

export {
  ERROR_CODES,
  ERROR_HTTP_STATUS,
  SafetyError,
  EncodeError,
  DecodeError,
  MalformedTokenError,
  InvalidSignatureError,
  ExpiredError,
  IdempotencyConflictError,
  IdempotencyInProgressError,
  IdempotencyReplayedFailureError,
  MissingIdempotencyKeyError,
  StoreUnavailableError,
  ConfigError,
  isSafetyError,
  isDecodeError,
  toStoredFailure,
} from './errors.js';
export type { ErrorCode, DecodeErrorCode, StoredFailure } from './errors.js';

export { ok, err, settle } from './result.js';
export type { Result } from './result.js';

export { loadConfig } from './config.js';
export type {
  AppConfig,
  TokensConfig,
  IdempotencyConfig,
  StoreConfig,
  ConflictPolicy,
  MissingKeyPolicy,
  StoreBackend,
} from './config.js';

export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
