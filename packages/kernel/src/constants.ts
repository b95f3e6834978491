/**
 * reqsafe constants
 *
 * Shared by the token service, the idempotency guard and their hosts.
 */

/**
 * Signing algorithms the token service can be configured with.
 *
 * HS* use a shared secret. RS256, ES256 and EdDSA use a PEM key pair.
 */
export const TOKEN_ALGORITHMS = ['HS256', 'HS384', 'HS512', 'RS256', 'ES256', 'EdDSA'] as const;

export type TokenAlgorithm = (typeof TOKEN_ALGORITHMS)[number];

export const HMAC_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const satisfies readonly TokenAlgorithm[];

export type HmacAlgorithm = (typeof HMAC_ALGORITHMS)[number];

/**
 * Narrow a configured algorithm to the shared-secret family
 */
export function isHmacAlgorithm(alg: TokenAlgorithm): alg is HmacAlgorithm {
  return HMAC_ALGORITHMS.some((hmac) => hmac === alg);
}

/**
 * HTTP header names used by the hosts
 */
export const HEADERS = {
  idempotencyKey: 'Idempotency-Key' as const,
  idempotentReplayed: 'Idempotent-Replayed' as const,
  authorization: 'Authorization' as const,
} as const;

/**
 * Token lifetimes are configured in minutes; claims carry seconds.
 */
export const SECONDS_PER_MINUTE = 60;

export const LIMITS = {
  /** Longest idempotency key the guard accepts */
  maxIdempotencyKeyLength: 255,
  /** Claim attempts before a vanishing record is reported as a conflict */
  maxClaimAttempts: 3,
} as const;
