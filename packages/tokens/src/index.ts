/**
 * @reqsafe/tokens
 *
 * Compact signed tokens (header.payload.signature) with HMAC, RSA, ECDSA or
 * Ed25519 signatures, fixed per service instance.
 *
 * @example
 * ```typescript
 * import { TokenService } from '@reqsafe/tokens';
 *
 * const tokens = new TokenService({ algorithm: 'HS256', secret: process.env.TOKEN_SECRET });
 * const token = await tokens.encode({ sub: 'user-1' }, 60);
 * const claims = await tokens.decode(token);
 * ```
 *
 * @packageDocumentation
 */

export { TokenService } from './token-service.js';
export type { TokenServiceConfig, DecodeOptions, RefreshOptions } from './token-service.js';

export { createSigningStrategy } from './algorithms.js';
export type { SigningStrategy, KeyMaterial, TokenKey, VerificationKey } from './algorithms.js';

export { RESERVED_CLAIMS, claimsSchema, jsonValueSchema, parseClaims, withoutTimestamps } from './claims.js';
export type { Claims, RegisteredClaims } from './claims.js';

export { parseCompactToken } from './compact.js';
export type { TokenHeader, ParsedToken } from './compact.js';

export { base64urlEncodeString, base64urlDecodeString, isBase64url } from './base64url.js';
