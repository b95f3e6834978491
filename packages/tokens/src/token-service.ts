/**
 * Token service: encode, decode, validate and refresh compact signed tokens
 *
 * Stateless apart from its key material; safe to share between concurrent
 * callers. Lifetimes are given in minutes, claims carry seconds.
 */

import { CompactSign, compactVerify, errors, type CompactJWSHeaderParameters } from 'jose';
import type { ZodType } from 'zod';
import {
  DecodeError,
  EncodeError,
  ExpiredError,
  InvalidSignatureError,
  MalformedTokenError,
  SECONDS_PER_MINUTE,
  createLogger,
  isDecodeError,
  settle,
  type AppConfig,
  type Logger,
  type Result,
  type TokenAlgorithm,
} from '@reqsafe/kernel';
import { createSigningStrategy, type KeyMaterial, type SigningStrategy } from './algorithms.js';
import { describeIssues, parseClaims, withoutTimestamps, type Claims } from './claims.js';
import { parseCompactToken } from './compact.js';

export interface TokenServiceConfig extends KeyMaterial {
  algorithm: TokenAlgorithm;
  /** Written to the `kid` header when set */
  keyId?: string;
  /** Lifetime used when `encode` gets no explicit one, in minutes. Unset means no `exp`. */
  defaultLifetimeMinutes?: number;
  /** Leeway applied to `exp` and `nbf`, in seconds (default: 0) */
  clockToleranceSeconds?: number;
  logger?: Logger;
}

export interface DecodeOptions {
  /** Check the signature against the configured key (default: true) */
  verifySignature?: boolean;
  /** Reject tokens past `exp` or before `nbf` (default: true) */
  verifyExpiration?: boolean;
}

export interface RefreshOptions {
  /** Re-issue tokens whose `exp` has passed (default: false) */
  allowExpired?: boolean;
}

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function toDecodeError(error: unknown): DecodeError {
  if (isDecodeError(error)) {
    return error;
  }
  if (error instanceof errors.JWSSignatureVerificationFailed || error instanceof errors.JOSEAlgNotAllowed) {
    return new InvalidSignatureError('Token signature is invalid', { cause: error });
  }
  if (error instanceof errors.JWKSNoMatchingKey) {
    return new InvalidSignatureError('No key in the JWK set matches the token', { cause: error });
  }
  if (error instanceof errors.JWSInvalid) {
    return new MalformedTokenError('Token is not a valid compact JWS', { cause: error });
  }
  return new DecodeError('Token could not be verified', { cause: error });
}

export class TokenService {
  private readonly strategy: SigningStrategy;
  private readonly keyId?: string;
  private readonly defaultLifetimeMinutes?: number;
  private readonly clockToleranceSeconds: number;
  private readonly logger: Logger;

  /**
   * @throws EncodeError for an unsupported algorithm or a missing HMAC secret
   */
  constructor(config: TokenServiceConfig) {
    this.strategy = createSigningStrategy(config.algorithm, config);
    this.keyId = config.keyId;
    this.defaultLifetimeMinutes = config.defaultLifetimeMinutes;
    this.clockToleranceSeconds = config.clockToleranceSeconds ?? 0;
    this.logger = config.logger ?? createLogger('reqsafe-tokens');
  }

  static fromConfig(config: AppConfig, logger?: Logger): TokenService {
    return new TokenService({ ...config.tokens, logger });
  }

  get algorithm(): TokenAlgorithm {
    return this.strategy.algorithm;
  }

  /**
   * Sign a claims bundle
   *
   * Adds `iat` (now) and, when a lifetime applies, `exp = iat + minutes * 60`.
   * Caller-supplied `iat`/`exp` are replaced.
   *
   * @param claims - JSON-compatible claims
   * @param expiresIn - Lifetime in minutes; `null` for no `exp`, omitted for the configured default
   * @throws EncodeError if claims are not JSON-compatible or the key cannot sign
   */
  async encode(claims: Readonly<Record<string, unknown>>, expiresIn?: number | null): Promise<string> {
    const parsed = parseClaims(claims);
    if (!parsed.ok) {
      throw new EncodeError(`Claims are not serializable: ${describeIssues(parsed.error)}`);
    }

    const lifetime = expiresIn === undefined ? this.defaultLifetimeMinutes : expiresIn;
    if (lifetime !== undefined && lifetime !== null && !Number.isFinite(lifetime)) {
      throw new EncodeError(`Token lifetime must be a finite number of minutes, got ${lifetime}`);
    }

    const iat = nowSeconds();
    const payload: Claims = { ...withoutTimestamps(parsed.value), iat };
    if (lifetime !== undefined && lifetime !== null) {
      payload.exp = iat + Math.round(lifetime * SECONDS_PER_MINUTE);
    }

    const key = await this.strategy.signingKey();
    const header: CompactJWSHeaderParameters = { alg: this.strategy.algorithm, typ: 'JWT' };
    if (this.keyId) {
      header.kid = this.keyId;
    }

    try {
      return await new CompactSign(new TextEncoder().encode(JSON.stringify(payload)))
        .setProtectedHeader(header)
        .sign(key);
    } catch (error) {
      throw new EncodeError(`Could not sign token with ${this.strategy.algorithm}`, { cause: error });
    }
  }

  /**
   * Decode a token, verifying signature and expiration unless told otherwise
   *
   * The header's `alg` must equal the configured algorithm; it is never used
   * to choose how to verify.
   *
   * @throws MalformedTokenError, InvalidSignatureError, ExpiredError or DecodeError
   */
  async decode(token: string, options?: DecodeOptions): Promise<Claims>;
  async decode<T>(token: string, options: DecodeOptions & { payloadSchema: ZodType<T> }): Promise<T>;
  async decode<T>(
    token: string,
    options: DecodeOptions & { payloadSchema?: ZodType<T> } = {}
  ): Promise<Claims | T> {
    const { verifySignature = true, verifyExpiration = true, payloadSchema } = options;

    const { header, claims } = parseCompactToken(token);

    if (verifySignature) {
      if (header.alg !== this.strategy.algorithm) {
        throw new InvalidSignatureError(
          `Token algorithm "${header.alg}" does not match the configured ${this.strategy.algorithm}`
        );
      }
      const key = await this.strategy.verificationKey();
      const verifyOptions = { algorithms: [this.strategy.algorithm] };
      try {
        if (typeof key === 'function') {
          await compactVerify(token, key, verifyOptions);
        } else {
          await compactVerify(token, key, verifyOptions);
        }
      } catch (error) {
        const decodeError = toDecodeError(error);
        this.logger.debug({ code: decodeError.code }, 'Token verification failed');
        throw decodeError;
      }
    }

    if (verifyExpiration) {
      this.checkTimestamps(claims);
    }

    if (!payloadSchema) {
      return claims;
    }
    const typed = payloadSchema.safeParse(claims);
    if (!typed.success) {
      throw new DecodeError(`Payload validation error: ${describeIssues(typed.error)}`);
    }
    return typed.data;
  }

  /**
   * Fully verify a token and report the outcome as a Result
   *
   * Token problems come back as `{ ok: false, error }`; nothing else is caught.
   */
  async validate(token: string): Promise<Result<Claims, DecodeError>>;
  async validate<T>(token: string, payloadSchema: ZodType<T>): Promise<Result<T, DecodeError>>;
  async validate<T>(token: string, payloadSchema?: ZodType<T>): Promise<Result<Claims | T, DecodeError>> {
    if (payloadSchema) {
      return settle(this.decode(token, { payloadSchema }), isDecodeError);
    }
    return settle(this.decode(token), isDecodeError);
  }

  /**
   * Re-issue a token with fresh `iat`/`exp`
   *
   * The signature is always verified. Expired tokens are refused unless
   * `allowExpired` is set.
   *
   * @param expiresIn - Lifetime in minutes, as for `encode`
   */
  async refresh(token: string, expiresIn?: number | null, options: RefreshOptions = {}): Promise<string> {
    const claims = await this.decode(token, {
      verifySignature: true,
      verifyExpiration: !options.allowExpired,
    });
    return this.encode(withoutTimestamps(claims), expiresIn);
  }

  private checkTimestamps(claims: Claims): void {
    const now = nowSeconds();
    if (claims.exp !== undefined && claims.exp + this.clockToleranceSeconds < now) {
      throw new ExpiredError(claims.exp);
    }
    if (claims.nbf !== undefined && claims.nbf - this.clockToleranceSeconds > now) {
      throw new DecodeError(`Token is not valid before ${new Date(claims.nbf * 1000).toISOString()}`);
    }
  }
}
