/**
 * Signing strategies
 *
 * The algorithm is fixed when the service is built. Verification keys are
 * typed to that algorithm, so a token's own `alg` header can never select
 * a different key type. Key-pair algorithms can verify against a JWK set,
 * where the header's `kid` only picks among keys of that algorithm.
 */

import {
  createLocalJWKSet,
  createRemoteJWKSet,
  importPKCS8,
  importSPKI,
  type CompactVerifyGetKey,
  type JSONWebKeySet,
  type KeyLike,
} from 'jose';
import {
  DecodeError,
  EncodeError,
  TOKEN_ALGORITHMS,
  isHmacAlgorithm,
  type HmacAlgorithm,
  type TokenAlgorithm,
} from '@reqsafe/kernel';

export type TokenKey = KeyLike | Uint8Array;

/** A fixed key, or a resolver that picks one from a key set per token */
export type VerificationKey = TokenKey | CompactVerifyGetKey;

export interface SigningStrategy {
  readonly algorithm: TokenAlgorithm;
  signingKey(): Promise<TokenKey>;
  verificationKey(): Promise<VerificationKey>;
}

/**
 * Key material for a strategy. HS* read `secret`; the others read PEM keys.
 */
export interface KeyMaterial {
  secret?: string;
  /** PKCS#8 PEM, needed to encode */
  privateKey?: string;
  /** SPKI PEM, needed to decode unless a JWK set is given */
  publicKey?: string;
  /** JWK set to verify against, taking precedence over `publicKey` */
  jwks?: JSONWebKeySet;
  /** URL of a JWK set, fetched on first use and cached by jose */
  jwksUri?: string;
}

class HmacStrategy implements SigningStrategy {
  private readonly key: Uint8Array;

  constructor(
    readonly algorithm: HmacAlgorithm,
    secret: string
  ) {
    this.key = new TextEncoder().encode(secret);
  }

  async signingKey(): Promise<TokenKey> {
    return this.key;
  }

  async verificationKey(): Promise<TokenKey> {
    return this.key;
  }
}

class KeyPairStrategy implements SigningStrategy {
  private privateKey?: Promise<KeyLike>;
  private publicKey?: Promise<KeyLike>;

  constructor(
    readonly algorithm: TokenAlgorithm,
    private readonly material: KeyMaterial,
    private readonly keySet?: CompactVerifyGetKey
  ) {}

  async signingKey(): Promise<TokenKey> {
    const pem = this.material.privateKey;
    if (!pem) {
      throw new EncodeError(`No private key configured for ${this.algorithm}`);
    }
    this.privateKey ??= importPKCS8(pem, this.algorithm);
    try {
      return await this.privateKey;
    } catch (error) {
      throw new EncodeError(`Private key is not a valid ${this.algorithm} PKCS#8 key`, { cause: error });
    }
  }

  async verificationKey(): Promise<VerificationKey> {
    if (this.keySet) {
      return this.keySet;
    }
    const pem = this.material.publicKey;
    if (!pem) {
      throw new DecodeError(`No public key configured for ${this.algorithm}`);
    }
    this.publicKey ??= importSPKI(pem, this.algorithm);
    try {
      return await this.publicKey;
    } catch (error) {
      throw new DecodeError(`Public key is not a valid ${this.algorithm} SPKI key`, { cause: error });
    }
  }
}

function createKeySet(algorithm: TokenAlgorithm, material: KeyMaterial): CompactVerifyGetKey | undefined {
  if (material.jwks) {
    try {
      return createLocalJWKSet(material.jwks);
    } catch (error) {
      throw new EncodeError(`JWK set for ${algorithm} is malformed`, { cause: error });
    }
  }
  if (material.jwksUri) {
    if (!URL.canParse(material.jwksUri)) {
      throw new EncodeError(`JWK set URI "${material.jwksUri}" is not a URL`);
    }
    return createRemoteJWKSet(new URL(material.jwksUri));
  }
  return undefined;
}

function isTokenAlgorithm(value: string): value is TokenAlgorithm {
  return TOKEN_ALGORITHMS.some((alg) => alg === value);
}

/**
 * Build the strategy for a configured algorithm
 *
 * @throws EncodeError for an unknown algorithm, a missing secret or an unusable JWK set
 */
export function createSigningStrategy(algorithm: string, material: KeyMaterial): SigningStrategy {
  if (!isTokenAlgorithm(algorithm)) {
    throw new EncodeError(
      `Unsupported algorithm "${algorithm}" (expected one of ${TOKEN_ALGORITHMS.join(', ')})`
    );
  }

  if (isHmacAlgorithm(algorithm)) {
    if (!material.secret) {
      throw new EncodeError(`${algorithm} requires a non-empty secret`);
    }
    if (material.jwks || material.jwksUri) {
      throw new EncodeError(`${algorithm} cannot verify against a JWK set`);
    }
    return new HmacStrategy(algorithm, material.secret);
  }

  return new KeyPairStrategy(algorithm, material, createKeySet(algorithm, material));
}
