import { describe, it, expect } from 'vitest';
import { ConfigError } from '../src/errors.js';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({ TOKEN_SECRET: 'test-secret' })).toEqual({
      tokens: {
        algorithm: 'HS256',
        secret: 'test-secret',
        privateKey: undefined,
        publicKey: undefined,
        jwksUri: undefined,
        keyId: undefined,
        defaultLifetimeMinutes: 60,
        clockToleranceSeconds: 0,
      },
      idempotency: {
        ttlMs: 300_000,
        failureTtlMs: 30_000,
        conflictPolicy: 'block',
        waitTimeoutMs: 5_000,
        pollIntervalMs: 50,
        missingKeyPolicy: 'ignore',
      },
      store: { backend: 'memory', redisUrl: 'redis://localhost:6379' },
      logLevel: 'info',
    });
  });

  it('should coerce numbers and read enums', () => {
    const config = loadConfig({
      TOKEN_SECRET: 'test-secret',
      TOKEN_ALGORITHM: 'HS512',
      TOKEN_DEFAULT_LIFETIME_MINUTES: '15',
      IDEMPOTENCY_CONFLICT_POLICY: 'reject',
      IDEMPOTENCY_WAIT_TIMEOUT_MS: '250',
      STORE_BACKEND: 'redis',
      REDIS_URL: 'redis://cache.internal:6380/2',
    });

    expect(config.tokens.algorithm).toBe('HS512');
    expect(config.tokens.defaultLifetimeMinutes).toBe(15);
    expect(config.idempotency.conflictPolicy).toBe('reject');
    expect(config.idempotency.waitTimeoutMs).toBe(250);
    expect(config.store).toEqual({ backend: 'redis', redisUrl: 'redis://cache.internal:6380/2' });
  });

  it('should require a secret for HMAC', () => {
    expect(() => loadConfig({ TOKEN_SECRET: '   ' })).toThrow(
      'Invalid configuration: TOKEN_SECRET: is required for HS256'
    );
  });

  it('should require a public key for key-pair algorithms', () => {
    expect(() => loadConfig({ TOKEN_ALGORITHM: 'EdDSA' })).toThrow(
      'Invalid configuration: TOKEN_PUBLIC_KEY_PEM: is required for EdDSA'
    );
  });

  it('should accept a JWK set URL in place of the public key', () => {
    const config = loadConfig({
      TOKEN_ALGORITHM: 'ES256',
      TOKEN_JWKS_URI: 'https://auth.example.test/.well-known/jwks.json',
    });

    expect(config.tokens.jwksUri).toBe('https://auth.example.test/.well-known/jwks.json');
    expect(config.tokens.publicKey).toBeUndefined();
  });

  it('should refuse a JWK set URL for HMAC', () => {
    expect(() => loadConfig({ TOKEN_SECRET: 'test-secret', TOKEN_JWKS_URI: 'https://auth.example.test/jwks' })).toThrow(
      'Invalid configuration: TOKEN_JWKS_URI: cannot be used with HS256'
    );
  });

  it('should name every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({
        TOKEN_SECRET: 'test-secret',
        IDEMPOTENCY_TTL_MS: '-5',
        STORE_BACKEND: 'memcached',
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.map((issue) => issue.field)).toEqual(['IDEMPOTENCY_TTL_MS', 'STORE_BACKEND']);
    }
  });
});
