/**
 * Tests for TokenService encode/decode/validate/refresh
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { z } from 'zod';
import {
  DecodeError,
  EncodeError,
  ExpiredError,
  InvalidSignatureError,
  MalformedTokenError,
  createLogger,
} from '@reqsafe/kernel';
import { TokenService } from '../src/token-service.js';
import { base64urlEncodeString } from '../src/base64url.js';
import { parseCompactToken } from '../src/compact.js';

const logger = createLogger('tokens-test', { level: 'silent' });

function hs256(secret = 'test-secret'): TokenService {
  return new TokenService({ algorithm: 'HS256', secret, logger });
}

function forge(header: object, payload: object, signature = 'c2ln'): string {
  return `${base64urlEncodeString(JSON.stringify(header))}.${base64urlEncodeString(JSON.stringify(payload))}.${signature}`;
}

describe('TokenService', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('encode', () => {
    it('should add iat and exp = iat + minutes * 60', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-15T10:00:00Z'));
      const tokens = hs256();

      const token = await tokens.encode({ user_id: 1 }, 60);
      const claims = await tokens.decode(token);

      expect(claims).toEqual({ user_id: 1, iat: 1768471200, exp: 1768474800 });
      expect(claims.exp).toBe((claims.iat ?? 0) + 3600);
    });

    it('should omit exp when no lifetime applies', async () => {
      const token = await hs256().encode({ sub: 'user-1' });
      const claims = await hs256().decode(token);

      expect(claims.sub).toBe('user-1');
      expect(typeof claims.iat).toBe('number');
      expect(claims).not.toHaveProperty('exp');
    });

    it('should use the configured default lifetime', async () => {
      const tokens = new TokenService({
        algorithm: 'HS256',
        secret: 'test-secret',
        defaultLifetimeMinutes: 15,
        logger,
      });

      const claims = await tokens.decode(await tokens.encode({ sub: 'user-1' }));

      expect(claims.exp).toBe((claims.iat ?? 0) + 900);
    });

    it('should drop exp when expiresIn is null despite a default lifetime', async () => {
      const tokens = new TokenService({
        algorithm: 'HS256',
        secret: 'test-secret',
        defaultLifetimeMinutes: 15,
        logger,
      });

      const claims = await tokens.decode(await tokens.encode({ sub: 'user-1' }, null));

      expect(claims).not.toHaveProperty('exp');
    });

    it('should replace caller-supplied iat and exp', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-15T10:00:00Z'));
      const tokens = hs256();

      const claims = await tokens.decode(await tokens.encode({ iat: 1, exp: 2, role: 'admin' }, 1));

      expect(claims).toEqual({ role: 'admin', iat: 1768471200, exp: 1768471260 });
    });

    it('should write alg, typ and kid to the header', async () => {
      const tokens = new TokenService({ algorithm: 'HS384', secret: 'test-secret', keyId: 'key-2026', logger });

      const { header } = parseCompactToken(await tokens.encode({ sub: 'user-1' }));

      expect(header).toEqual({ alg: 'HS384', typ: 'JWT', kid: 'key-2026' });
    });

    it('should reject claims that are not JSON values', async () => {
      const tokens = hs256();

      await expect(tokens.encode({ handler: () => 1 })).rejects.toBeInstanceOf(EncodeError);
      await expect(tokens.encode({ amount: 10n })).rejects.toBeInstanceOf(EncodeError);
      await expect(tokens.encode({ ratio: Number.NaN })).rejects.toBeInstanceOf(EncodeError);
      await expect(tokens.encode({ nested: { when: new Date(0) } })).rejects.toBeInstanceOf(EncodeError);
    });

    it('should reject reserved claims with the wrong type', async () => {
      await expect(hs256().encode({ sub: 42 })).rejects.toThrow('Claims are not serializable: sub:');
    });

    it('should reject a non-finite lifetime', async () => {
      await expect(hs256().encode({ sub: 'user-1' }, Number.POSITIVE_INFINITY)).rejects.toBeInstanceOf(
        EncodeError
      );
    });
  });

  describe('decode', () => {
    it('should reject a token signed with another secret', async () => {
      const token = await hs256('test-secret-one').encode({ sub: 'user-1' }, 5);

      await expect(hs256('test-secret-two').decode(token)).rejects.toBeInstanceOf(InvalidSignatureError);
    });

    it('should accept a foreign signature when signature checks are off', async () => {
      const token = await hs256('test-secret-one').encode({ sub: 'user-1' }, 5);

      const claims = await hs256('test-secret-two').decode(token, { verifySignature: false });

      expect(claims.sub).toBe('user-1');
    });

    it('should reject an expired token unless expiration checks are off', async () => {
      const tokens = hs256();
      const token = await tokens.encode({ sub: 'user-1' }, -1);

      await expect(tokens.decode(token)).rejects.toBeInstanceOf(ExpiredError);
      await expect(tokens.decode(token, { verifyExpiration: false })).resolves.toMatchObject({
        sub: 'user-1',
      });
    });

    it('should honour the clock tolerance', async () => {
      const tolerant = new TokenService({
        algorithm: 'HS256',
        secret: 'test-secret',
        clockToleranceSeconds: 120,
        logger,
      });
      const token = await tolerant.encode({ sub: 'user-1' }, -1);

      await expect(tolerant.decode(token)).resolves.toMatchObject({ sub: 'user-1' });
      await expect(hs256().decode(token)).rejects.toBeInstanceOf(ExpiredError);
    });

    it('should reject a token that is not valid yet', async () => {
      const tokens = hs256();
      const token = await tokens.encode({ sub: 'user-1', nbf: Math.floor(Date.now() / 1000) + 600 });

      const error = await tokens.decode(token).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DecodeError);
      expect(error).toMatchObject({ code: 'E_DECODE' });
    });

    it('should reject a tampered payload', async () => {
      const tokens = hs256();
      const [header, , signature] = (await tokens.encode({ role: 'user' }, 5)).split('.');
      const tampered = `${header}.${base64urlEncodeString(JSON.stringify({ role: 'admin' }))}.${signature}`;

      await expect(tokens.decode(tampered)).rejects.toBeInstanceOf(InvalidSignatureError);
    });

    it('should reject a token whose header names another algorithm', async () => {
      const token = await new TokenService({ algorithm: 'HS512', secret: 'test-secret', logger }).encode(
        { sub: 'user-1' },
        5
      );

      await expect(hs256().decode(token)).rejects.toThrow(
        'Token algorithm "HS512" does not match the configured HS256'
      );
    });

    it('should reject unsigned tokens', async () => {
      const token = `${forge({ alg: 'none', typ: 'JWT' }, { sub: 'admin' }).split('.').slice(0, 2).join('.')}.`;

      await expect(hs256().decode(token)).rejects.toBeInstanceOf(InvalidSignatureError);
    });

    it.each([
      ['no dots', 'invalid'],
      ['two parts', 'a.b'],
      ['four parts', 'a.b.c.d'],
      ['non base64url header', '!!!.e30.c2ln'],
      ['empty payload', 'eyJhbGciOiJIUzI1NiJ9..c2ln'],
    ])('should reject a malformed token (%s)', async (_label, token) => {
      await expect(hs256().decode(token)).rejects.toBeInstanceOf(MalformedTokenError);
    });

    it('should reject a signature outside the base64url alphabet without verifying', async () => {
      const decoding = hs256().decode(forge({ alg: 'HS256' }, { sub: 'user-1' }, '!!!'), { verifySignature: false });

      await expect(decoding).rejects.toBeInstanceOf(MalformedTokenError);
      await expect(decoding).rejects.toThrow('Token signature is not base64url-encoded');
    });

    it('should reject a payload that is not an object', async () => {
      const token = forge({ alg: 'HS256' }, [1, 2, 3]);

      await expect(hs256().decode(token)).rejects.toThrow('Token payload must be a JSON object');
    });

    it('should report ill-typed reserved claims as a plain decode error', async () => {
      const error = await hs256()
        .decode(forge({ alg: 'HS256' }, { exp: 'tomorrow' }), { verifySignature: false })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DecodeError);
      expect(error).not.toBeInstanceOf(MalformedTokenError);
      expect(error).toMatchObject({ code: 'E_DECODE', httpStatus: 401 });
    });

    it('should validate the payload against a schema', async () => {
      const tokens = hs256();
      const schema = z.object({ user_id: z.number(), iat: z.number() });
      const token = await tokens.encode({ user_id: 7 }, 5);

      const claims = await tokens.decode(token, { payloadSchema: schema });

      expect(claims.user_id).toBe(7);
      await expect(
        tokens.decode(await tokens.encode({ user_id: 'seven' }, 5), { payloadSchema: schema })
      ).rejects.toThrow('Payload validation error: user_id:');
    });
  });

  describe('validate', () => {
    it('should return the claims of a valid token', async () => {
      const tokens = hs256();
      const result = await tokens.validate(await tokens.encode({ sub: 'user-1' }, 5));

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.sub).toBe('user-1');
      }
    });

    it('should return the decode error instead of throwing', async () => {
      const result = await hs256().validate('not-a-token');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('E_MALFORMED_TOKEN');
      }
    });

    it('should apply a payload schema', async () => {
      const tokens = hs256();
      const result = await tokens.validate(
        await tokens.encode({ sub: 'user-1' }, 5),
        z.object({ tenant: z.string() })
      );

      expect(result.ok).toBe(false);
    });
  });

  describe('refresh', () => {
    it('should re-issue with fresh timestamps and the same custom claims', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-15T10:00:00Z'));
      const tokens = hs256();
      const original = await tokens.encode({ sub: 'user-1', scope: ['read'] }, 5);

      vi.setSystemTime(new Date('2026-01-15T10:02:00Z'));
      const refreshed = await tokens.refresh(original, 60);

      expect(await tokens.decode(refreshed)).toEqual({
        sub: 'user-1',
        scope: ['read'],
        iat: 1768471320,
        exp: 1768474920,
      });
    });

    it('should refuse an expired token unless allowed', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-15T10:00:00Z'));
      const tokens = hs256();
      const original = await tokens.encode({ sub: 'user-1' }, 1);

      vi.setSystemTime(new Date('2026-01-15T10:05:00Z'));

      await expect(tokens.refresh(original, 1)).rejects.toBeInstanceOf(ExpiredError);
      const refreshed = await tokens.refresh(original, 1, { allowExpired: true });
      expect(await tokens.decode(refreshed)).toEqual({
        sub: 'user-1',
        iat: 1768471500,
        exp: 1768471560,
      });
    });

    it('should refuse a token with a foreign signature', async () => {
      const token = await hs256('test-secret-one').encode({ sub: 'user-1' }, 5);

      await expect(hs256('test-secret-two').refresh(token, 5)).rejects.toBeInstanceOf(InvalidSignatureError);
    });
  });

  describe('configuration', () => {
    it('should require a secret for HMAC algorithms', () => {
      expect(() => new TokenService({ algorithm: 'HS256', logger })).toThrow(EncodeError);
    });

    it('should build from loaded configuration', async () => {
      const tokens = TokenService.fromConfig(
        {
          tokens: { algorithm: 'HS512', secret: 'test-secret', defaultLifetimeMinutes: 10, clockToleranceSeconds: 0 },
          idempotency: {
            ttlMs: 1000,
            failureTtlMs: 1000,
            conflictPolicy: 'block',
            waitTimeoutMs: 100,
            pollIntervalMs: 10,
            missingKeyPolicy: 'ignore',
          },
          store: { backend: 'memory', redisUrl: 'redis://localhost:6379' },
          logLevel: 'silent',
        },
        logger
      );

      expect(tokens.algorithm).toBe('HS512');
      const claims = await tokens.decode(await tokens.encode({ sub: 'user-1' }));
      expect(claims.exp).toBe((claims.iat ?? 0) + 600);
    });
  });
});
