/**
 * Configuration loading
 *
 * Every recognised option is read from the environment and validated once.
 * A bad value fails fast with a ConfigError naming the variable.
 */

import { z } from 'zod';
import { TOKEN_ALGORITHMS, isHmacAlgorithm, type TokenAlgorithm } from './constants.js';
import { ConfigError } from './errors.js';

export type ConflictPolicy = 'block' | 'reject';
export type MissingKeyPolicy = 'ignore' | 'reject';
export type StoreBackend = 'memory' | 'redis';

export interface TokensConfig {
  algorithm: TokenAlgorithm;
  secret?: string;
  privateKey?: string;
  publicKey?: string;
  /** JWK set URL used instead of the public key to verify */
  jwksUri?: string;
  keyId?: string;
  /** Lifetime of tokens encoded without an explicit one, in minutes */
  defaultLifetimeMinutes?: number;
  clockToleranceSeconds: number;
}

export interface IdempotencyConfig {
  ttlMs: number;
  failureTtlMs: number;
  conflictPolicy: ConflictPolicy;
  waitTimeoutMs: number;
  pollIntervalMs: number;
  missingKeyPolicy: MissingKeyPolicy;
}

export interface StoreConfig {
  backend: StoreBackend;
  redisUrl: string;
}

export interface AppConfig {
  tokens: TokensConfig;
  idempotency: IdempotencyConfig;
  store: StoreConfig;
  logLevel: string;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v));

const optionalUrl = optionalText.pipe(z.string().url().optional());

const envSchema = z
  .object({
    TOKEN_ALGORITHM: z.enum(TOKEN_ALGORITHMS).default('HS256'),
    TOKEN_SECRET: optionalText,
    TOKEN_PRIVATE_KEY_PEM: optionalText,
    TOKEN_PUBLIC_KEY_PEM: optionalText,
    TOKEN_JWKS_URI: optionalUrl,
    TOKEN_KEY_ID: optionalText,
    TOKEN_DEFAULT_LIFETIME_MINUTES: positiveInt(60),
    TOKEN_CLOCK_TOLERANCE_SECONDS: z.coerce.number().int().nonnegative().default(0),
    IDEMPOTENCY_TTL_MS: positiveInt(300_000),
    IDEMPOTENCY_FAILURE_TTL_MS: positiveInt(30_000),
    IDEMPOTENCY_CONFLICT_POLICY: z.enum(['block', 'reject']).default('block'),
    IDEMPOTENCY_WAIT_TIMEOUT_MS: positiveInt(5_000),
    IDEMPOTENCY_POLL_INTERVAL_MS: positiveInt(50),
    IDEMPOTENCY_MISSING_KEY_POLICY: z.enum(['ignore', 'reject']).default('ignore'),
    STORE_BACKEND: z.enum(['memory', 'redis']).default('memory'),
    REDIS_URL: z.string().url().default('redis://localhost:6379'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  })
  .superRefine((env, ctx) => {
    if (isHmacAlgorithm(env.TOKEN_ALGORITHM)) {
      if (!env.TOKEN_SECRET) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['TOKEN_SECRET'],
          message: `is required for ${env.TOKEN_ALGORITHM}`,
        });
      }
      if (env.TOKEN_JWKS_URI) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['TOKEN_JWKS_URI'],
          message: `cannot be used with ${env.TOKEN_ALGORITHM}`,
        });
      }
    } else if (!env.TOKEN_PUBLIC_KEY_PEM && !env.TOKEN_JWKS_URI) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TOKEN_PUBLIC_KEY_PEM'],
        message: `is required for ${env.TOKEN_ALGORITHM}`,
      });
    }
  });

/**
 * Load and validate configuration
 *
 * @param env - Variables to read (defaults to process.env)
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => ({
        field: issue.path.join('.') || '(root)',
        message: issue.message,
      }))
    );
  }

  const e = parsed.data;
  return {
    tokens: {
      algorithm: e.TOKEN_ALGORITHM,
      secret: e.TOKEN_SECRET,
      privateKey: e.TOKEN_PRIVATE_KEY_PEM,
      publicKey: e.TOKEN_PUBLIC_KEY_PEM,
      jwksUri: e.TOKEN_JWKS_URI,
      keyId: e.TOKEN_KEY_ID,
      defaultLifetimeMinutes: e.TOKEN_DEFAULT_LIFETIME_MINUTES,
      clockToleranceSeconds: e.TOKEN_CLOCK_TOLERANCE_SECONDS,
    },
    idempotency: {
      ttlMs: e.IDEMPOTENCY_TTL_MS,
      failureTtlMs: e.IDEMPOTENCY_FAILURE_TTL_MS,
      conflictPolicy: e.IDEMPOTENCY_CONFLICT_POLICY,
      waitTimeoutMs: e.IDEMPOTENCY_WAIT_TIMEOUT_MS,
      pollIntervalMs: e.IDEMPOTENCY_POLL_INTERVAL_MS,
      missingKeyPolicy: e.IDEMPOTENCY_MISSING_KEY_POLICY,
    },
    store: {
      backend: e.STORE_BACKEND,
      redisUrl: e.REDIS_URL,
    },
    logLevel: e.LOG_LEVEL,
  };
}
