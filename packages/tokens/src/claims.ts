/**
 * Claims bundle model
 *
 * Reserved claims carry fixed types; everything else is a custom claim
 * holding any JSON value.
 */

import { z } from 'zod';
import { ok, err, type JsonValue, type Result } from '@reqsafe/kernel';

export interface RegisteredClaims {
  /** Expiration, seconds since epoch */
  exp?: number;
  /** Issued-at, seconds since epoch */
  iat?: number;
  /** Not-before, seconds since epoch */
  nbf?: number;
  /** Subject */
  sub?: string;
}

export type Claims = RegisteredClaims & { [claim: string]: JsonValue | undefined };

export const RESERVED_CLAIMS = ['exp', 'iat', 'nbf', 'sub'] as const;

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const timestamp = z.number().finite();

export const claimsSchema = z
  .object({
    exp: timestamp.optional(),
    iat: timestamp.optional(),
    nbf: timestamp.optional(),
    sub: z.string().optional(),
  })
  .catchall(jsonValueSchema);

/**
 * Validate an untrusted value as a claims bundle
 */
export function parseClaims(value: unknown): Result<Claims, z.ZodError> {
  const parsed = claimsSchema.safeParse(value);
  return parsed.success ? ok(parsed.data) : err(parsed.error);
}

/**
 * Render zod issues as a single line, e.g. `exp: Expected number, received string`
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(claims)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Copy of the claims without the timestamps the service manages
 */
export function withoutTimestamps(claims: Claims): Claims {
  const rest: Claims = {};
  for (const [name, value] of Object.entries(claims)) {
    if (name !== 'iat' && name !== 'exp') {
      rest[name] = value;
    }
  }
  return rest;
}
