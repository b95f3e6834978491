/**
 * Compact token structure: base64url(header).base64url(payload).base64url(signature)
 */

import { DecodeError, MalformedTokenError } from '@reqsafe/kernel';
import { base64urlDecodeString, isBase64url } from './base64url.js';
import { describeIssues, parseClaims, type Claims } from './claims.js';

export interface TokenHeader {
  alg: string;
  typ?: string;
  kid?: string;
}

export interface ParsedToken {
  header: TokenHeader;
  claims: Claims;
}

function decodeJsonSegment(segment: string, label: string): unknown {
  try {
    return JSON.parse(base64urlDecodeString(segment));
  } catch (error) {
    throw new MalformedTokenError(`Token ${label} is not base64url-encoded JSON`, { cause: error });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split and decode a token without checking its signature
 *
 * @throws MalformedTokenError when the structure is wrong
 * @throws DecodeError when the payload is an object with ill-typed reserved claims
 */
export function parseCompactToken(token: string): ParsedToken {
  const parts = token.split('.');
  if (parts.length !== 3) {
    throw new MalformedTokenError('Token must have three dot-separated parts');
  }

  const [headerB64, payloadB64, signatureB64 = ''] = parts;
  if (!headerB64 || !payloadB64) {
    throw new MalformedTokenError('Token header and payload must not be empty');
  }
  if (!isBase64url(signatureB64)) {
    throw new MalformedTokenError('Token signature is not base64url-encoded');
  }

  const header = decodeJsonSegment(headerB64, 'header');
  const alg = isRecord(header) ? header['alg'] : undefined;
  if (!isRecord(header) || typeof alg !== 'string') {
    throw new MalformedTokenError('Token header must be an object with a string "alg"');
  }

  const payload = decodeJsonSegment(payloadB64, 'payload');
  if (!isRecord(payload)) {
    throw new MalformedTokenError('Token payload must be a JSON object');
  }

  const claims = parseClaims(payload);
  if (!claims.ok) {
    throw new DecodeError(`Token claims are invalid: ${describeIssues(claims.error)}`);
  }

  return {
    header: {
      alg,
      typ: typeof header['typ'] === 'string' ? header['typ'] : undefined,
      kid: typeof header['kid'] === 'string' ? header['kid'] : undefined,
    },
    claims: claims.value,
  };
}
