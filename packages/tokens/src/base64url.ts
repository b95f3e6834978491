/**
 * Base64url helpers for the compact token segments (RFC 4648 §5, no padding)
 */

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

/**
 * Check that a segment uses only the unpadded base64url alphabet
 */
export function isBase64url(segment: string): boolean {
  // A single leftover character can never encode a whole byte
  return BASE64URL_PATTERN.test(segment) && segment.length % 4 !== 1;
}

/**
 * Encode UTF-8 string to base64url
 */
export function base64urlEncodeString(str: string): string {
  return Buffer.from(str, 'utf8').toString('base64url');
}

/**
 * Decode base64url to UTF-8 string
 *
 * @throws TypeError if the segment is not base64url
 */
export function base64urlDecodeString(segment: string): string {
  if (!isBase64url(segment)) {
    throw new TypeError('Segment is not base64url encoded');
  }
  return Buffer.from(segment, 'base64url').toString('utf8');
}
