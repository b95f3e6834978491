/**
 * Tests for base64url segment helpers (RFC 4648 §5)
 */

import { describe, it, expect } from 'vitest';
import { base64urlDecodeString, base64urlEncodeString, isBase64url } from '../src/base64url.js';

describe('Base64url segments', () => {
  it('should encode strings without padding', () => {
    expect(base64urlEncodeString('a')).toBe('YQ');
    expect(base64urlEncodeString('ab')).toBe('YWI');
    expect(base64urlEncodeString('abc')).toBe('YWJj');
    expect(base64urlEncodeString('{"alg":"HS256"}')).toBe('eyJhbGciOiJIUzI1NiJ9');
  });

  it('should use - and _ instead of + and /', () => {
    // "?>?" is "Pz4/" in standard base64
    expect(base64urlEncodeString('?>?')).toBe('Pz4_');
    expect(base64urlEncodeString('>>>')).toBe('Pj4-');
  });

  it('should decode multi-byte UTF-8', () => {
    const str = 'multi-byte: 你好世界';

    expect(base64urlDecodeString(base64urlEncodeString(str))).toBe(str);
  });

  it('should accept the empty segment', () => {
    expect(isBase64url('')).toBe(true);
    expect(base64urlDecodeString('')).toBe('');
  });

  it.each(['Pz4/', 'YQ==', 'a b', '!!!', 'YWJjZ'])('should reject %j', (segment) => {
    expect(isBase64url(segment)).toBe(false);
    expect(() => base64urlDecodeString(segment)).toThrow(TypeError);
  });
});
