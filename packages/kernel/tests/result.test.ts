import { describe, it, expect } from 'vitest';
import { err, ok, settle } from '../src/result.js';

class ExpectedError extends Error {}

const isExpected = (error: unknown): error is ExpectedError => error instanceof ExpectedError;

describe('settle', () => {
  it('should wrap a resolved value', async () => {
    expect(await settle(Promise.resolve(42), isExpected)).toEqual(ok(42));
  });

  it('should fold an expected rejection', async () => {
    const failure = new ExpectedError('nope');

    expect(await settle(Promise.reject(failure), isExpected)).toEqual(err(failure));
  });

  it('should rethrow anything else', async () => {
    await expect(settle(Promise.reject(new TypeError('bug')), isExpected)).rejects.toThrow('bug');
  });
});
