/**
 * Tagged result for operations whose failures callers branch on
 */

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Await a promise and fold the expected failure kind into a Result.
 * Anything `isExpected` does not recognise is rethrown.
 */
export async function settle<T, E>(
  promise: Promise<T>,
  isExpected: (error: unknown) => error is E
): Promise<Result<T, E>> {
  try {
    return ok(await promise);
  } catch (error) {
    if (isExpected(error)) {
      return err(error);
    }
    throw error;
  }
}
