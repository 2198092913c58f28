/**
 * Result type for checks that report failure as a value.
 * Used where a caller decides whether a failure is fatal, such as token
 * verification in the auth gate.
 */
export type Result<T, E = Error> =
  | Readonly<{ success: true; data: T }>
  | Readonly<{ success: false; error: E }>;

/**
 * Creates a successful result.
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failed result.
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Unwraps a result, throwing if it's an error.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.success) {
    return result.data;
  }
  throw result.error;
}

/**
 * Tries each candidate in order and returns the first success, or the
 * last failure when none succeeds.
 */
export async function firstOk<C, T, E>(
  candidates: readonly C[],
  attempt: (candidate: C) => Promise<Result<T, E>>,
  empty: E,
): Promise<Result<T, E>> {
  let last: Result<T, E> = err(empty);
  for (const candidate of candidates) {
    last = await attempt(candidate);
    if (last.success) return last;
  }
  return last;
}
