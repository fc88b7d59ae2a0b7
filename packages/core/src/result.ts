/**
 * Result type for explicit error handling.
 * Library calls return one of these instead of throwing.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Transform the value of a success Result; failures pass through.
 */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? Ok(fn(result.value)) : result;
}

/**
 * Chain a fallible step onto a success Result.
 */
export function andThen<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> {
  return result.ok ? fn(result.value) : result;
}

/**
 * Get the value, or the fallback when the Result is a failure.
 */
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

/**
 * Run a throwing function and capture what it throws.
 * The mapper turns the thrown value into the Result's error type.
 */
export function capture<T, E>(fn: () => T, toError: (thrown: unknown) => E): Result<T, E> {
  try {
    return Ok(fn());
  } catch (thrown) {
    return Err(toError(thrown));
  }
}
