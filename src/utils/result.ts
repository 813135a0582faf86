/**
 * Success branch of a {@link Result}.
 */
export interface OkResult<T> {
  readonly isOk: true;
  readonly isErr: false;
  readonly value: T;
  readonly error: null;
}

/**
 * Failure branch of a {@link Result}.
 */
export interface ErrResult<E> {
  readonly isOk: false;
  readonly isErr: true;
  readonly value: null;
  readonly error: E;
}

/**
 * Errors-as-values result used by every fallible operation in the toolkit.
 * Narrow with `isOk` / `isErr` before reading `value` or `error`.
 */
export type Result<T, E> = OkResult<T> | ErrResult<E>;

export function Ok<T>(value: T): OkResult<T> {
  return { isOk: true, isErr: false, value, error: null };
}

export function Err<E>(error: E): ErrResult<E> {
  return { isOk: false, isErr: true, value: null, error };
}

/**
 * Runs a sync or async function and captures a throw or rejection as an Err.
 * Always async, so call sites read the same whatever `fn` returns.
 *
 * @example
 * const result = await safeTry(() => fetch(url));
 * if (result.isErr) {
 *   return Err(String(result.error));
 * }
 */
export async function safeTry<T>(
  fn: () => T | Promise<T>
): Promise<Result<T, unknown>> {
  try {
    return Ok(await fn());
  } catch (error) {
    return Err(error);
  }
}
