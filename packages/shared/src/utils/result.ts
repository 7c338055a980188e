/**
 * Outcome of an operation that may fail without throwing
 */
export type Result<T, E> = Success<T> | Failure<E>;

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Failure<E> {
  readonly ok: false;
  readonly error: E;
}

export function ok<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Failure<E> {
  return { ok: false, error };
}

/**
 * Run an async operation and capture a thrown error as a failure.
 *
 * @param fn - Operation to run
 * @param mapError - Converts whatever was thrown into the failure type
 */
export async function tryAsync<T, E>(
  fn: () => Promise<T>,
  mapError: (error: unknown) => E,
): Promise<Result<T, E>> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(mapError(error));
  }
}
