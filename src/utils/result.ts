/**
 * Typed result for operations that can fail.
 *
 * Fit in the system:
 * - Repositories, collaborators and the settlement service model failures with this type
 *   instead of throwing, so a saga step can decide between abort, retry and compensation.
 * - `Ok(null)` means "no record", `Err(error)` means "the operation failed".
 *
 * Contract:
 * - Callers check `isOk()`/`isErr()` before touching the value.
 *
 * Example:
 * ```ts
 * const res = await repo.findById(id);
 * if (res.isErr()) return ErrResult(storageFailure("loading request", res.error));
 * const doc = res.value;
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
  constructor(public readonly value: T) {}

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<T, E> {
    return false;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return new Ok(fn(this.value));
  }
}

export class Err<T, E> {
  constructor(public readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<T, E> {
    return true;
  }

  map<U>(_fn: (value: T) => U): Result<U, E> {
    return new Err<U, E>(this.error);
  }
}

/** Creates a successful result. */
export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok(value);

/** Creates a failed result. */
export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err(error);

/** Normalizes anything caught in a `catch` clause into an `Error`. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
