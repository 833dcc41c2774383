/**
 * Result<T, E> type for functional error handling
 * Used at the persistence seam: adapters report failure as a value, the
 * traversal turns it into a PersistenceError.
 */

export type Result<T, E> = Ok<T> | Err<E>;

/**
 * Success variant of Result<T, E>
 */
export class Ok<T> {
  readonly _tag = 'Ok' as const;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T> {
    return true;
  }

  isErr(): this is never {
    return false;
  }

  /**
   * Transform the success value using the provided function
   */
  map<U>(fn: (value: T) => U): Ok<U> {
    return new Ok(fn(this.value));
  }

  /**
   * Chain operations that may fail
   */
  flatMap<U, F>(fn: (value: T) => Result<U, F>): Result<U, F> {
    return fn(this.value);
  }

  unwrapOr(_defaultValue: T): T {
    return this.value;
  }
}

/**
 * Error variant of Result<T, E>
 */
export class Err<E> {
  readonly _tag = 'Err' as const;

  constructor(public readonly error: E) {}

  isOk(): this is never {
    return false;
  }

  isErr(): this is Err<E> {
    return true;
  }

  /**
   * Transform the error value using the provided function
   */
  mapErr<F>(fn: (error: E) => F): Err<F> {
    return new Err(fn(this.error));
  }

  unwrapOr<T>(defaultValue: T): T {
    return defaultValue;
  }
}

export function ok(): Ok<void>;
export function ok<T>(value: T): Ok<T>;
export function ok<T>(value?: T): Ok<T | undefined> {
  return new Ok(value);
}

export function err<E>(error: E): Err<E> {
  return new Err(error);
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result._tag === 'Ok';
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result._tag === 'Err';
}
