/**
 * Result<T, E> type for functional error handling
 * Every fallible bytefill operation returns one instead of throwing
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
   * Get the value
   */
  unwrap(): T {
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
   * Throws the carried error (wrapped when it is not an Error instance)
   * Use sparingly - prefer narrowing with isOk/isErr
   */
  unwrap(): never {
    if (this.error instanceof Error) {
      throw this.error;
    }
    throw new Error(`Called unwrap on an Err value: ${String(this.error)}`);
  }
}

/**
 * Helper function to create a success Result
 */
export function ok<T>(value: T): Ok<T> {
  return new Ok(value);
}

/**
 * Helper function to create an error Result
 */
export function err<E>(error: E): Err<E> {
  return new Err(error);
}
