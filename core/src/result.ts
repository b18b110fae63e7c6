/**
 * Result<T, E> - explicit success/failure values
 *
 * The encoder, decoder and plain-value conversion return Results: a value
 * that does not conform to its schema is an expected outcome the caller must
 * handle. The writer and reader sit at the API boundary and throw instead.
 *
 * @example
 * ```typescript
 * const result = encodeCell(value, schema, vector, 0);
 * result.match({
 *   ok: () => batch.size++,
 *   err: (error) => logger.warn(error.message, { code: error.code }),
 * });
 * ```
 *
 * @module result
 */

// =============================================================================
// Core Types
// =============================================================================

/**
 * Methods shared by both variants, so they can be called on a Result
 * without narrowing first.
 */
interface ResultMethods<T, E> {
  map<U>(fn: (value: T) => U): Result<U, E>;
  flatMap<U, F>(fn: (value: T) => Result<U, F>): Result<U, E | F>;
  mapErr<F>(fn: (error: E) => F): Result<T, F>;
  /**
   * @throws The error itself when it is an Error, otherwise an Error wrapping it
   */
  unwrap(): T;
  unwrapOr(defaultValue: T): T;
  /** @throws Error when called on an Ok */
  unwrapErr(): E;
  isOk(): this is Ok<T, E>;
  isErr(): this is Err<E, T>;
  match<U>(handlers: { ok: (value: T) => U; err: (error: E) => U }): U;
}

export interface Ok<T, E = never> extends ResultMethods<T, E> {
  readonly _tag: 'Ok';
  readonly value: T;
}

export interface Err<E, T = never> extends ResultMethods<T, E> {
  readonly _tag: 'Err';
  readonly error: E;
}

/**
 * A Result is either Ok (success) or Err (failure).
 */
export type Result<T, E> = Ok<T, E> | Err<E, T>;

// =============================================================================
// Implementation Classes
// =============================================================================

/** @internal */
class OkImpl<T, E> implements Ok<T, E> {
  readonly _tag = 'Ok' as const;

  constructor(readonly value: T) {}

  map<U>(fn: (value: T) => U): Result<U, E> {
    return new OkImpl<U, E>(fn(this.value));
  }

  flatMap<U, F>(fn: (value: T) => Result<U, F>): Result<U, E | F> {
    const next = fn(this.value);
    return next.isOk() ? new OkImpl<U, E | F>(next.value) : new ErrImpl<E | F, U>(next.error);
  }

  mapErr<F>(_fn: (error: E) => F): Result<T, F> {
    return new OkImpl<T, F>(this.value);
  }

  unwrap(): T {
    return this.value;
  }

  unwrapOr(_defaultValue: T): T {
    return this.value;
  }

  unwrapErr(): E {
    throw new Error('Called unwrapErr on Ok');
  }

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<E, T> {
    return false;
  }

  match<U>(handlers: { ok: (value: T) => U; err: (error: E) => U }): U {
    return handlers.ok(this.value);
  }
}

/** @internal */
class ErrImpl<E, T> implements Err<E, T> {
  readonly _tag = 'Err' as const;

  constructor(readonly error: E) {}

  map<U>(_fn: (value: T) => U): Result<U, E> {
    return new ErrImpl<E, U>(this.error);
  }

  flatMap<U, F>(_fn: (value: T) => Result<U, F>): Result<U, E | F> {
    return new ErrImpl<E | F, U>(this.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    return new ErrImpl<F, T>(fn(this.error));
  }

  unwrap(): T {
    if (this.error instanceof Error) {
      throw this.error;
    }
    throw new Error(String(this.error));
  }

  unwrapOr(defaultValue: T): T {
    return defaultValue;
  }

  unwrapErr(): E {
    return this.error;
  }

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<E, T> {
    return true;
  }

  match<U>(handlers: { ok: (value: T) => U; err: (error: E) => U }): U {
    return handlers.err(this.error);
  }
}

// =============================================================================
// Constructors and Guards
// =============================================================================

export function ok<T, E = never>(value: T): Ok<T, E> {
  return new OkImpl<T, E>(value);
}

export function err<E, T = never>(error: E): Err<E, T> {
  return new ErrImpl<E, T>(error);
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T, E> {
  return result._tag === 'Ok';
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E, T> {
  return result._tag === 'Err';
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Run `fn`, turning errors accepted by `guard` into an Err.
 * Anything else thrown is rethrown untouched.
 *
 * @example
 * ```typescript
 * const result = tryCatch(() => parseSchema(text), isMarshalError);
 * ```
 */
export function tryCatch<T, E>(fn: () => T, guard: (error: unknown) => error is E): Result<T, E> {
  try {
    return ok<T, E>(fn());
  } catch (error) {
    if (guard(error)) {
      return err<E, T>(error);
    }
    throw error;
  }
}

/**
 * Combine Results into one; the first Err wins.
 */
export function all<T, E>(results: readonly Result<T, E>[]): Result<T[], E> {
  const values: T[] = [];

  for (const result of results) {
    if (isErr(result)) {
      return err<E, T[]>(result.error);
    }
    values.push(result.value);
  }

  return ok<T[], E>(values);
}
