/**
 * Result Type - explicit success/failure values
 *
 * Used where a miss is a normal outcome (a patient that is not on file)
 * rather than an exceptional one.
 *
 * @example
 * ```ts
 * const visits = service.findPatient('222').map((patient) => patient.appointments.length);
 * if (visits.isOk) {
 *   console.log(visits.value);
 * }
 * ```
 *
 * @module types/result
 */

/**
 * Discriminated union representing success or failure.
 */
export type Result<T, E> = Ok<T, E> | Err<T, E>;

interface ResultMethods<T, E> {
  map<U>(fn: (value: T) => U): Result<U, E>;
  unwrap(): T;
  unwrapErr(): E;
  toNullable(): T | null;
}

/**
 * Success variant of Result
 */
export interface Ok<T, E> extends ResultMethods<T, E> {
  readonly _tag: 'Ok';
  readonly value: T;
  readonly isOk: true;
  readonly isErr: false;
}

/**
 * Failure variant of Result
 */
export interface Err<T, E> extends ResultMethods<T, E> {
  readonly _tag: 'Err';
  readonly error: E;
  readonly isOk: false;
  readonly isErr: true;
}

/**
 * Create a success Result
 */
export function Ok<T, E = never>(value: T): Result<T, E> {
  const ok: Ok<T, E> = {
    _tag: 'Ok',
    value,
    isOk: true,
    isErr: false,
    map: (fn) => Ok(fn(value)),
    unwrap: () => value,
    unwrapErr: () => {
      throw new Error('Called unwrapErr on an Ok result');
    },
    toNullable: () => value,
  };
  return ok;
}

/**
 * Create a failure Result
 */
export function Err<T = never, E = unknown>(error: E): Result<T, E> {
  const err: Err<T, E> = {
    _tag: 'Err',
    error,
    isOk: false,
    isErr: true,
    map: () => Err(error),
    unwrap: () => {
      throw error instanceof Error ? error : new Error(`Called unwrap on an Err result`);
    },
    unwrapErr: () => error,
    toNullable: () => null,
  };
  return err;
}

/**
 * Type guard for Ok variant
 */
export function isOk<T, E>(result: Result<T, E>): result is Ok<T, E> {
  return result._tag === 'Ok';
}

/**
 * Type guard for Err variant
 */
export function isErr<T, E>(result: Result<T, E>): result is Err<T, E> {
  return result._tag === 'Err';
}
