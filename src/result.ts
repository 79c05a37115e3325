/**
 * Result - the outcome of a computation as plain data
 *
 * Tasks never let an exception escape: whatever a queued action throws is
 * captured by `attempt` and carried forward as a `Failure`.
 */

import { TaskMisuseError, toError } from './errors.js';

export type Success<T> = { readonly ok: true; readonly value: T };
export type Failure<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = Success<T> | Failure<E>;

export function success<T>(value: T): Success<T> {
  return Object.freeze({ ok: true as const, value });
}

export function failure<E>(error: E): Failure<E> {
  return Object.freeze({ ok: false as const, error });
}

export function isSuccess<T, E>(result: Result<T, E>): result is Success<T> {
  return result.ok;
}

export function isFailure<T, E>(result: Result<T, E>): result is Failure<E> {
  return !result.ok;
}

/**
 * Dispatch on the variant without touching its fields directly.
 *
 * Throws `TaskMisuseError` for an object that carries neither variant,
 * which can only happen when a Result was forged outside this module.
 */
export function fold<T, E, A, B>(
  result: Result<T, E>,
  onSuccess: (value: T) => A,
  onFailure: (error: E) => B
): A | B {
  if (result.ok === true) return onSuccess(result.value);
  if (result.ok === false) return onFailure(result.error);
  throw new TaskMisuseError(`Fold on unsupported result status \`${String(Reflect.get(result, 'ok'))}\``);
}

/**
 * Run `thunk`, turning anything it throws into a `Failure`.
 */
export function attempt<T>(thunk: () => T): Result<T, Error> {
  try {
    return success(thunk());
  } catch (thrown) {
    return failure(toError(thrown));
  }
}

/**
 * `attempt` for thunks that may hand back a Promise. A rejection is
 * captured the same way a throw is.
 */
export async function attemptAsync<T>(thunk: () => T | PromiseLike<T>): Promise<Result<Awaited<T>, Error>> {
  try {
    return success(await thunk());
  } catch (thrown) {
    return failure(toError(thrown));
  }
}

/** Success value, or the error payload itself. */
export function get<T, E>(result: Result<T, E>): T | E {
  return fold(result, (value) => value, (error) => error);
}

/**
 * Success value, or the very same `Failure`.
 * Combinators use this so an error is never unwrapped twice.
 */
export function getOrFailure<T, E>(result: Result<T, E>): T | Failure<E> {
  return result.ok ? result.value : result;
}

export function getOr<T, E, U>(result: Result<T, E>, fallback: U): T | U {
  return result.ok ? result.value : fallback;
}

export function map<T, E, U>(result: Result<T, E>, f: (value: T) => U): Result<U, E | Error> {
  if (!result.ok) return result;
  const { value } = result;
  return attempt(() => f(value));
}

/** Collapse one level of `Success(Result)`. */
export function join<T, E1, E2>(result: Result<Result<T, E2>, E1>): Result<T, E1 | E2> {
  return result.ok ? result.value : result;
}

export function bind<T, E, U, E2>(
  result: Result<T, E>,
  f: (value: T) => Result<U, E2>
): Result<U, E | E2 | Error> {
  return join(map(result, f));
}

/**
 * Replace a failure with whatever `f` makes of its error.
 * The outcome of `f` is itself captured, so a throwing handler yields a new `Failure`.
 */
export function recover<T, E, U>(result: Result<T, E>, f: (error: E) => U): Result<T | U, Error> {
  if (result.ok) return result;
  const { error } = result;
  return attempt(() => f(error));
}

/** Like `recover`, for handlers that already answer with a Result. */
export function recoverWith<T, E, U, E2>(
  result: Result<T, E>,
  f: (error: E) => Result<U, E2>
): Result<T | U, E2 | Error> {
  if (result.ok) return result;
  const { error } = result;
  return join(attempt(() => f(error)));
}
