/**
 * Task - Lazy composable computation
 *
 * A Task is a resolved-or-pending value plus a queue of actions still to be
 * applied to it. Composing a Task never runs anything; `run` and `runAsync`
 * drain the queue.
 */

import { Handle } from './handle.js';
import { TaskError, TaskMisuseError, toError } from './errors.js';
import * as R from './result.js';
import type { Result } from './result.js';

export type Mode = 'serial' | 'parallel';

/**
 * A queued step. The value it receives is whatever the previous step
 * produced, so its static type is dropped once it joins the queue.
 * Method syntax keeps parameters bivariant, which lets any unary function in.
 */
export type Action = { bivarianceHack(value: unknown): unknown }['bivarianceHack'];

/** Turns a failure payload into a replacement value or Task. */
export type Recovery = { bivarianceHack(error: Error): unknown }['bivarianceHack'];

/**
 * Task node
 *
 * @template T - Value type the task yields once all its actions have run
 */
export class Task<T> {
  /** Static value type only; never set. */
  declare readonly _value?: T;

  constructor(
    readonly mode: Mode,
    readonly handle: Handle<Result<unknown>>,
    readonly actions: readonly Action[],
    readonly recovery?: Recovery
  ) {
    Object.freeze(this);
  }
}

export type TaskValue<TTask> = TTask extends Task<infer U> ? U : never;

export type TaskValues<T extends readonly Task<unknown>[]> = {
  -readonly [K in keyof T]: TaskValue<T[K]>;
};

export function isTask(value: unknown): value is Task<unknown> {
  return value instanceof Task;
}

export function assertTask(value: unknown, operation: string): asserts value is Task<unknown> {
  if (!isTask(value)) {
    throw new TaskMisuseError(`First argument to \`${operation}\` must always be a Task`);
  }
}

/**
 * Spent task over an already known result.
 */
export function fromResult<T>(result: Result<T>): Task<T> {
  return new Task<T>('serial', Handle.resolved(result), []);
}

/**
 * Lazily wrap a computation. `thunk` may return a plain value, a Promise
 * or another Task.
 *
 * @example
 * const two = task(() => 1 + 1);
 * const three = chain(two, (n) => n + 1);
 * await get(await run(three)); // 3
 */
export function task<T>(thunk: () => T | Task<T> | PromiseLike<T>): Task<T> {
  return new Task<T>('serial', Handle.resolved(R.success(undefined)), [() => thunk()]);
}

export function success<T>(value: T): Task<T> {
  return fromResult(R.success(value));
}

export function failure<T = never>(reason: string | Error): Task<T> {
  return fromResult<T>(R.failure(typeof reason === 'string' ? new TaskError(reason) : toError(reason)));
}

/**
 * Queue `f` to run on the task's value. `f` may return a plain value, a
 * Promise or another Task; either way nothing runs until the result is
 * executed.
 *
 * A task that is already known to be broken short-circuits without
 * queueing. A task carrying a recovery is nested as the value of a new
 * node, so its recovery only guards the steps queued before `recover`
 * and the chain goes on after a successful recovery.
 */
export function chain<T, U>(source: Task<T>, f: (value: T) => U | Task<U> | PromiseLike<U>): Task<U> {
  assertTask(source, 'chain');

  if (source.recovery) {
    return new Task<U>('serial', Handle.resolved(R.success(source)), [f]);
  }

  const settled = source.handle.peek();
  if (settled && !settled.ok) {
    return new Task<U>('serial', source.handle, []);
  }

  return new Task<U>(source.mode, source.handle, [...source.actions, f]);
}

/**
 * Queue a side effect. The task's value passes through unchanged; if `f`
 * returns a Task, it runs before the chain continues.
 */
export function thenDo<T>(source: Task<T>, f: () => unknown): Task<T> {
  assertTask(source, 'thenDo');
  return chain<T, T>(source, (value) => {
    const effect = f();
    return isTask(effect) ? chain(effect, () => value) : value;
  });
}

/**
 * Attach a recovery. On failure the whole node is replaced by a fresh
 * serial task built from `f(error)`.
 */
export function recover<T, U>(
  source: Task<T>,
  f: (error: Error) => U | Task<U> | PromiseLike<U>
): Task<T | U> {
  assertTask(source, 'recover');
  return new Task<T | U>(source.mode, source.handle, source.actions, f);
}

export function recoverAs<T, U>(source: Task<T>, value: U): Task<T | U> {
  return recover(source, () => value);
}

/**
 * The resolved result, or `undefined` while the handle is pending.
 * Never waits. For a task with queued actions this is the value those
 * actions will start from.
 */
export function peer<T>(source: Task<T>): Result<T> | undefined {
  assertTask(source, 'peer');
  // the handle holds a T once the queue is drained, or the start value the queue runs from
  return source.handle.peek() as Result<T> | undefined;
}

/**
 * Wait for the handle of a drained task.
 * Throws `TaskMisuseError` right away if actions are still queued, since
 * the handle then holds an intermediate value rather than a T.
 */
export function outcome<T>(source: Task<T>, operation: string): Promise<Result<T>> {
  assertTask(source, operation);
  if (source.actions.length > 0) {
    throw new TaskMisuseError(`\`${operation}\` needs an executed task, run it first`);
  }
  // a drained queue leaves the final value, a T, in the handle
  return source.handle.settled() as Promise<Result<T>>;
}

export function isDone(source: Task<unknown>): boolean {
  assertTask(source, 'isDone');
  return source.handle.isSettled;
}

export function isExecuted(source: Task<unknown>): boolean {
  return isDone(source) && source.actions.length === 0;
}

export function isFulfilled(source: Task<unknown>): boolean {
  return isDone(source) && peer(source)?.ok === true;
}

export function isBroken(source: Task<unknown>): boolean {
  return isDone(source) && peer(source)?.ok === false;
}
