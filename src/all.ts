/**
 * Fan-out combinators.
 *
 * `mapply` is the single way to build a parallel task: its value is the
 * list of branch tasks and its only action gathers their values. Results
 * always come back in declaration order, whatever order the branches
 * complete in.
 */

import { Handle } from './handle.js';
import { TaskMisuseError } from './errors.js';
import { Task, chain, fromResult, isTask, recover } from './core.js';
import type { TaskValues } from './core.js';
import * as R from './result.js';
import type { Result } from './result.js';

function assertTasks(values: readonly unknown[], operation: string): asserts values is readonly Task<unknown>[] {
  if (!values.every(isTask)) {
    throw new TaskMisuseError(`All values provided to \`${operation}\` must be tasks`);
  }
}

/**
 * Run `tasks` in parallel and combine their values with `f`.
 *
 * `f` receives one argument per task. A function declaring a fixed
 * number of parameters must declare exactly one per task; rest parameters
 * accept any count.
 *
 * @example
 * const sum = mapply((a, b) => a + b, task(() => 1), task(() => 2));
 */
export function mapply<const TDeps extends readonly Task<unknown>[], U>(
  f: (...values: TaskValues<TDeps>) => U | Task<U> | PromiseLike<U>,
  ...tasks: TDeps
): Task<U> {
  assertTasks(tasks, 'mapply');
  if (f.length > 0 && f.length !== tasks.length) {
    throw new TaskMisuseError(`Gather function takes ${f.length} values but ${tasks.length} tasks were given`);
  }

  const gather = (values: TaskValues<TDeps>) => f(...values);
  return new Task<U>('parallel', Handle.resolved(R.success([...tasks])), [gather]);
}

/**
 * Run `tasks` in parallel; resolves to a tuple of their values.
 *
 * @example
 * const [user, posts] = await get(await run(zip(userTask, postsTask)));
 */
export function zip<const TDeps extends readonly Task<unknown>[]>(...tasks: TDeps): Task<TaskValues<TDeps>> {
  assertTasks(tasks, 'zip');
  return mapply((...values: TaskValues<TDeps>) => values, ...tasks);
}

/**
 * Turn a collection of tasks into a task of a collection, running the
 * elements in parallel. A `Set` comes back as a `Set`; any other
 * iterable comes back as an array in iteration order.
 */
export function sequencedPar<T>(tasks: ReadonlySet<Task<T>>): Task<Set<T>>;
export function sequencedPar<T>(tasks: Iterable<Task<T>>): Task<T[]>;
export function sequencedPar<T>(tasks: Iterable<Task<T>>): Task<Set<T> | T[]> {
  const elements = [...tasks];
  assertTasks(elements, 'sequencedPar');
  return reshape(tasks, zip(...elements));
}

/**
 * Like `sequencedPar`, but each element only starts once the previous
 * one has finished. Every element runs whatever happens to the others,
 * and broken elements are reported under the same `parallelFailure`
 * policy as `sequencedPar`.
 */
export function sequenced<T>(tasks: ReadonlySet<Task<T>>): Task<Set<T>>;
export function sequenced<T>(tasks: Iterable<Task<T>>): Task<T[]>;
export function sequenced<T>(tasks: Iterable<Task<T>>): Task<Set<T> | T[]> {
  const elements = [...tasks];
  assertTasks(elements, 'sequenced');

  const collected = elements.reduce<Task<Result<T>[]>>(
    (acc, element) => chain(acc, (results) => chain(settle(element), (result) => [...results, result])),
    fromResult<Result<T>[]>(R.success([]))
  );
  // finished elements go through a group so failures are reported as zip reports them
  const gathered = chain(collected, (results) => zip(...results.map((result) => fromResult(result))));
  return reshape(tasks, gathered);
}

// Turns a broken element into a successful Failure so the next one still runs.
function settle<T>(element: Task<T>): Task<Result<T>> {
  return recover(
    chain(element, (value) => R.success(value)),
    (error) => R.failure(error)
  );
}

function reshape<T>(input: Iterable<Task<T>>, values: Task<T[]>): Task<Set<T> | T[]> {
  return input instanceof Set ? chain(values, (collected) => new Set(collected)) : values;
}
