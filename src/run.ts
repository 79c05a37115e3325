/**
 * Task execution runtime
 *
 * Drains a task's action queue. Serial nodes are reduced step by step;
 * parallel nodes launch every branch, wait for all of them and hand the
 * values to their gather function.
 */

import { Handle } from './handle.js';
import { TaskMisuseError, TaskTimeoutError } from './errors.js';
import { resolveOptions } from './config.js';
import type { RunContext, RunOptions } from './config.js';
import { Task, assertTask, isTask, outcome, task } from './core.js';
import type { Recovery } from './core.js';
import * as R from './result.js';
import type { Result } from './result.js';

/**
 * Execute a task and wait for it.
 *
 * The returned task is spent: its handle holds the final result and its
 * queue is empty. Composing onto it again only queues new work; running
 * that only runs the new suffix.
 *
 * @example
 * const spent = await run(chain(task(() => 1 + 1), (n) => n * 10));
 * peer(spent); // { ok: true, value: 20 }
 */
export function run<T>(source: Task<T>, options?: RunOptions): Promise<Task<T>> {
  assertTask(source, 'run');
  const context = resolveOptions(options);

  context.logger.debug({ mode: source.mode, actions: source.actions.length }, 'running task');
  return interpret(source, context).then((result) => {
    context.logger.debug({ ok: result.ok }, 'task finished');
    return new Task<T>('serial', Handle.resolved(result), []);
  });
}

/**
 * Start executing a task without waiting for it. The returned task is
 * pending until the work completes; `chain` on it queues after the
 * in-flight work without touching it.
 */
export function runAsync<T>(source: Task<T>, options?: RunOptions): Task<T> {
  assertTask(source, 'runAsync');
  return spawn(source, resolveOptions(options));
}

/**
 * Wait for a task's handle.
 *
 * With a timeout, a handle still pending when it elapses yields a spent
 * task holding `fallback`, or a `TaskTimeoutError` failure when no fallback
 * is given. The work behind the handle is not stopped.
 */
export function wait<T>(source: Task<T>, timeoutMs?: number): Promise<Task<T>>;
export function wait<T, U>(source: Task<T>, timeoutMs: number, fallback: U): Promise<Task<T | U>>;
export function wait<T, U>(source: Task<T>, timeoutMs?: number, ...fallback: [] | [U]): Promise<Task<T | U>> {
  assertTask(source, 'wait');

  if (timeoutMs === undefined) {
    return source.handle
      .settled()
      .then((result) => new Task<T>(source.mode, Handle.resolved(result), source.actions, source.recovery));
  }

  const timedOut = (): Result<U> =>
    fallback.length === 1 ? R.success(fallback[0]) : R.failure(new TaskTimeoutError(timeoutMs));

  return source.handle.within(timeoutMs, () => undefined).then((result) =>
    result === undefined
      ? new Task<T | U>('serial', Handle.resolved(timedOut()), [])
      : new Task<T | U>(source.mode, Handle.resolved(result), source.actions, source.recovery)
  );
}

/**
 * Value of an executed task, or its error.
 * Throws `TaskMisuseError` if the task still has queued actions.
 */
export function get<T>(source: Task<T>): Promise<T | Error> {
  return outcome(source, 'get').then((result) => R.get(result));
}

export function getOr<T, U>(source: Task<T>, fallback: U): Promise<T | U> {
  return outcome(source, 'getOr').then((result) => R.getOr(result, fallback));
}

function spawn<T>(source: Task<T>, context: RunContext): Task<T> {
  const work = context.executor.spawn(() => interpret(source, context));
  return new Task<T>('serial', Handle.from(work), []);
}

function interpret(source: Task<unknown>, context: RunContext): Promise<Result<unknown>> {
  return source.mode === 'parallel' ? executeParallel(source, context) : execute(source, context);
}

/**
 * Serial interpreter. Applies queued actions left to right, descending
 * into any Task an action hands back before moving on.
 */
async function execute(source: Task<unknown>, context: RunContext): Promise<Result<unknown>> {
  let result = await source.handle.settled();
  let actions = source.actions;

  for (;;) {
    if (!result.ok) {
      return source.recovery ? recoverFrom(source.recovery, result.error, context) : result;
    }

    const { value } = result;
    if (isTask(value)) {
      result = value.mode === 'parallel' ? await executeParallel(value, context) : await execute(value, context);
      continue;
    }

    const [next, ...rest] = actions;
    if (!next) return result;

    result = await R.attemptAsync(() => next(value));
    actions = rest;
  }
}

/**
 * Parallel interpreter. The node's value is its branches and its first
 * action is the gather function; later actions run serially afterwards.
 */
async function executeParallel(source: Task<unknown>, context: RunContext): Promise<Result<unknown>> {
  const settled = await source.handle.settled();
  if (!settled.ok) {
    return source.recovery ? recoverFrom(source.recovery, settled.error, context) : settled;
  }

  const branches = settled.value;
  const [gather, ...rest] = source.actions;
  if (!Array.isArray(branches) || !branches.every(isTask) || !gather) {
    context.logger.warn({ mode: source.mode }, 'parallel task without branches or gather');
    throw new TaskMisuseError('A parallel task must hold an array of tasks and a gather function');
  }

  context.logger.debug({ branches: branches.length }, 'launching parallel branches');
  const launched = branches.map((branch) => spawn(branch, context));
  const results = await Promise.all(launched.map((branch) => branch.handle.settled()));

  const values: unknown[] = [];
  const errors: Error[] = [];
  for (const result of results) {
    if (result.ok) values.push(result.value);
    else errors.push(result.error);
  }

  if (errors.length === 0) {
    const gathered = await R.attemptAsync(() => gather(values));
    return execute(new Task<unknown>('serial', Handle.resolved(gathered), rest, source.recovery), context);
  }

  const error =
    context.parallelFailure === 'all'
      ? new AggregateError(errors, `${errors.length} of ${branches.length} parallel tasks failed`)
      : errors[0];

  if (source.recovery) return recoverFrom(source.recovery, error, context);

  context.logger.debug({ failed: errors.length, branches: branches.length }, 'parallel task broken');
  return R.failure(error);
}

/**
 * Recovery always re-enters as a fresh serial task, whatever the mode of
 * the node that failed.
 */
function recoverFrom(recovery: Recovery, error: Error, context: RunContext): Promise<Result<unknown>> {
  context.logger.debug({ error: error.message }, 'recovering from failure');
  return execute(task(() => recovery(error)), context);
}
