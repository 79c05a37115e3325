/**
 * Lazy composable tasks
 *
 * Build computation graphs of serial chains, recoverable branches and
 * parallel groups; nothing executes until `run` or `runAsync`.
 *
 * @example
 * import { task, chain, zip, recoverAs, run, get } from 'lazy-tasks';
 *
 * const profile = chain(task(() => loadUser(id)), (user) => loadProfile(user));
 * const page = zip(profile, task(() => loadSettings(id)));
 * const safe = recoverAs(page, [defaultProfile, defaultSettings]);
 *
 * const outcome = await get(await run(safe));
 */

export type { Task, TaskValue, TaskValues, Mode, Action, Recovery } from './core.js';
export {
  task,
  success,
  failure,
  fromResult,
  chain,
  thenDo,
  recover,
  recoverAs,
  peer,
  isTask,
  isDone,
  isExecuted,
  isFulfilled,
  isBroken
} from './core.js';
export { run, runAsync, wait, get, getOr } from './run.js';
export { mapply, zip, sequenced, sequencedPar } from './all.js';
export { doTasks, TaskComprehension } from './comprehension.js';
export { pmap } from './pmap.js';
export type { PMapOptions } from './pmap.js';
export { describeTask, formatTask } from './trace.js';
export type { TaskSnapshot, TaskStatus } from './trace.js';
export { configure, resetConfiguration, defaultExecutor, inlineExecutor, noopLogger } from './config.js';
export type { Executor, Logger, ParallelFailure, RunOptions } from './config.js';
export { TaskError, TaskMisuseError, TaskTimeoutError } from './errors.js';
export type { Result, Success, Failure } from './result.js';
export * as result from './result.js';
