/**
 * Task inspection utilities
 *
 * Snapshot a task's state for debugging without forcing anything.
 */

import { inspect } from 'node:util';
import { assertTask, peer } from './core.js';
import type { Mode, Task } from './core.js';

export type TaskStatus = 'pending' | 'fulfilled' | 'broken';

export type TaskSnapshot = {
  mode: Mode;
  status: TaskStatus;
  pendingActions: number;
  recoverable: boolean;
  value?: unknown;
  error?: Error;
};

/**
 * Get a plain snapshot of a task
 *
 * `value` is the resolved value when the task is fulfilled; with actions
 * still queued that is the value they will start from.
 *
 * @example
 * describeTask(await run(task(() => 2)));
 * // { mode: 'serial', status: 'fulfilled', pendingActions: 0, recoverable: false, value: 2 }
 */
export function describeTask(source: Task<unknown>): TaskSnapshot {
  assertTask(source, 'describeTask');
  const result = peer(source);
  const snapshot: TaskSnapshot = {
    mode: source.mode,
    status: result === undefined ? 'pending' : result.ok ? 'fulfilled' : 'broken',
    pendingActions: source.actions.length,
    recoverable: source.recovery !== undefined
  };

  if (result?.ok) snapshot.value = result.value;
  else if (result) snapshot.error = result.error;
  return snapshot;
}

/**
 * Render a task on one line
 *
 * @example
 * formatTask(await run(task(() => 2)));                  // 'Task<serial fulfilled> 2'
 * formatTask(zip(task(() => 1), task(() => 2)));         // 'Task<parallel fulfilled, 1 pending action>'
 * formatTask(await run(task(() => { throw 'HA'; })));   // 'Task<serial broken> TaskError: HA'
 */
export function formatTask(source: Task<unknown>): string {
  const snapshot = describeTask(source);
  const flags = [snapshot.mode, snapshot.status].join(' ');
  const pending =
    snapshot.pendingActions === 0
      ? ''
      : `, ${snapshot.pendingActions} pending action${snapshot.pendingActions === 1 ? '' : 's'}`;
  const recoverable = snapshot.recoverable ? ', recoverable' : '';
  const head = `Task<${flags}${pending}${recoverable}>`;

  if (snapshot.pendingActions > 0 || snapshot.status === 'pending') return head;
  if (snapshot.error) return `${head} ${snapshot.error.name}: ${snapshot.error.message}`;
  return `${head} ${inspect(snapshot.value, { depth: 2, breakLength: Infinity })}`;
}
