/**
 * Parallel map over the task engine.
 */

import { availableParallelism } from 'node:os';
import { TaskMisuseError } from './errors.js';
import { task } from './core.js';
import type { Task } from './core.js';
import { mapply } from './all.js';

export type PMapOptions = {
  /** Upper bound on the number of chunks. Defaults to the number of CPUs. */
  partitions?: number;
};

/**
 * Split `items` into contiguous chunks, map each chunk in its own branch
 * and concatenate the chunks back in order.
 *
 * @example
 * const squares = await get(await run(pmap((n: number) => n * n, [1, 2, 3, 4])));
 * // [1, 4, 9, 16]
 */
export function pmap<T, U>(f: (item: T) => U, items: readonly T[], options: PMapOptions = {}): Task<U[]> {
  const partitions = options.partitions ?? availableParallelism();
  if (!Number.isInteger(partitions) || partitions < 1) {
    throw new TaskMisuseError(`\`pmap\` needs a positive whole number of partitions, got ${partitions}`);
  }

  const size = Math.max(1, Math.ceil(items.length / partitions));
  const chunks: Task<U[]>[] = [];
  for (let start = 0; start < items.length; start += size) {
    const chunk = items.slice(start, start + size);
    chunks.push(task(() => chunk.map((item) => f(item))));
  }

  return mapply((...mapped: U[][]) => mapped.reduce<U[]>((all, chunk) => all.concat(chunk), []), ...chunks);
}
