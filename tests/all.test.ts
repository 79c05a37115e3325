/**
 * Tests for parallel fan-out and sequencing
 */

import { describe, it, expect, vi } from 'vitest';
import {
  chain,
  get,
  inlineExecutor,
  mapply,
  peer,
  recover,
  run,
  sequenced,
  sequencedPar,
  task,
  zip,
  TaskMisuseError,
  type Executor,
  type Task
} from '../src/index.js';

// Helper to add delay
const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const valueOf = async <T>(source: Task<T>) => get(await run(source));

const after = <T>(ms: number, value: T) =>
  task(async () => {
    await delay(ms);
    return value;
  });

const failing = (message: string, ms = 0) =>
  task(async (): Promise<never> => {
    await delay(ms);
    throw new Error(message);
  });

describe('Parallel - Zip', () => {
  it('should collect values in declaration order', async () => {
    const result = await run(zip(task(() => 1), task(() => 2), task(() => 3)));

    expect(peer(result)).toEqual({ ok: true, value: [1, 2, 3] });
  });

  it('should keep declaration order whatever the completion order', async () => {
    expect(await valueOf(zip(after(30, 'a'), after(10, 'b'), after(20, 'c')))).toEqual(['a', 'b', 'c']);
  });

  it('should execute branches in parallel', async () => {
    const startTime = Date.now();

    const result = await valueOf(zip(after(50, 1), after(50, 2)));
    const elapsed = Date.now() - startTime;

    expect(result).toEqual([1, 2]);
    expect(elapsed).toBeLessThan(90); // Should be ~50ms, not ~100ms
  });

  it('should zip nothing into an empty tuple', async () => {
    expect(await valueOf(zip())).toEqual([]);
  });

  it('should handle nested parallel groups', async () => {
    expect(await valueOf(zip(zip(task(() => 1), task(() => 2)), task(() => 3)))).toEqual([[1, 2], 3]);
  });

  it('should handle parallel groups returned from a serial action', async () => {
    const t = chain(task(() => 1), (n) => zip(task(() => n), task(() => n + 1)));

    expect(await valueOf(t)).toEqual([1, 2]);
  });

  it('should continue serially after the gather', async () => {
    const t = chain(zip(task(() => 2), task(() => 3)), ([a, b]) => a * b);

    expect(await valueOf(t)).toBe(6);
  });

  it('should not run branches before the group runs', async () => {
    const body = vi.fn(() => 1);
    const group = zip(task(body), task(body));

    expect(body).not.toHaveBeenCalled();
    await run(group);
    expect(body).toHaveBeenCalledTimes(2);
  });
});

describe('Parallel - Failure', () => {
  it('should report the first failing branch in declaration order', async () => {
    const group = zip(task(() => 1), failing('first', 30), failing('second'));

    const error = await valueOf(group);

    expect(error).toBeInstanceOf(Error);
    expect(error).toHaveProperty('message', 'first');
  });

  it('should report every failing branch when asked to', async () => {
    const group = zip(task(() => 1), failing('first'), failing('second'));

    const error = await get(await run(group, { parallelFailure: 'all' }));

    expect(error).toBeInstanceOf(AggregateError);
    if (error instanceof AggregateError) {
      expect(error.message).toBe('2 of 3 parallel tasks failed');
      expect(error.errors.map((e: Error) => e.message)).toEqual(['first', 'second']);
    }
  });

  it('should wait for every branch before reporting', async () => {
    let finished = false;
    const slow = task(async () => {
      await delay(30);
      finished = true;
      return 1;
    });

    await run(zip(failing('fast'), slow));

    expect(finished).toBe(true);
  });

  it('should not call the gather when a branch fails', async () => {
    const gather = vi.fn((a: number, b: number) => a + b);

    await run(mapply(gather, task(() => 1), failing('nope')));

    expect(gather).not.toHaveBeenCalled();
  });

  it('should capture exceptions thrown by the gather', async () => {
    const t = mapply((): number => {
      throw new Error('gather failed');
    });

    expect(await valueOf(t)).toHaveProperty('message', 'gather failed');
  });

  it('should recover a broken group as a fresh serial task', async () => {
    const t = recover(zip(task(() => 1), failing('first'), failing('second')), (error) =>
      task(() => ['recovered', error.message])
    );

    const result = await run(t);

    expect(result.mode).toBe('serial');
    expect(peer(result)).toEqual({ ok: true, value: ['recovered', 'first'] });
  });

  it('should hand every error to the recovery under the all policy', async () => {
    const t = recover(zip(failing('first'), failing('second')), (error) =>
      error instanceof AggregateError ? error.errors.length : 0
    );

    expect(await get(await run(t, { parallelFailure: 'all' }))).toBe(2);
  });

  it('should recover failures of the steps after the gather', async () => {
    const t = recover(
      chain(zip(task(() => 1), task(() => 2)), (): number => {
        throw new Error('after gather');
      }),
      (error) => error.message
    );

    expect(await valueOf(t)).toBe('after gather');
  });
});

describe('Parallel - Mapply', () => {
  it('should combine values with the gather function', async () => {
    expect(await valueOf(mapply((a, b) => a + b, task(() => 2), task(() => 3)))).toBe(5);
  });

  it('should accept a gather returning a task', async () => {
    const t = mapply((a, b) => task(async () => `${a}-${b}`), task(() => 'x'), task(() => 'y'));

    expect(await valueOf(t)).toBe('x-y');
  });

  it('should reject non-tasks synchronously', () => {
    const notATask: Task<number> = JSON.parse('1');

    expect(() => mapply((a: number) => a, notATask)).toThrow('All values provided to `mapply` must be tasks');
    expect(() => zip(task(() => 1), notATask)).toThrow(TaskMisuseError);
  });

  it('should reject a gather whose arity does not match', () => {
    const gather = Object.defineProperty((...values: number[]) => values.length, 'length', { value: 2 });

    expect(() => mapply(gather, task(() => 1))).toThrow('Gather function takes 2 values but 1 tasks were given');
  });

  it('should launch one unit of work per branch through the executor', async () => {
    let spawned = 0;
    const counting: Executor = {
      spawn: (work) => {
        spawned += 1;
        return inlineExecutor.spawn(work);
      }
    };

    const result = await run(zip(task(() => 1), task(() => 2), task(() => 3)), { executor: counting });

    expect(peer(result)).toEqual({ ok: true, value: [1, 2, 3] });
    expect(spawned).toBe(3);
  });
});

describe('Parallel - Sequencing', () => {
  const tracked = () => {
    const state = { active: 0, peak: 0 };
    const make = (value: number) =>
      task(async () => {
        state.active += 1;
        state.peak = Math.max(state.peak, state.active);
        await delay(5);
        state.active -= 1;
        return value;
      });
    return { state, make };
  };

  it('should turn an array of tasks into a task of an array', async () => {
    expect(await valueOf(sequencedPar([task(() => 1), task(() => 2), task(() => 3)]))).toEqual([1, 2, 3]);
    expect(await valueOf(sequenced([task(() => 1), task(() => 2), task(() => 3)]))).toEqual([1, 2, 3]);
  });

  it('should keep sets as sets', async () => {
    const tasks = new Set([task(() => 1), task(() => 2), task(() => 3)]);

    expect(await valueOf(sequencedPar(tasks))).toEqual(new Set([1, 2, 3]));
    expect(await valueOf(sequenced(tasks))).toEqual(new Set([1, 2, 3]));
  });

  it('should accept any iterable', async () => {
    function* generate() {
      yield task(() => 'a');
      yield task(() => 'b');
    }

    expect(await valueOf(sequencedPar(generate()))).toEqual(['a', 'b']);
  });

  it('should run elements concurrently in sequencedPar', async () => {
    const { state, make } = tracked();

    expect(await valueOf(sequencedPar([make(0), make(1), make(2)]))).toEqual([0, 1, 2]);
    expect(state.peak).toBe(3);
  });

  it('should run elements one at a time in sequenced', async () => {
    const { state, make } = tracked();

    expect(await valueOf(sequenced([make(0), make(1), make(2)]))).toEqual([0, 1, 2]);
    expect(state.peak).toBe(1);
  });

  it('should run every element and report the first failure in sequenced', async () => {
    const last = vi.fn(() => 3);

    const error = await valueOf(sequenced([task(() => 1), failing('second'), task(last)]));

    expect(error).toHaveProperty('message', 'second');
    expect(last).toHaveBeenCalledTimes(1);
  });

  it('should report every failing element in sequenced under the all policy', async () => {
    const error = await get(await run(sequenced([failing('a'), task(() => 1), failing('b')]), { parallelFailure: 'all' }));

    expect(error).toBeInstanceOf(AggregateError);
    if (error instanceof AggregateError) {
      expect(error.message).toBe('2 of 3 parallel tasks failed');
      expect(error.errors.map((e: Error) => e.message)).toEqual(['a', 'b']);
    }
  });

  it('should hand the same payload to a recovery in sequenced and sequencedPar', async () => {
    const count = (error: Error) => (error instanceof AggregateError ? error.errors.length : -1);
    const options = { parallelFailure: 'all' } as const;

    expect(await get(await run(recover(sequenced([failing('a'), failing('b')]), count), options))).toBe(2);
    expect(await get(await run(recover(sequencedPar([failing('a'), failing('b')]), count), options))).toBe(2);
  });

  it('should keep the recovery of an element in sequenced', async () => {
    const element = recover(failing('a'), () => 7);

    expect(await valueOf(sequenced([element, task(() => 8)]))).toEqual([7, 8]);
  });

  it('should sequence an empty collection', async () => {
    expect(await valueOf(sequenced([]))).toEqual([]);
    expect(await valueOf(sequencedPar(new Set<Task<number>>()))).toEqual(new Set());
  });
});
