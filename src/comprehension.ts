/**
 * Task comprehensions
 *
 * Sugar for chains whose later steps need the values of earlier ones.
 * Each binding is lifted with `task(...)`, so it may produce a plain
 * value, a Promise or a Task; the chain is folded from the right into
 * nested `chain` calls and stays lazy until run.
 *
 * @example
 * const total = doTasks()
 *   .bind('user', () => fetchUserTask)
 *   .bind('orders', ({ user }) => fetchOrdersTask(user.id))
 *   .recoverAs([])
 *   .yield(({ orders }) => orders.length);
 *
 * // same as
 * chain(task(() => fetchUserTask), (user) =>
 *   chain(task(() => fetchOrdersTask(user.id)), (orders) => task(() => orders.length)));
 */

import { recover, task, chain } from './core.js';
import type { Task } from './core.js';

type Lifted<V> = V | Task<V> | PromiseLike<V>;

type Binding = {
  readonly name: string;
  readonly expression: { bivarianceHack(scope: unknown): unknown }['bivarianceHack'];
};

type Trailer<R> = { readonly handle: (error: Error) => Lifted<R> };

export class TaskComprehension<S extends object, R = never> {
  private constructor(
    private readonly bindings: readonly Binding[],
    private readonly trailer?: Trailer<R>
  ) {}

  static empty(): TaskComprehension<Record<never, never>> {
    return new TaskComprehension<Record<never, never>>([]);
  }

  /**
   * Bind the value of `expression` to `name` for every later step.
   * A name can only be bound once.
   */
  bind<K extends string, V>(
    name: Exclude<K, keyof S>,
    expression: (scope: S) => Lifted<V>
  ): TaskComprehension<S & { readonly [P in K]: V }, R> {
    return new TaskComprehension<S & { readonly [P in K]: V }, R>(
      [...this.bindings, { name, expression }],
      this.trailer
    );
  }

  /** Recover the whole composed chain with `handle`. */
  recover<R2>(handle: (error: Error) => Lifted<R2>): TaskComprehension<S, R2> {
    return new TaskComprehension<S, R2>(this.bindings, { handle });
  }

  recoverAs<R2>(value: R2): TaskComprehension<S, R2> {
    return this.recover(() => value);
  }

  /** Compose the chain, ending in `body`. */
  yield<U>(body: (scope: S) => Lifted<U>): Task<U | R> {
    const finish: { bivarianceHack(scope: unknown): Lifted<U> }['bivarianceHack'] = body;

    const build = (index: number, scope: Record<string, unknown>): Task<U> => {
      const binding = this.bindings[index];
      if (!binding) return task(() => finish(scope));
      return chain(task(() => binding.expression(scope)), (value) =>
        build(index + 1, { ...scope, [binding.name]: value })
      );
    };

    const composed = build(0, {});
    return this.trailer ? recover(composed, this.trailer.handle) : composed;
  }
}

export function doTasks(): TaskComprehension<Record<never, never>> {
  return TaskComprehension.empty();
}
