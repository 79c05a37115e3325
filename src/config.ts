/**
 * Run configuration
 *
 * Every entry point that executes tasks takes optional `RunOptions`;
 * anything left out falls back to the process-wide defaults set with
 * `configure`.
 */

/**
 * Starts a unit of concurrent work. One `spawn` happens per `runAsync`,
 * which includes every branch of a parallel group.
 *
 * A bounded pool can be plugged in here. Keep in mind that a parallel
 * group holds its own slot while it waits for its branches, so a pool
 * smaller than the nesting depth of parallel groups never drains.
 */
export interface Executor {
  spawn<T>(work: () => Promise<T>): Promise<T>;
}

/**
 * Subset of a pino logger; `pino()` instances satisfy it as they are.
 */
export interface Logger {
  debug(bindings: Record<string, unknown>, message: string): void;
  warn(bindings: Record<string, unknown>, message: string): void;
}

/**
 * How a parallel group reports broken branches:
 * - `first` - the error of the first broken branch in declaration order
 * - `all` - an `AggregateError` holding every broken branch's error
 */
export type ParallelFailure = 'first' | 'all';

export type RunOptions = {
  executor?: Executor;
  logger?: Logger;
  parallelFailure?: ParallelFailure;
};

export type RunContext = Readonly<Required<RunOptions>>;

/** Work starts on a later microtask, never before `spawn` returns. */
export const defaultExecutor: Executor = {
  spawn: (work) => Promise.resolve().then(work)
};

/** Work starts synchronously inside `spawn`, up to its first await. */
export const inlineExecutor: Executor = {
  spawn: (work) => work()
};

export const noopLogger: Logger = {
  debug: () => {},
  warn: () => {}
};

const builtInDefaults: RunContext = Object.freeze({
  executor: defaultExecutor,
  logger: noopLogger,
  parallelFailure: 'first'
});

let defaults: RunContext = builtInDefaults;

/**
 * Replace the process-wide defaults. Options not named keep their
 * current value.
 */
export function configure(options: RunOptions): RunContext {
  defaults = resolveOptions(options);
  return defaults;
}

export function resetConfiguration(): void {
  defaults = builtInDefaults;
}

export function resolveOptions(options: RunOptions = {}): RunContext {
  return Object.freeze({
    executor: options.executor ?? defaults.executor,
    logger: options.logger ?? defaults.logger,
    parallelFailure: options.parallelFailure ?? defaults.parallelFailure
  });
}
