/**
 * Error types raised or carried by the task engine.
 *
 * Failures produced by user code travel as data inside a `Result`.
 * Only `TaskMisuseError` is ever thrown at the caller.
 */

/**
 * Wraps a thrown value that is not an `Error` (a string, a number, ...).
 * The original value is kept on `cause`.
 */
export class TaskError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TaskError';
  }
}

/**
 * A precondition violation: a non-task passed where a task is required,
 * a gather function whose arity does not match its tasks, and the like.
 */
export class TaskMisuseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaskMisuseError';
  }
}

/** Default failure payload when `wait` gives up on a pending task. */
export class TaskTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Task did not complete within ${timeoutMs}ms`);
    this.name = 'TaskTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) return thrown;
  return new TaskError(String(thrown), { cause: thrown });
}
