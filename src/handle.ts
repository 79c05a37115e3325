/**
 * Handle - a write-once cell over a Promise
 *
 * Unlike a bare Promise, a Handle can be inspected synchronously, which is
 * what lets the status predicates answer without ever waiting.
 */

type Completed<T> = { status: 'settled'; value: T } | { status: 'defect'; error: unknown };

export class Handle<T> {
  private state: { status: 'pending' } | Completed<T>;
  private readonly completion: Promise<Completed<T>>;

  private constructor(source: { value: T } | { promise: Promise<T> }) {
    if ('value' in source) {
      const completed: Completed<T> = { status: 'settled', value: source.value };
      this.state = completed;
      this.completion = Promise.resolve(completed);
      return;
    }

    this.state = { status: 'pending' };
    this.completion = source.promise.then(
      (value) => this.complete({ status: 'settled', value }),
      (error: unknown) => this.complete({ status: 'defect', error })
    );
  }

  /** An already completed handle. */
  static resolved<T>(value: T): Handle<T> {
    return new Handle({ value });
  }

  /**
   * Completes when `promise` fulfils. A rejection is not a task failure
   * but an engine defect: it is held until someone waits on the handle
   * and rethrown from `settled()`.
   */
  static from<T>(promise: Promise<T>): Handle<T> {
    return new Handle({ promise });
  }

  get isSettled(): boolean {
    return this.state.status === 'settled';
  }

  peek(): T | undefined {
    return this.state.status === 'settled' ? this.state.value : undefined;
  }

  settled(): Promise<T> {
    return this.completion.then((completed) => {
      if (completed.status === 'defect') throw completed.error;
      return completed.value;
    });
  }

  /**
   * Wait at most `timeoutMs`, answering `fallback()` if the handle is
   * still pending by then. The pending computation keeps running.
   */
  within<U>(timeoutMs: number, fallback: () => U): Promise<T | U> {
    if (this.state.status === 'settled') return Promise.resolve(this.state.value);

    return new Promise<T | U>((resolve, reject) => {
      const timer = setTimeout(() => resolve(fallback()), timeoutMs);
      this.settled().then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  private complete(completed: Completed<T>): Completed<T> {
    this.state = completed;
    return completed;
  }
}
