type ResultState<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * A Result type for explicit, type-safe error handling.
 *
 * @example
 * ```typescript
 * const outcome = await accounts.verify(username, password);
 * outcome.match({
 *   ok: (account) => spawn(account),
 *   err: (reason) => reject(reason),
 * });
 * ```
 */
export class Result<T, E> {
  private constructor(private readonly state: ResultState<T, E>) {}

  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>({ ok: true, value });
  }

  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>({ ok: false, error });
  }

  /**
   * Create a Result from a function that might throw.
   */
  static fromThrowable<T, E>(fn: () => T, onError: (e: unknown) => E): Result<T, E> {
    try {
      return Result.ok(fn());
    } catch (e) {
      return Result.err(onError(e));
    }
  }

  isOk(): boolean {
    return this.state.ok;
  }

  isErr(): boolean {
    return !this.state.ok;
  }

  /** The value, or undefined for an error result. */
  get value(): T | undefined {
    return this.state.ok ? this.state.value : undefined;
  }

  /** The error, or undefined for a success result. */
  get error(): E | undefined {
    return this.state.ok ? undefined : this.state.error;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return this.state.ok ? Result.ok(fn(this.state.value)) : Result.err(this.state.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    return this.state.ok ? Result.ok(this.state.value) : Result.err(fn(this.state.error));
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    return this.state.ok ? fn(this.state.value) : Result.err(this.state.error);
  }

  getOrElse(defaultValue: T): T {
    return this.state.ok ? this.state.value : defaultValue;
  }

  getOrThrow(): T {
    if (this.state.ok) return this.state.value;
    const { error } = this.state;
    throw error instanceof Error ? error : new Error(String(error));
  }

  match<U>(handlers: { ok: (value: T) => U; err: (error: E) => U }): U {
    return this.state.ok ? handlers.ok(this.state.value) : handlers.err(this.state.error);
  }
}

export const Ok = Result.ok;
export const Err = Result.err;
