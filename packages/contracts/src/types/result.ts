/**
 * A Result type for explicit, type-safe error handling.
 *
 * @example
 * ```typescript
 * const outcome = analyzeLevel(mapText, genome)
 *   .map((level) => level.grid.toText())
 *   .getOrElse("");
 * ```
 */
export class Result<T, E> {
  private constructor(
    private readonly state:
      | { readonly ok: true; readonly value: T }
      | { readonly ok: false; readonly error: E },
  ) {}

  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>({ ok: true, value });
  }

  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>({ ok: false, error });
  }

  /**
   * Run a function that might throw. Errors accepted by `guard` become an
   * Err; anything else is rethrown.
   */
  static fromThrowable<T, E>(
    fn: () => T,
    guard: (e: unknown) => e is E,
  ): Result<T, E> {
    try {
      return Result.ok(fn());
    } catch (e) {
      if (guard(e)) {
        return Result.err(e);
      }
      throw e;
    }
  }

  isOk(): boolean {
    return this.state.ok;
  }

  isErr(): boolean {
    return !this.state.ok;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return this.state.ok
      ? Result.ok(fn(this.state.value))
      : Result.err(this.state.error);
  }

  getOrElse(defaultValue: T): T {
    return this.state.ok ? this.state.value : defaultValue;
  }

  getOrThrow(): T {
    if (this.state.ok) {
      return this.state.value;
    }
    throw this.state.error;
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    return this.state.ok ? onOk(this.state.value) : onErr(this.state.error);
  }

  get value(): T {
    if (!this.state.ok) {
      throw new Error("Cannot access value of Err Result");
    }
    return this.state.value;
  }

  get error(): E {
    if (this.state.ok) {
      throw new Error("Cannot access error of Ok Result");
    }
    return this.state.error;
  }
}
