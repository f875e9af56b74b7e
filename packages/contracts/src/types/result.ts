/**
 * A Result type for explicit, type-safe error handling.
 *
 * Every per-attempt step of level generation (placing a room, connecting
 * rooms, carving a corridor) returns a Result so the generator can decide
 * whether to retry or give up.
 *
 * @example
 * ```typescript
 * const placed = placeRoom(region, rooms, rng, config)
 *   .map((rect) => grid.commitRoom(rect))
 *   .getOrElse(null);
 * ```
 */

type ResultState<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export class Result<T, E> {
  private constructor(private readonly state: ResultState<T, E>) {}

  /**
   * Create a successful Result containing a value.
   */
  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>({ ok: true, value });
  }

  /**
   * Create a failed Result containing an error.
   */
  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>({ ok: false, error });
  }

  isOk(): boolean {
    return this.state.ok;
  }

  isErr(): boolean {
    return !this.state.ok;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    if (this.state.ok) {
      return Result.ok(fn(this.state.value));
    }
    return Result.err(this.state.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    if (this.state.ok) {
      return Result.ok(this.state.value);
    }
    return Result.err(fn(this.state.error));
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    if (this.state.ok) {
      return fn(this.state.value);
    }
    return Result.err(this.state.error);
  }

  getOrElse<D>(defaultValue: D): T | D {
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

  tapErr(fn: (error: E) => void): Result<T, E> {
    if (!this.state.ok) {
      fn(this.state.error);
    }
    return this;
  }

  get success(): boolean {
    return this.state.ok;
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

export const Ok = Result.ok;
export const Err = Result.err;
