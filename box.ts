import { type TaggedError, type UnknownError, unknownError } from "./error.ts";
import {
  match,
  type MatchConfig,
  matchExhaustive,
  type MatchHandlers,
} from "./matcher.ts";
import { none, type Option, some } from "./option.ts";
import { describePayload, panic } from "./panic.ts";
import {
  equals,
  type Equivalence,
  err,
  isErr,
  isErrAnd,
  isOk,
  isOkAnd,
  ok,
  type Result,
} from "./result.ts";

/**
 * A wrapper class providing a fluent API over a {@link Result}.
 * A Box never changes after construction: every combinator returns a new
 * Box (or this one, when nothing changes), so sharing a Box is always safe.
 *
 * @typeParam T - The success value type
 * @typeParam E - The error type
 *
 * @example
 * ```typescript
 * const doubled = Box.ok(5)
 *   .map((x) => x * 2)
 *   .andThen((x): Box<number, string> =>
 *     x > 5 ? Box.ok(x) : Box.err("too small")
 *   )
 *   .unwrap(); // 10
 *
 * const recovered = Box.err<string, number>("boom")
 *   .orElse(() => Box.ok(42))
 *   .unwrap(); // 42
 *
 * // Err payloads are usually tagged errors
 * const UserErrors = defineErrors({
 *   NotFound: { id: t.string },
 *   Suspended: undefined,
 * });
 * type UserError = ErrorsOf<typeof UserErrors>;
 *
 * const findUser = (id: string): Box<User, UserError> => {
 *   const user = users.get(id);
 *   return user ? Box.ok(user) : Box.err(UserErrors.NotFound({ id }));
 * };
 *
 * findUser("7").matchExhaustive({
 *   ok: (user) => user.name,
 *   NotFound: (e) => `no user ${e.id}`,
 *   Suspended: () => "suspended",
 * });
 * ```
 */
export class Box<T, E> {
  private constructor(private readonly result: Result<T, E>) {}

  /**
   * Create a successful Box.
   *
   * @example
   * ```typescript
   * Box.ok(42).unwrap(); // 42
   * Box.ok<string, ParseError>("ready");
   * ```
   */
  static ok<T, E = never>(value: T): Box<T, E> {
    return new Box(ok(value));
  }

  /**
   * Create a failed Box.
   *
   * @example
   * ```typescript
   * Box.err("not found").unwrapOr("default"); // "default"
   * ```
   */
  static err<E, T = never>(error: E): Box<T, E> {
    return new Box(err(error));
  }

  /** Wrap an existing Result. */
  static fromResult<T, E>(result: Result<T, E>): Box<T, E> {
    return new Box(result);
  }

  /**
   * Run a function that might throw. A thrown value becomes the error,
   * converted by `onError` or wrapped as an {@link UnknownError}.
   *
   * @example
   * ```typescript
   * const parsed = Box.from(
   *   () => JSON.parse(raw) as unknown,
   *   (e) => ({ _tag: "ParseError" as const, message: String(e) }),
   * );
   *
   * const loose = Box.from(() => JSON.parse(raw) as unknown);
   * // Type: Box<unknown, UnknownError>
   * ```
   */
  static from<T>(fn: () => T): Box<T, UnknownError>;
  static from<T, E>(fn: () => T, onError: (e: unknown) => E): Box<T, E>;
  static from<T, E>(
    fn: () => T,
    onError?: (e: unknown) => E,
  ): Box<T, E | UnknownError> {
    try {
      return Box.ok(fn());
    } catch (e) {
      return Box.err(onError ? onError(e) : unknownError(e));
    }
  }

  isOk(): boolean {
    return isOk(this.result);
  }

  isErr(): boolean {
    return isErr(this.result);
  }

  /**
   * `true` when this is Ok and the value satisfies `predicate`.
   * The predicate is not called for an Err.
   *
   * @example
   * ```typescript
   * Box.ok(10).isOkAnd((n) => n > 5); // true
   * Box.ok(10).isOkAnd((n) => n > 15); // false
   * ```
   */
  isOkAnd(predicate: (value: T) => boolean): boolean {
    return isOkAnd(this.result, predicate);
  }

  /**
   * `true` when this is Err and the error satisfies `predicate`.
   * The predicate is not called for an Ok.
   */
  isErrAnd(predicate: (error: E) => boolean): boolean {
    return isErrAnd(this.result, predicate);
  }

  /**
   * Get the success value. Calling it on an Err is a programming error:
   * the fatal sink is notified and a `ResultPanic` is thrown.
   *
   * @example
   * ```typescript
   * Box.ok(42).unwrap(); // 42
   * Box.err("boom").unwrap(); // panics: Unwrap called on Err: "boom"
   * ```
   */
  unwrap(): T {
    if (isOk(this.result)) {
      return this.result.value;
    }
    const { error } = this.result;
    return panic(`Unwrap called on Err: ${describePayload(error)}`, {
      method: "unwrap",
      payload: error,
    });
  }

  /**
   * Get the success value, panicking with `message` on an Err.
   * Use it where an Err would break an invariant of the caller.
   *
   * @example
   * ```typescript
   * const port = parsePort("8080").expect("default port is a valid number");
   * ```
   */
  expect(message: string): T {
    if (isOk(this.result)) {
      return this.result.value;
    }
    return panic(`Expect failed: ${message}`, {
      method: "expect",
      payload: this.result.error,
    });
  }

  /**
   * Get the success value or `defaultValue` if this is an Err.
   *
   * @example
   * ```typescript
   * Box.ok(10).unwrapOr(0); // 10
   * Box.err("e").unwrapOr(0); // 0
   * ```
   */
  unwrapOr(defaultValue: T): T {
    return isOk(this.result) ? this.result.value : defaultValue;
  }

  /**
   * Get the success value, or compute one from the error.
   * `fn` is only called for an Err.
   *
   * @example
   * ```typescript
   * Box.err<string, number>("Test Error").unwrapOrElse((e) => e.length); // 10
   * ```
   */
  unwrapOrElse(fn: (error: E) => T): T {
    return isOk(this.result) ? this.result.value : fn(this.result.error);
  }

  /**
   * Get the error. Calling it on an Ok panics.
   */
  unwrapErr(): E {
    if (isErr(this.result)) {
      return this.result.error;
    }
    const { value } = this.result;
    return panic(`UnwrapErr called on Ok: ${describePayload(value)}`, {
      method: "unwrapErr",
      payload: value,
    });
  }

  /**
   * Get the error, panicking with `message` on an Ok.
   */
  expectErr(message: string): E {
    if (isErr(this.result)) {
      return this.result.error;
    }
    return panic(`ExpectErr failed: ${message}`, {
      method: "expectErr",
      payload: this.result.value,
    });
  }

  /**
   * Transform the success value. An Err passes through and `fn` is not
   * called.
   *
   * @example
   * ```typescript
   * Box.ok(5).map((x) => `Value: ${x * 2}`).unwrap(); // "Value: 10"
   * ```
   */
  map<U>(fn: (value: T) => U): Box<U, E> {
    return new Box(isOk(this.result) ? ok(fn(this.result.value)) : this.result);
  }

  /**
   * Transform the error. An Ok passes through and `fn` is not called.
   *
   * @example
   * ```typescript
   * Box.err("Error").mapErr((e) => `${e} mapped`).unwrapErr(); // "Error mapped"
   * ```
   */
  mapErr<F>(fn: (error: E) => F): Box<T, F> {
    return new Box(
      isErr(this.result) ? err(fn(this.result.error)) : this.result,
    );
  }

  /**
   * Chain an operation that can fail. On an Err, `fn` is not called and the
   * error is kept. The error types of both steps accumulate in the union.
   *
   * @example
   * ```typescript
   * function parse(input: string): Box<number, ParseError> { ... }
   * function validate(n: number): Box<number, RangeError> { ... }
   *
   * const port = parse("8080").andThen(validate);
   * // Type: Box<number, ParseError | RangeError>
   * ```
   */
  andThen<U, F = E>(fn: (value: T) => Box<U, F>): Box<U, E | F> {
    if (isOk(this.result)) {
      return fn(this.result.value);
    }
    return new Box<U, E | F>(this.result);
  }

  /**
   * Recover from an error with an operation that can itself fail.
   * On an Ok, `fn` is not called and the value is kept; the error type
   * becomes the one `fn` returns.
   *
   * @example
   * ```typescript
   * const data = fetchFromNetwork()
   *   .orElse(() => loadFromCache());
   * // Type: Box<Data, CacheError>
   * ```
   */
  orElse<F>(fn: (error: E) => Box<T, F>): Box<T, F> {
    if (isErr(this.result)) {
      return fn(this.result.error);
    }
    return new Box<T, F>(this.result);
  }

  /**
   * Return `other` if this is Ok, or keep this error. On two Errs the first
   * error wins.
   *
   * @example
   * ```typescript
   * Box.ok(1).and(Box.ok(2)).unwrap(); // 2
   * Box.err("first").and(Box.err("second")).unwrapErr(); // "first"
   * ```
   */
  and<U>(other: Box<U, E>): Box<U, E> {
    return isOk(this.result) ? other : new Box<U, E>(this.result);
  }

  /**
   * Keep this value if this is Ok, or return `other`. On two Errs the second
   * error wins.
   *
   * @example
   * ```typescript
   * Box.ok(1).or(Box.ok(2)).unwrap(); // 1
   * Box.err("first").or(Box.err("second")).unwrapErr(); // "second"
   * ```
   */
  or<F>(other: Box<T, F>): Box<T, F> {
    return isOk(this.result) ? new Box<T, F>(this.result) : other;
  }

  /**
   * Run `fn` on the success value for its side effect and return this Box.
   *
   * @example
   * ```typescript
   * loadUser(id)
   *   .inspect((user) => logger.debug({ id: user.id }, "loaded"))
   *   .map((user) => user.name);
   * ```
   */
  inspect(fn: (value: T) => void): Box<T, E> {
    if (isOk(this.result)) {
      fn(this.result.value);
    }
    return this;
  }

  /** Run `fn` on the error for its side effect and return this Box. */
  inspectErr(fn: (error: E) => void): Box<T, E> {
    if (isErr(this.result)) {
      fn(this.result.error);
    }
    return this;
  }

  /** The success value as an Option; `None` for an Err. */
  ok(): Option<T> {
    return isOk(this.result) ? some(this.result.value) : none();
  }

  /** The error as an Option; `None` for an Ok. */
  err(): Option<E> {
    return isErr(this.result) ? some(this.result.error) : none();
  }

  /**
   * Fold into one value with a handler per variant.
   *
   * @example
   * ```typescript
   * const uiState = fetchResult.match({
   *   ok: (data) => ({ loading: false, data, error: null }),
   *   err: (error) => ({ loading: false, data: null, error }),
   * });
   * ```
   */
  match<R>(handlers: MatchHandlers<T, E, R>): R {
    return match(this.result, handlers);
  }

  /**
   * Fold into one value with a handler per error tag.
   * Only available when every error is a {@link TaggedError}.
   */
  matchExhaustive<R>(
    this: Box<T, E & TaggedError>,
    config: MatchConfig<T, E & TaggedError, R>,
  ): R {
    return matchExhaustive(this.result, config);
  }

  /**
   * Compare with another Box. Different variants are never equal; equal
   * variants compare their payloads, structurally unless an equivalence is
   * given.
   *
   * @example
   * ```typescript
   * Box.ok(42).equals(Box.ok(42)); // true
   * Box.ok<number, string>(1).equals(Box.err("1")); // false
   * ```
   */
  equals(
    other: Box<T, E>,
    eqValue?: Equivalence<T>,
    eqError?: Equivalence<E>,
  ): boolean {
    return equals(this.result, other.result, eqValue, eqError);
  }

  /** The underlying Result. */
  toResult(): Result<T, E> {
    return this.result;
  }
}
