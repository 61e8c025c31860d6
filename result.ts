import { isDeepStrictEqual } from "node:util";

export type OkVariant<T> = {
  readonly _tag: "Ok";
  readonly value: T;
};

export type ErrVariant<E> = {
  readonly _tag: "Err";
  readonly error: E;
};

/**
 * A discriminated union holding either a success value (`Ok`) or an error
 * (`Err`). Only the active payload exists; `_tag` selects which one.
 *
 * @typeParam T - The type of the success value
 * @typeParam E - The type of the error value
 *
 * @example
 * ```typescript
 * function divide(a: number, b: number): Result<number, TaggedError<"DivisionByZero">> {
 *   if (b === 0) {
 *     return err({ _tag: "DivisionByZero" });
 *   }
 *   return ok(a / b);
 * }
 *
 * const result = divide(10, 2);
 * if (isOk(result)) {
 *   console.log(result.value); // 5
 * }
 * ```
 */
export type Result<T, E> = OkVariant<T> | ErrVariant<E>;

/** Decides whether two payloads of the same type are equal. */
export type Equivalence<A> = (a: A, b: A) => boolean;

/**
 * Creates an Ok Result. The error type defaults to `never` so that it widens
 * to whatever the surrounding signature expects.
 *
 * @example
 * ```typescript
 * const result = ok(42);
 * // Type: Result<number, never>
 *
 * const typed = ok<string, Error>("success");
 * // Type: Result<string, Error>
 * ```
 */
export const ok = <T, E = never>(value: T): Result<T, E> => ({
  _tag: "Ok",
  value,
});

/**
 * Creates an Err Result. The success type defaults to `never`.
 *
 * @example
 * ```typescript
 * const result = err({ _tag: "ValidationError", field: "email" });
 * // Type: Result<never, { _tag: string; field: string }>
 * ```
 */
export const err = <E, T = never>(error: E): Result<T, E> => ({
  _tag: "Err",
  error,
});

/**
 * Creates an Ok Result with both type arguments spelled out, value type
 * first. Use it where neither side can be inferred from context.
 *
 * @example
 * ```typescript
 * const parsed = makeOk<number, ParseError>(42);
 * ```
 */
export const makeOk = <T, E>(value: T): Result<T, E> => ok(value);

/**
 * Creates an Err Result with both type arguments spelled out, value type
 * first, mirroring {@link makeOk}.
 *
 * @example
 * ```typescript
 * const failed = makeErr<number, string>("not a number");
 * ```
 */
export const makeErr = <T, E>(error: E): Result<T, E> => err(error);

/**
 * Type guard that checks if a Result is an Ok variant.
 *
 * @example
 * ```typescript
 * const result: Result<number, string> = ok(42);
 *
 * if (isOk(result)) {
 *   console.log(result.value); // 42
 * }
 * ```
 */
export const isOk = <T, E>(result: Result<T, E>): result is OkVariant<T> =>
  result._tag === "Ok";

/**
 * Type guard that checks if a Result is an Err variant.
 */
export const isErr = <T, E>(result: Result<T, E>): result is ErrVariant<E> =>
  result._tag === "Err";

/**
 * Returns `true` when the Result is Ok and its value satisfies `predicate`.
 * The predicate is not called for an Err.
 *
 * @example
 * ```typescript
 * isOkAnd(ok(10), (n) => n > 5); // true
 * isOkAnd(err("boom"), (n: number) => n > 5); // false
 * ```
 */
export const isOkAnd = <T, E>(
  result: Result<T, E>,
  predicate: (value: T) => boolean,
): boolean => isOk(result) && predicate(result.value);

/**
 * Returns `true` when the Result is Err and its error satisfies `predicate`.
 * The predicate is not called for an Ok.
 */
export const isErrAnd = <T, E>(
  result: Result<T, E>,
  predicate: (error: E) => boolean,
): boolean => isErr(result) && predicate(result.error);

/**
 * Compares two Results. Results with different variants are never equal,
 * whatever their payloads; otherwise the live payloads are compared with the
 * matching equivalence, which defaults to structural equality.
 *
 * @example
 * ```typescript
 * equals(ok({ id: 1 }), ok({ id: 1 })); // true
 * equals<number | string, string>(ok(1), err("1")); // false
 *
 * // Case-insensitive error comparison
 * equals(err("Oops"), err("OOPS"), undefined, (a, b) =>
 *   a.toLowerCase() === b.toLowerCase()); // true
 * ```
 */
export const equals = <T, E>(
  a: Result<T, E>,
  b: Result<T, E>,
  eqValue: Equivalence<T> = isDeepStrictEqual,
  eqError: Equivalence<E> = isDeepStrictEqual,
): boolean => {
  if (isOk(a)) {
    return isOk(b) && eqValue(a.value, b.value);
  }
  return isErr(b) && eqError(a.error, b.error);
};
