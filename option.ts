type SomeVariant<T> = {
  readonly _tag: "Some";
  readonly value: T;
};

type NoneVariant = {
  readonly _tag: "None";
};

/**
 * An optional value: `Some` holding a value, or `None`.
 * Unlike `T | undefined`, `Some(undefined)` and `None` stay distinct.
 *
 * @example
 * ```typescript
 * const found: Option<number> = some(3);
 * if (isSome(found)) {
 *   console.log(found.value); // 3
 * }
 * ```
 */
export type Option<T> = SomeVariant<T> | NoneVariant;

const NONE: NoneVariant = Object.freeze({ _tag: "None" });

export const some = <T>(value: T): Option<T> => ({ _tag: "Some", value });

/** The empty Option. Every call returns the same frozen instance. */
export const none = <T = never>(): Option<T> => NONE;

export const isSome = <T>(option: Option<T>): option is SomeVariant<T> =>
  option._tag === "Some";

export const isNone = <T>(option: Option<T>): option is NoneVariant =>
  option._tag === "None";
