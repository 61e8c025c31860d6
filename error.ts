import { inspect } from "node:util";
import type { Result } from "./result.ts";

/**
 * Base shape for domain errors carried in the Err variant.
 * The `_tag` field enables discriminated unions and exhaustive matching.
 *
 * @example
 * ```typescript
 * type NetworkError = TaggedError<"NetworkError"> & { statusCode: number };
 * ```
 */
export type TaggedError<Tag extends string = string> = {
  readonly _tag: Tag;
};

/**
 * Create a tagged error class extending `Error`, for errors that are thrown
 * rather than returned. `format` builds the `message` from the props; without
 * it the message is the tag followed by the props as JSON.
 *
 * @example
 * ```typescript
 * const DatabaseError = makeTaggedError<"DatabaseError", { query: string; code: number }>(
 *   "DatabaseError",
 *   (props) => `query failed with ${props.code}`,
 * );
 *
 * const dbError = new DatabaseError({ query: "SELECT 1", code: 1045 });
 * dbError instanceof DatabaseError; // true
 * dbError.message; // "query failed with 1045"
 * ```
 */
export const makeTaggedError = <
  Tag extends string,
  Props extends Record<string, unknown>,
>(
  tag: Tag,
  format: (props: Props) => string = (props) =>
    `${tag}: ${JSON.stringify(props)}`,
): {
  new (props: Props): Error & TaggedError<Tag> & { readonly props: Props };
} => {
  return class extends Error implements TaggedError<Tag> {
    readonly _tag = tag;
    constructor(public readonly props: Props) {
      super(format(props));
      this.name = tag;
    }
  };
};

/**
 * Placeholders for declaring property types in {@link defineErrors}.
 */
export const t: {
  readonly string: string;
  readonly number: number;
  readonly boolean: boolean;
  readonly bigint: bigint;
  readonly array: <T>() => T[];
  readonly optional: <T>() => T | undefined;
} = {
  string: "",
  number: 0,
  boolean: false,
  bigint: 0n,
  array: <T>(): T[] => [],
  optional: <T>(): T | undefined => undefined,
} as const;

type ErrorFactories<
  Defs extends Record<string, Record<string, unknown> | undefined>,
> = {
  [K in keyof Defs]: Defs[K] extends Record<string, unknown>
    ? (props: Defs[K]) => TaggedError<K & string> & Defs[K]
    : () => TaggedError<K & string>;
};

/**
 * Define the errors of a module as factory functions keyed by tag.
 *
 * @example
 * ```typescript
 * const UserErrors = defineErrors({
 *   NotFound: { userId: t.string },
 *   InvalidAge: { age: t.number },
 *   Unauthorized: undefined,
 * });
 *
 * UserErrors.NotFound({ userId: "123" }); // { _tag: "NotFound", userId: "123" }
 * UserErrors.Unauthorized();              // { _tag: "Unauthorized" }
 *
 * type UserError = ErrorsOf<typeof UserErrors>;
 * ```
 */
export const defineErrors = <
  Defs extends Record<string, Record<string, unknown> | undefined>,
>(
  definitions: Defs,
): ErrorFactories<Defs> => {
  const factories = {} as ErrorFactories<Defs>;

  for (const tag of Object.keys(definitions)) {
    factories[tag as keyof Defs] = ((props?: Record<string, unknown>) => ({
      _tag: tag,
      ...props,
    })) as ErrorFactories<Defs>[keyof Defs];
  }

  return factories;
};

/** The union of errors produced by a `defineErrors` object. */
export type ErrorsOf<D> = D extends Record<string, (...args: never[]) => infer E>
  ? E
  : never;

/** A single error type from a `defineErrors` object, by key. */
export type ErrorType<D, K extends keyof D> = ReturnType<
  D[K] extends (...args: never[]) => unknown ? D[K] : never
>;

/** The error type `E` of a `Result<T, E>`. */
export type ErrorOf<R> = R extends Result<unknown, infer E> ? E : never;

/** The success type `T` of a `Result<T, E>`. */
export type SuccessOf<R> = R extends Result<infer T, unknown> ? T : never;

/** The `_tag` literal of a tagged error. */
export type TagOf<E> = E extends TaggedError<infer Tag> ? Tag : never;

/** Every tag literal in a union of tagged errors. */
export type AllTags<E> = E extends TaggedError<infer Tag> ? Tag : never;

/** The member of a tagged error union with the given tag. */
export type ErrorByTag<E, Tag extends string> = Extract<E, { _tag: Tag }>;

/** A tagged error union without the member with the given tag. */
export type ExcludeByTag<E, Tag extends string> = Exclude<E, { _tag: Tag }>;

/**
 * Error produced by `Box.from` when no error handler is supplied.
 */
export type UnknownError = TaggedError<"UnknownError"> & {
  readonly cause: unknown;
  readonly message: string;
};

/**
 * Wrap an unknown thrown value, keeping the message of an `Error`.
 */
export const unknownError = (cause: unknown): UnknownError => ({
  _tag: "UnknownError",
  cause,
  message: cause instanceof Error
    ? cause.message
    : typeof cause === "string"
    ? cause
    : inspect(cause, { depth: 2, breakLength: Infinity }),
});
