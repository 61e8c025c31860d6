import type { AllTags, ErrorByTag, TaggedError } from "./error.ts";
import { isOk, type Result } from "./result.ts";

/** One handler per variant; both produce the same type. */
export type MatchHandlers<T, E, R> = {
  ok: (value: T) => R;
  err: (error: E) => R;
};

type TagHandlers<E extends TaggedError, R> = {
  [Tag in AllTags<E>]: (error: ErrorByTag<E, Tag>) => R;
};

/**
 * An `ok` handler plus one handler per error tag.
 */
export type MatchConfig<T, E extends TaggedError, R> =
  & Pick<MatchHandlers<T, E, R>, "ok">
  & TagHandlers<E, R>;

/**
 * Fold a Result into a single value. Exactly one handler runs.
 *
 * @example
 * ```typescript
 * const label = match(parsePort(input), {
 *   ok: (port) => `listening on ${port}`,
 *   err: (error) => `bad port: ${error}`,
 * });
 * ```
 */
export const match = <T, E, R>(
  result: Result<T, E>,
  handlers: MatchHandlers<T, E, R>,
): R => isOk(result) ? handlers.ok(result.value) : handlers.err(result.error);

/**
 * Like {@link match}, but with one handler per error tag instead of a single
 * `err` handler. Leaving a tag out is a compile-time error.
 *
 * @throws Error if the error's tag has no handler at runtime
 *
 * @example
 * ```typescript
 * type LookupError =
 *   | (TaggedError<"NotFound"> & { id: string })
 *   | (TaggedError<"Unauthorized"> & { userId: string });
 *
 * const message = matchExhaustive(lookup("123"), {
 *   ok: (record) => `Found ${record.name}`,
 *   NotFound: (error) => `No record ${error.id}`,
 *   Unauthorized: (error) => `${error.userId} may not read it`,
 * });
 * ```
 */
export const matchExhaustive = <T, E extends TaggedError, R>(
  result: Result<T, E>,
  config: MatchConfig<T, E, R>,
): R =>
  match(result, {
    ok: config.ok,
    err: (error) => {
      const handlers = config as unknown as Record<
        string,
        ((error: E) => R) | undefined
      >;
      const handler = Object.hasOwn(handlers, error._tag)
        ? handlers[error._tag]
        : undefined;

      if (!handler) {
        throw new Error(`Unhandled error tag: ${error._tag}`);
      }
      return handler(error);
    },
  });
