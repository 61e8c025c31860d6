// Result type and free functions
export type { Equivalence, ErrVariant, OkVariant, Result } from "./result.ts";
export {
  equals,
  err,
  isErr,
  isErrAnd,
  isOk,
  isOkAnd,
  makeErr,
  makeOk,
  ok,
} from "./result.ts";

// Option
export type { Option } from "./option.ts";
export { isNone, isSome, none, some } from "./option.ts";

// Error types and utilities
export type {
  AllTags,
  ErrorByTag,
  ErrorOf,
  ErrorsOf,
  ErrorType,
  ExcludeByTag,
  SuccessOf,
  TaggedError,
  TagOf,
  UnknownError,
} from "./error.ts";
export { defineErrors, makeTaggedError, t, unknownError } from "./error.ts";

// Box wrapper (primary API)
export { Box } from "./box.ts";

// Matching
export type { MatchConfig, MatchHandlers } from "./matcher.ts";
export { match, matchExhaustive } from "./matcher.ts";

// Contract violations and configuration
export type { FatalSink, PanicContext, PanicMethod } from "./panic.ts";
export {
  configure,
  createLoggerSink,
  getConfig,
  loggerSink,
  panic,
  resetConfig,
  ResultPanic,
  setFatalSink,
} from "./panic.ts";
export type { PanicConfig, PanicConfigInput } from "./config.ts";
export {
  loadConfigFromEnv,
  PanicConfigSchema,
  safeLoadConfigFromEnv,
} from "./config.ts";
