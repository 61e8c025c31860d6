import { inspect } from "node:util";
import pino, { type Logger } from "pino";
import {
  loadConfigFromEnv,
  type PanicConfig,
  PanicConfigSchema,
  type PanicConfigInput,
  safeLoadConfigFromEnv,
} from "./config.ts";
import { makeTaggedError } from "./error.ts";

/** The accessors that panic when called on the wrong variant. */
export type PanicMethod = "unwrap" | "expect" | "unwrapErr" | "expectErr";

export type PanicContext = {
  readonly method: PanicMethod;
  /** The payload of the variant that was present instead. */
  readonly payload: unknown;
};

/**
 * Receives every contract violation before the failing call is torn down.
 */
export type FatalSink = (message: string, context: PanicContext) => void;

/**
 * Thrown when an Ok-only or Err-only accessor is called on the other
 * variant. It signals a programming error and is not meant to be caught
 * for control flow; use `unwrapOr`, `unwrapOrElse` or `match` instead.
 *
 * @example
 * ```typescript
 * try {
 *   Box.err("boom").unwrap();
 * } catch (e) {
 *   e instanceof ResultPanic; // true
 *   e.props.method;           // "unwrap"
 * }
 * ```
 */
export const ResultPanic = makeTaggedError<
  "ResultPanic",
  { method: PanicMethod; message: string }
>("ResultPanic", (props) => props.message);

export type ResultPanic = InstanceType<typeof ResultPanic>;

let config: PanicConfig | undefined;
let logger: Logger | undefined;
let sink: FatalSink | undefined;

/** The active configuration, read from the environment on first use. */
export const getConfig = (): PanicConfig => {
  config ??= loadConfigFromEnv();
  return config;
};

/**
 * Replace the configuration. The default logger is rebuilt on next use.
 *
 * @example
 * ```typescript
 * configure({ name: "checkout", level: "silent" });
 * ```
 */
export const configure = (input: PanicConfigInput): PanicConfig => {
  config = PanicConfigSchema.parse(input);
  logger = undefined;
  return config;
};

/** Forget the active configuration; the environment is read again on next use. */
export const resetConfig = (): void => {
  config = undefined;
  logger = undefined;
};

const DEFAULT_CONFIG: PanicConfig = PanicConfigSchema.parse({});

// A malformed environment must not replace the panic being reported, so the
// fatal path runs on the defaults until the configuration is fixed.
const panicConfig = (): PanicConfig => {
  if (config) {
    return config;
  }
  const loaded = safeLoadConfigFromEnv();
  if (!loaded.success) {
    return DEFAULT_CONFIG;
  }
  config = loaded.data;
  return config;
};

const getLogger = (): Logger => {
  if (!logger) {
    const { name, level } = panicConfig();
    logger = pino({ name, level }, pino.destination({ dest: 2, sync: true }));
  }
  return logger;
};

/**
 * A sink that logs each panic at `fatal` level, with the failing method as a
 * bound field.
 *
 * @example
 * ```typescript
 * setFatalSink(createLoggerSink(pino({ name: "billing" })));
 * ```
 */
export const createLoggerSink = (log: Logger): FatalSink =>
(message, { method }) => {
  log.fatal({ method }, message);
};

/** The default sink: {@link createLoggerSink} over the configured logger. */
export const loggerSink: FatalSink = (message, context) =>
  createLoggerSink(getLogger())(message, context);

/**
 * Install `next` as the fatal sink and return the one it replaces.
 *
 * @example
 * ```typescript
 * const previous = setFatalSink((message) => reports.push(message));
 * // ...
 * setFatalSink(previous);
 * ```
 */
export const setFatalSink = (next: FatalSink): FatalSink => {
  const previous = sink ?? loggerSink;
  sink = next;
  return previous;
};

/**
 * Render a payload for a panic message, the way `console.log` would.
 */
export const describePayload = (payload: unknown): string => {
  try {
    return inspect(payload, { depth: 4, breakLength: Infinity });
  } catch {
    // A custom inspect hook threw.
    return Object.prototype.toString.call(payload);
  }
};

/**
 * Report a contract violation and abort the current operation.
 * With `exitOnPanic` the process exits with code 1; otherwise a
 * {@link ResultPanic} is thrown.
 */
export const panic = (message: string, context: PanicContext): never => {
  const { exitOnPanic } = panicConfig();

  (sink ?? loggerSink)(message, context);

  if (exitOnPanic) {
    process.exit(1);
  }

  throw new ResultPanic({ method: context.method, message });
};
