import { z } from "zod";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export const PanicConfigSchema = z.object({
  name: z.string().min(1).default("twofold"),
  level: z.enum(LOG_LEVELS).default("fatal"),
  exitOnPanic: z.boolean().default(false),
});

export type PanicConfig = z.infer<typeof PanicConfigSchema>;
export type PanicConfigInput = z.input<typeof PanicConfigSchema>;

const EnvFlagSchema = z
  .enum(["true", "false", "1", "0"])
  .transform((flag) => flag === "true" || flag === "1");

const EnvSchema = z.object({
  TWOFOLD_LOGGER_NAME: z.string().optional(),
  TWOFOLD_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  TWOFOLD_EXIT_ON_PANIC: EnvFlagSchema.optional(),
});

const EnvConfigSchema = EnvSchema.transform((parsed) => ({
  name: parsed.TWOFOLD_LOGGER_NAME,
  level: parsed.TWOFOLD_LOG_LEVEL,
  exitOnPanic: parsed.TWOFOLD_EXIT_ON_PANIC,
})).pipe(PanicConfigSchema);

/**
 * Build the panic configuration from environment variables.
 * Unset variables fall back to the schema defaults; a malformed value
 * throws the `ZodError`.
 */
export const loadConfigFromEnv = (
  env: NodeJS.ProcessEnv = process.env,
): PanicConfig => EnvConfigSchema.parse(env);

/** {@link loadConfigFromEnv} without throwing. */
export const safeLoadConfigFromEnv = (env: NodeJS.ProcessEnv = process.env) =>
  EnvConfigSchema.safeParse(env);
