import { z } from "zod";

import { getEnv } from "@modref/utils/env";
import { configureLogging } from "@modref/utils/logger";

import { ValidationError } from "../errors.ts";

export const LOG_LEVEL_ENV = "MODREF_LOG_LEVEL";
export const PRETTY_LOGS_ENV = "MODREF_PRETTY_LOGS";

export const LogLevelSchema = z.enum(["debug", "info", "warning", "error", "fatal"]);

export const CoreConfigSchema = z.object({
  /** Lowest level written by the `modref` loggers */
  logLevel: LogLevelSchema,

  /** Colored, aligned console output */
  prettyLogs: z.boolean(),
});

export type CoreConfig = z.infer<typeof CoreConfigSchema>;

/**
 * Default core config
 */
export const CORE_CONFIG: CoreConfig = {
  logLevel: "warning",
  prettyLogs: true,
};

/**
 * Coerce an env string to boolean.
 * - "true" / "1" / "" (present but empty) → true
 * - "false" / "0" → false
 * - absent or anything else → undefined (caller falls back to the default)
 */
export const booleanEnvVar = z
  .string()
  .optional()
  .transform((val) => {
    if (val === undefined) return undefined;
    const normalized = val.trim().toLowerCase();
    if (normalized === "" || normalized === "true" || normalized === "1") return true;
    if (normalized === "false" || normalized === "0") return false;
    return undefined;
  });

/**
 * Merges `overrides` over {@link CORE_CONFIG} and validates the result.
 *
 * Override values are taken as-is (env strings included) and must already
 * have the right type, e.g. `{ logLevel: "debug" }`.
 */
export function createConfig(overrides: { [K in keyof CoreConfig]?: unknown } = {}): CoreConfig {
  const merged: Record<string, unknown> = { ...CORE_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const result = CoreConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ValidationError(
      "core config",
      result.error.issues.map((issue) => ({ path: issue.path, message: issue.message }))
    );
  }

  return result.data;
}

/**
 * Reads {@link LOG_LEVEL_ENV} and {@link PRETTY_LOGS_ENV}.
 */
export function loadConfigFromEnv(env: (key: string) => string | undefined = getEnv): CoreConfig {
  const logLevel = env(LOG_LEVEL_ENV)?.trim().toLowerCase();
  const prettyLogs = booleanEnvVar.parse(env(PRETTY_LOGS_ENV));

  return createConfig({
    logLevel: logLevel === "" ? undefined : logLevel,
    prettyLogs,
  });
}

/**
 * Configures logging from `config` (or the environment) and returns the
 * config in effect.
 */
export async function setup(config: CoreConfig = loadConfigFromEnv()): Promise<CoreConfig> {
  await configureLogging({ lowestLevel: config.logLevel, pretty: config.prettyLogs });
  return config;
}
