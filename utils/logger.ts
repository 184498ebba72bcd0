/**
 * LogTape setup shared by every package.
 *
 * Libraries only ever call {@link getLogger}; nothing is printed until the
 * host application calls {@link configureLogging}. Until then LogTape drops
 * every record.
 *
 * @example
 * ```ts
 * await configureLogging({ lowestLevel: "debug" });
 *
 * const logger = getLogger(["resolve"]);
 * logger.debug("Built {kind} resolve options", { kind: "cjs" });
 * ```
 *
 * @see https://logtape.org/manual/config
 */

import { configure, getConsoleSink, getLogger as logtapeGetLogger, type LogLevel, type Logger } from "@logtape/logtape";
import { getPrettyFormatter } from "@logtape/pretty";

export const ROOT_CATEGORY = "modref";

export interface LoggingOptions {
  /** Lowest level written for the `modref` category (default `"warning"`) */
  lowestLevel?: LogLevel;

  /** Use the pretty, colored formatter instead of LogTape's plain text one */
  pretty?: boolean;
}

export async function configureLogging(opts: LoggingOptions = {}): Promise<void> {
  const formatter = opts.pretty === false ? undefined : getPrettyFormatter({
    timestamp: "time",
    colors: true,
    categoryWidth: 20,
    categoryTruncate: "middle",
    properties: true,
  });

  await configure({
    reset: true,
    sinks: {
      console: formatter ? getConsoleSink({ formatter }) : getConsoleSink(),
    },
    loggers: [
      { category: ["logtape", "meta"], lowestLevel: "warning", sinks: ["console"] },
      { category: [ROOT_CATEGORY], lowestLevel: opts.lowestLevel ?? "warning", sinks: ["console"] },
    ],
  });
}

/**
 * Logger under the `modref` root category.
 *
 * `getLogger("resolve")` and `getLogger(["resolve", "node"])` log under
 * `["modref", "resolve"]` and `["modref", "resolve", "node"]`.
 */
export function getLogger(categories?: string | readonly string[]): Logger {
  if (categories === undefined)
    return logtapeGetLogger([ROOT_CATEGORY]);
  if (typeof categories === "string")
    return logtapeGetLogger([ROOT_CATEGORY, categories]);
  return logtapeGetLogger([ROOT_CATEGORY, ...categories]);
}
