/**
 * Environment overrides for guarded-suite
 *
 * SUITE_ABORT_ON_FAILURE, SUITE_QUIET   boolean-like ("1", "true", "yes", "0", "false", "no")
 * SUITE_LOG_LEVEL                       silly | trace | debug | info | warn | error | fatal
 * SUITE_LOG_DIR                         enables file logging into this directory
 * SUITE_COLOR                           auto | always | never
 * NO_COLOR                              any non-empty value forces "never"
 */

import { ConfigError } from "../utils/errors.js";
import { ColorModeSchema, LogLevelSchema, type HarnessConfigOverrides } from "./schema.js";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new ConfigError(`Invalid boolean in ${name}`, {
    issues: [{ path: name, message: `expected one of 1/0, true/false, yes/no, got '${value}'` }],
  });
}

function parseEnum<T extends string>(name: string, value: string, options: readonly T[]): T {
  const normalized = value.trim().toLowerCase();
  const match = options.find((option) => option === normalized);
  if (match === undefined) {
    throw new ConfigError(`Invalid value in ${name}`, {
      issues: [{ path: name, message: `expected one of ${options.join(", ")}, got '${value}'` }],
    });
  }
  return match;
}

/**
 * Read overrides from the environment. Unset and empty variables are ignored.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): HarnessConfigOverrides {
  const overrides: HarnessConfigOverrides = {};
  const reporter: NonNullable<HarnessConfigOverrides["reporter"]> = {};
  const logging: NonNullable<HarnessConfigOverrides["logging"]> = {};

  const abort = env["SUITE_ABORT_ON_FAILURE"];
  if (abort) overrides.abortOnFailure = parseBoolean("SUITE_ABORT_ON_FAILURE", abort);

  const quiet = env["SUITE_QUIET"];
  if (quiet) reporter.quiet = parseBoolean("SUITE_QUIET", quiet);

  const color = env["SUITE_COLOR"];
  if (color) reporter.color = parseEnum("SUITE_COLOR", color, ColorModeSchema.options);
  if (env["NO_COLOR"]) reporter.color = "never";

  const level = env["SUITE_LOG_LEVEL"];
  if (level) logging.level = parseEnum("SUITE_LOG_LEVEL", level, LogLevelSchema.options);

  const logDir = env["SUITE_LOG_DIR"];
  if (logDir) {
    logging.logDir = logDir;
    logging.logToFile = true;
  }

  if (Object.keys(reporter).length > 0) overrides.reporter = reporter;
  if (Object.keys(logging).length > 0) overrides.logging = logging;
  return overrides;
}
