/**
 * Build a suite from loaded configuration
 */

import type { HarnessConfig } from "../config/schema.js";
import { ConsoleReporter } from "../reporter/console.js";
import { createLogger, setLogger } from "../utils/logger.js";
import { IsolatingExecutor } from "./executor.js";
import { Suite, type SuiteOptions } from "./suite.js";

/**
 * Wire logger, reporter, abort policy and worker limits from `config`.
 * Anything in `overrides` wins over what the config would produce.
 */
export function createSuiteFromConfig(config: HarnessConfig, overrides: SuiteOptions = {}): Suite {
  const logger =
    overrides.logger ??
    createLogger({
      name: "suite",
      level: config.logging.level,
      prettyPrint: config.logging.prettyPrint,
      logToFile: config.logging.logToFile,
      logDir: config.logging.logDir,
    });
  if (!overrides.logger) {
    setLogger(logger);
  }

  return new Suite({
    reporter: overrides.reporter ?? new ConsoleReporter({ color: config.reporter.color }),
    quiet: overrides.quiet ?? config.reporter.quiet,
    abortOnFailure: overrides.abortOnFailure ?? config.abortOnFailure,
    crashGuard: overrides.crashGuard,
    logger,
    executor:
      overrides.executor ??
      new IsolatingExecutor({ resourceLimits: config.isolation.resourceLimits, logger }),
  });
}
