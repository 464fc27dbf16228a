/**
 * guarded-suite: a unit-testing harness
 *
 * Register named test functions into a suite, run them one at a time in
 * isolated execution units, survive tests that crash, and derive statistics.
 *
 * @packageDocumentation
 */

// Version
export { VERSION } from "./version.js";

// Harness
export {
  TestContext,
  TestRunner,
  createRunner,
  isModuleTestRef,
  BENCHMARK_PREFIX,
  AtomicCrashGuard,
  getCrashGuard,
  IsolatingExecutor,
  createExecutor,
  Suite,
  createSuite,
  createSuiteFromConfig,
  classify,
  deriveStats,
  CRASH_MESSAGE,
} from "./harness/index.js";
export type {
  TestBody,
  ModuleTestRef,
  TestSource,
  CrashGuard,
  ScopedExecutor,
  SuiteOptions,
  SuiteState,
  RunStatus,
  SuiteStats,
  TestOutcome,
} from "./harness/index.js";

// Reporting
export { ConsoleReporter, createConsoleReporter, formatTestReport } from "./reporter/console.js";
export { formatStats } from "./reporter/summary.js";
export type { Reporter, TestReport, Classification } from "./reporter/types.js";

// Configuration
export { loadConfig, createDefaultConfig, configExists } from "./config/index.js";
export type { HarnessConfig } from "./config/index.js";

// Utilities
export {
  HarnessError,
  InvalidArgumentError,
  EngineError,
  SuiteStateError,
  ConfigError,
  formatError,
} from "./utils/errors.js";
export { createLogger } from "./utils/logger.js";
export type { Duration, Timestamp } from "./utils/time.js";
