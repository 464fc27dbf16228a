export { TestContext } from "./context.js";
export { TestRunner, createRunner, isModuleTestRef, BENCHMARK_PREFIX } from "./runner.js";
export type { TestBody, ModuleTestRef, TestSource } from "./runner.js";
export { AtomicCrashGuard, getCrashGuard } from "./crash-guard.js";
export type { CrashGuard } from "./crash-guard.js";
export { IsolatingExecutor, createExecutor } from "./executor.js";
export type { ScopedExecutor, IsolatingExecutorOptions } from "./executor.js";
export { Suite, createSuite, classify, CRASH_MESSAGE } from "./suite.js";
export type { SuiteOptions, SuiteState, RunStatus } from "./suite.js";
export { deriveStats } from "./stats.js";
export type { SuiteStats, TestOutcome, StatsSource } from "./stats.js";
export { createSuiteFromConfig } from "./factory.js";
