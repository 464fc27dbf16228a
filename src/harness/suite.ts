/**
 * Suite execution engine
 *
 * Runs registered tests one at a time in registration order. Each body runs in
 * its own scoped execution unit, which is always joined before the next test
 * starts. Per-test outcomes are data on the TestContext; the only control flow
 * a test can trigger is the abort-on-failure policy chosen by the caller.
 */

import type { ILogObj, Logger } from "tslog";
import { EngineError, SuiteStateError, isHarnessError, toError } from "../utils/errors.js";
import { createChildLogger, getLogger } from "../utils/logger.js";
import { ConsoleReporter } from "../reporter/console.js";
import type { Classification, Reporter, TestReport } from "../reporter/types.js";
import { TestContext } from "./context.js";
import { getCrashGuard, type CrashGuard } from "./crash-guard.js";
import { IsolatingExecutor, type ScopedExecutor } from "./executor.js";
import type { TestRunner } from "./runner.js";
import { deriveStats, type StatsSource, type SuiteStats } from "./stats.js";

export const CRASH_MESSAGE = "encountered a fatal memory fault";

export type SuiteState = "idle" | "running" | "finished" | "aborted";

export type RunStatus = "success" | "aborted";

export interface SuiteOptions {
  reporter?: Reporter;
  quiet?: boolean;
  /** Policy used by run()/step() when none is passed */
  abortOnFailure?: boolean;
  crashGuard?: CrashGuard;
  executor?: ScopedExecutor;
  logger?: Logger<ILogObj>;
}

/**
 * Failure wins over errors
 */
export function classify(context: TestContext): Classification {
  if (context.failed) return "fail";
  if (context.errorCount > 0) return "error";
  return "pass";
}

export class Suite implements StatsSource {
  reporter: Reporter;
  quiet: boolean;

  private _runners: TestRunner[] = [];
  private _results: TestContext[] = [];
  private _cursor = 0;
  private _finished = false;
  private _aborted = false;
  private _crashCount = 0;
  private _fatalFailures = false;
  private inFlight = false;
  private disposed = false;

  private readonly abortOnFailure: boolean;
  private readonly crashGuard: CrashGuard;
  private readonly executor: ScopedExecutor;
  private readonly logger: Logger<ILogObj>;

  constructor(options: SuiteOptions = {}) {
    this.reporter = options.reporter ?? new ConsoleReporter();
    this.quiet = options.quiet ?? false;
    this.abortOnFailure = options.abortOnFailure ?? false;
    this.crashGuard = options.crashGuard ?? getCrashGuard();
    this.logger = options.logger ?? createChildLogger(getLogger(), "suite");
    this.executor = options.executor ?? new IsolatingExecutor({ logger: this.logger });
  }

  get runners(): readonly TestRunner[] {
    return this._runners;
  }

  get results(): readonly TestContext[] {
    return this._results;
  }

  get cursor(): number {
    return this._cursor;
  }

  get finished(): boolean {
    return this._finished;
  }

  get crashCount(): number {
    return this._crashCount;
  }

  get fatalFailures(): boolean {
    return this._fatalFailures;
  }

  get state(): SuiteState {
    if (this.inFlight) return "running";
    if (this._finished) return "finished";
    if (this._aborted) return "aborted";
    return "idle";
  }

  /**
   * Append tests; they run after everything already registered
   */
  add(...runners: TestRunner[]): this {
    this.assertUsable("add");
    if (runners.length > 0) {
      this._runners.push(...runners);
      this._finished = false;
    }
    return this;
  }

  addTest(runner: TestRunner): this {
    return this.add(runner);
  }

  /**
   * Run every remaining test. Resolves "aborted" when abort-on-failure stopped
   * the run; the suite is then left unfinished.
   */
  async run(abortOnFailure: boolean = this.abortOnFailure): Promise<RunStatus> {
    this.assertIdle("run");
    this._aborted = false;
    this.inFlight = true;
    try {
      while (this._cursor < this._runners.length) {
        const status = await this.stepOnce(abortOnFailure);
        if (status === "aborted") {
          return status;
        }
      }
    } finally {
      this.inFlight = false;
    }

    this._finished = true;
    this.logger.debug({ ran: this._cursor, crashes: this._crashCount }, "Suite finished");
    return "success";
  }

  /**
   * Run exactly one test, the one at the cursor
   */
  async step(abortOnFailure: boolean = this.abortOnFailure): Promise<RunStatus> {
    this.assertIdle("step");
    if (this._cursor >= this._runners.length) {
      throw new SuiteStateError("No tests left to run", { state: this.state });
    }
    this.inFlight = true;
    try {
      return await this.stepOnce(abortOnFailure);
    } finally {
      this.inFlight = false;
    }
  }

  /**
   * Forget all results so the suite can run again; runners are kept
   */
  reset(): void {
    this.assertIdle("reset");
    this._results = [];
    this._cursor = 0;
    this._finished = false;
    this._aborted = false;
    this._crashCount = 0;
    this._fatalFailures = false;
  }

  stats(): SuiteStats {
    return deriveStats(this);
  }

  /**
   * Release all runners and results. The suite cannot be used afterwards.
   */
  dispose(): void {
    this.assertIdle("dispose");
    this.reset();
    this._runners = [];
    this.disposed = true;
  }

  private async stepOnce(abortOnFailure: boolean): Promise<RunStatus> {
    const runner = this._runners[this._cursor];
    if (!runner) {
      throw new SuiteStateError("No tests left to run", { state: this.state });
    }
    this._fatalFailures = abortOnFailure;
    const context = await this.execute(runner);

    this._results.push(context);
    this._cursor++;

    const report = this.buildReport(runner, context);
    this.emit((reporter) => reporter.onTestComplete(report));

    if (context.failed && abortOnFailure) {
      const remaining = this._runners.length - this._cursor;
      this._aborted = true;
      this.logger.info({ test: runner.name, remaining }, "Aborting suite after failure");
      this.emit((reporter) => reporter.onAbort?.(remaining, report));
      return "aborted";
    }
    return "success";
  }

  private async execute(runner: TestRunner): Promise<TestContext> {
    const isBenchmark = runner.isBenchmark;
    const context = new TestContext(runner.name);

    try {
      this.crashGuard.install();
    } catch (error) {
      throw new EngineError("Could not install crash guard", {
        operation: "install",
        test: runner.name,
        cause: toError(error),
      });
    }

    this.logger.debug({ test: runner.name, index: this._cursor }, "Running test");
    if (isBenchmark) {
      context.markStarted();
    }
    const crashesBefore = this.crashGuard.snapshot();

    try {
      await this.executor.execute(runner, context, this.crashGuard);
    } catch (error) {
      if (isHarnessError(error)) throw error;
      throw new EngineError(`Could not join test '${runner.name}'`, {
        operation: "join",
        test: runner.name,
        cause: toError(error),
      });
    }

    // Strictly after the join: the body may have ended the timer itself
    if (isBenchmark && context.endedAt === undefined) {
      context.markEnded();
    }

    if (this.crashGuard.snapshot() !== crashesBefore) {
      context.recordFailure(CRASH_MESSAGE);
      this._crashCount++;
      this.logger.warn({ test: runner.name, fault: this.crashGuard.lastFault() }, "Test crashed");
    }

    return context;
  }

  private buildReport(runner: TestRunner, context: TestContext): TestReport {
    const classification = classify(context);
    return {
      ordinal: this._cursor,
      total: this._runners.length,
      name: runner.name,
      description: runner.description,
      classification,
      failureMessage: classification === "fail" ? context.failureMessage : undefined,
      errorMessages: classification === "error" ? [...context.errorMessages] : [],
      benchmark: runner.isBenchmark ? context.duration() : undefined,
    };
  }

  private emit(call: (reporter: Reporter) => void): void {
    if (this.quiet) return;
    call(this.reporter);
  }

  private assertUsable(operation: string): void {
    if (this.disposed) {
      throw new SuiteStateError(`Cannot ${operation}: suite has been disposed`, {
        state: "disposed",
      });
    }
  }

  private assertIdle(operation: string): void {
    this.assertUsable(operation);
    if (this.inFlight) {
      throw new SuiteStateError(`Cannot ${operation} while a test is running`, {
        state: this.state,
      });
    }
  }
}

export function createSuite(options?: SuiteOptions): Suite {
  return new Suite(options);
}
