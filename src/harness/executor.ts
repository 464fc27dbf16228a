/**
 * Scoped execution of one test body
 */

import type { ResourceLimits } from "node:worker_threads";
import type { ILogObj, Logger } from "tslog";
import { createChildLogger, getLogger } from "../utils/logger.js";
import type { TestContext } from "./context.js";
import type { CrashGuard } from "./crash-guard.js";
import { runInline } from "./inline.js";
import type { TestRunner } from "./runner.js";
import { runInWorker } from "./worker.js";

/**
 * Runs a body in an isolated unit and resolves only once that unit is done.
 * Faults are reported to the guard, not thrown. Rejects with `EngineError`
 * when the unit could not be created or joined.
 */
export interface ScopedExecutor {
  execute(runner: TestRunner, context: TestContext, guard: CrashGuard): Promise<void>;
}

export interface IsolatingExecutorOptions {
  resourceLimits?: ResourceLimits;
  logger?: Logger<ILogObj>;
}

/**
 * Closures run inline; module references run on a worker thread
 */
export class IsolatingExecutor implements ScopedExecutor {
  private readonly resourceLimits?: ResourceLimits;
  private readonly logger: Logger<ILogObj>;

  constructor(options: IsolatingExecutorOptions = {}) {
    this.resourceLimits = options.resourceLimits;
    this.logger = options.logger ?? createChildLogger(getLogger(), "executor");
  }

  async execute(runner: TestRunner, context: TestContext, guard: CrashGuard): Promise<void> {
    const { body } = runner;
    if (typeof body === "function") {
      await runInline(body, context, guard);
      return;
    }
    await runInWorker(body, context, guard, {
      resourceLimits: this.resourceLimits,
      logger: this.logger,
    });
  }
}

export function createExecutor(options?: IsolatingExecutorOptions): IsolatingExecutor {
  return new IsolatingExecutor(options);
}
