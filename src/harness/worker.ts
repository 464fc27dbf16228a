/**
 * Run a module-exported test body on its own worker thread
 */

import path from "node:path";
import { pathToFileURL } from "node:url";
import { Worker, type ResourceLimits } from "node:worker_threads";
import type { ILogObj, Logger } from "tslog";
import { EngineError, toError } from "../utils/errors.js";
import type { TestContext } from "./context.js";
import type { CrashGuard } from "./crash-guard.js";
import type { ModuleTestRef } from "./runner.js";
import { WORKER_SCRIPT, WorkerEventSchema, type TestWorkerData } from "./worker-script.js";

export interface WorkerRunOptions {
  resourceLimits?: ResourceLimits;
  logger: Logger<ILogObj>;
}

interface WorkerOutcome {
  completed: boolean;
  unresolved?: string;
  exitCode: number;
  fault?: Error;
}

export function resolveModuleUrl(module: string): string {
  return module.startsWith("file:") ? module : pathToFileURL(path.resolve(module)).href;
}

/**
 * Spawn a worker for one test, replay its events onto `context` and wait for it
 * to exit. Resolves once the worker is gone; there is no timeout.
 */
export async function runInWorker(
  ref: ModuleTestRef,
  context: TestContext,
  guard: CrashGuard,
  options: WorkerRunOptions,
): Promise<void> {
  const { logger } = options;
  const workerData: TestWorkerData = {
    name: context.name,
    moduleUrl: resolveModuleUrl(ref.module),
    exportName: ref.exportName,
    counter: guard.sharedCounter(),
  };

  const crashesBefore = guard.snapshot();
  let worker: Worker;
  try {
    worker = new Worker(WORKER_SCRIPT, {
      eval: true,
      workerData,
      resourceLimits: options.resourceLimits,
    });
  } catch (error) {
    throw new EngineError(`Could not spawn worker for test '${context.name}'`, {
      operation: "spawn",
      test: context.name,
      cause: toError(error),
    });
  }

  const outcome = await new Promise<WorkerOutcome>((resolve) => {
    let completed = false;
    let unresolved: string | undefined;
    let fault: Error | undefined;
    let reported: Error | undefined;

    worker.on("message", (raw: unknown) => {
      const parsed = WorkerEventSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn({ test: context.name, message: raw }, "Ignoring malformed worker message");
        return;
      }
      const event = parsed.data;
      switch (event.kind) {
        case "failure":
          context.recordFailure(event.message, event.at);
          break;
        case "error":
          context.recordError(event.message, event.at);
          break;
        case "started":
          context.markStarted(event.at);
          break;
        case "ended":
          context.markEnded(event.at);
          break;
        case "unresolved":
          unresolved = event.message;
          break;
        case "fault":
          reported = new Error(event.message);
          if (event.stack !== undefined) reported.stack = event.stack;
          break;
        case "done":
          completed = true;
          // Handles the body left open must not outlive the test
          worker.terminate().catch((error: unknown) => {
            logger.debug({ test: context.name, error }, "Worker terminate failed");
          });
          break;
      }
    });
    worker.on("error", (error) => {
      fault = error;
    });
    worker.on("exit", (exitCode) => {
      resolve({ completed, unresolved, exitCode, fault: reported ?? fault });
    });
  });

  if (outcome.unresolved !== undefined) {
    throw new EngineError(
      `Could not load test '${context.name}' from ${ref.module}: ${outcome.unresolved}`,
      { operation: "spawn", test: context.name },
    );
  }

  if (outcome.completed) return;

  const fault = outcome.fault ?? new Error(`Worker exited with code ${outcome.exitCode}`);
  if (guard.snapshot() === crashesBefore) {
    // Out-of-memory and similar exits never reach the worker's own handler
    guard.signal(fault);
  } else {
    guard.remember(fault);
  }
}
