/**
 * Worker-thread side of module test execution
 */

import { z } from "zod";

/**
 * Data passed to each test worker
 */
export interface TestWorkerData {
  name: string;
  moduleUrl: string;
  exportName: string;
  counter: SharedArrayBuffer;
}

/**
 * Events the worker posts back to the engine, in the order the body caused them
 */
export const WorkerEventSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("failure"), message: z.string(), at: z.bigint() }),
  z.object({ kind: z.literal("error"), message: z.string(), at: z.bigint() }),
  z.object({ kind: z.literal("started"), at: z.bigint() }),
  z.object({ kind: z.literal("ended"), at: z.bigint() }),
  z.object({ kind: z.literal("unresolved"), message: z.string() }),
  z.object({ kind: z.literal("fault"), message: z.string(), stack: z.string().optional() }),
  z.object({ kind: z.literal("done") }),
]);

export type WorkerEvent = z.infer<typeof WorkerEventSchema>;

/**
 * Evaluated by `new Worker(..., { eval: true })`, so it has to be plain JavaScript.
 *
 * A fault anywhere in the worker, including timers the body leaves behind, is
 * posted to the engine, bumps the shared crash counter and ends the thread with
 * exit code 1.
 */
export const WORKER_SCRIPT = `
(async () => {
  const { parentPort, workerData } = await import("node:worker_threads");
  const counter = new Int32Array(workerData.counter);
  const now = () => process.hrtime.bigint();
  const post = (event) => parentPort.postMessage(event);

  const fault = (error) => {
    post(
      error instanceof Error
        ? { kind: "fault", message: error.message, stack: error.stack }
        : { kind: "fault", message: String(error) },
    );
    Atomics.add(counter, 0, 1);
    process.exit(1);
  };
  process.on("uncaughtException", fault);

  let body;
  try {
    const mod = await import(workerData.moduleUrl);
    body = mod[workerData.exportName];
  } catch (error) {
    post({ kind: "unresolved", message: error instanceof Error ? error.message : String(error) });
    return;
  }
  if (typeof body !== "function") {
    post({ kind: "unresolved", message: "export '" + workerData.exportName + "' is not a function" });
    return;
  }

  let failed = false;
  let errorCount = 0;
  const t = {
    name: workerData.name,
    get failed() { return failed; },
    get errorCount() { return errorCount; },
    recordFailure(message) {
      failed = true;
      post({ kind: "failure", message: String(message), at: now() });
    },
    recordError(message) {
      errorCount += 1;
      post({ kind: "error", message: String(message), at: now() });
    },
    markStarted() { post({ kind: "started", at: now() }); },
    markEnded() { post({ kind: "ended", at: now() }); },
  };

  try {
    await body(t);
  } catch (error) {
    fault(error);
    return;
  }
  post({ kind: "done" });
})();
`;
