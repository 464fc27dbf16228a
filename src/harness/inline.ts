/**
 * Run a closure test body as a detached async task on the engine's thread
 */

import type { TestContext } from "./context.js";
import type { CrashGuard } from "./crash-guard.js";
import type { TestBody } from "./runner.js";

/**
 * A throw or rejection escaping the body counts as a crash. Faults raised from
 * callbacks outside the body's promise chain are not seen here; run such
 * tests on a worker thread.
 */
export async function runInline(
  body: TestBody,
  context: TestContext,
  guard: CrashGuard,
): Promise<void> {
  try {
    // Start the body in its own microtask so a synchronous throw is caught too
    await Promise.resolve().then(() => body(context));
  } catch (fault) {
    guard.signal(fault);
  }
}
