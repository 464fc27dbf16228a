/**
 * Registered test: name, description and body
 */

import { InvalidArgumentError } from "../utils/errors.js";
import type { TestContext } from "./context.js";

/**
 * Names starting with this prefix are timed by the engine
 */
export const BENCHMARK_PREFIX = "bench_";

/**
 * Test body run inline on the engine's thread
 */
export type TestBody = (t: TestContext) => void | Promise<void>;

/**
 * Test body exported from an ES module and run on its own worker thread.
 * `module` is a file path or a `file:` URL.
 *
 * For `bench_` tests the engine starts the timer before the worker is spawned,
 * so the measured duration includes thread startup and the module import
 * (tens of milliseconds). Call `t.markStarted()` and `t.markEnded()` inside the
 * body to time only the body.
 */
export interface ModuleTestRef {
  module: string;
  exportName: string;
}

export type TestSource = TestBody | ModuleTestRef;

export function isModuleTestRef(source: unknown): source is ModuleTestRef {
  if (typeof source !== "object" || source === null) return false;
  if (!("module" in source) || !("exportName" in source)) return false;
  const { module, exportName } = source;
  return (
    typeof module === "string" &&
    module.length > 0 &&
    typeof exportName === "string" &&
    exportName.length > 0
  );
}

export class TestRunner {
  readonly name: string;
  readonly description: string;
  readonly body: TestSource;

  constructor(
    body: TestSource | null | undefined,
    name: string | null | undefined,
    description?: string | null,
  ) {
    if (!name) {
      throw new InvalidArgumentError("Test name must be a non-empty string", {
        argument: "name",
      });
    }
    if (typeof body !== "function" && !isModuleTestRef(body)) {
      throw new InvalidArgumentError(`Test '${name}' has no body`, { argument: "body" });
    }

    this.name = name;
    this.description = description ?? "";
    this.body = typeof body === "function" ? body : { ...body };
    Object.freeze(this);
  }

  get isBenchmark(): boolean {
    return this.name.startsWith(BENCHMARK_PREFIX);
  }
}

/**
 * Create a test runner
 */
export function createRunner(
  body: TestSource,
  name: string,
  description?: string,
): TestRunner {
  return new TestRunner(body, name, description);
}
