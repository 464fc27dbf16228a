/**
 * Tests for building suites from configuration
 */

import { describe, it, expect } from "vitest";
import { createDefaultConfig, type HarnessConfig } from "../config/schema.js";
import type { Reporter, TestReport } from "../reporter/types.js";
import { createSuiteFromConfig } from "./factory.js";
import { TestRunner } from "./runner.js";

function quietConfig(overrides: Partial<HarnessConfig> = {}): HarnessConfig {
  const base = createDefaultConfig();
  return {
    ...base,
    reporter: { quiet: true, color: "never" },
    logging: { ...base.logging, level: "fatal" },
    ...overrides,
  };
}

describe("createSuiteFromConfig", () => {
  it("should take quiet mode from the reporter section", () => {
    const suite = createSuiteFromConfig(quietConfig());

    expect(suite.quiet).toBe(true);
  });

  it("should use the configured abort policy as the run default", async () => {
    const suite = createSuiteFromConfig(quietConfig({ abortOnFailure: true }));
    suite.add(
      new TestRunner((t) => t.recordFailure("no"), "test_first"),
      new TestRunner(() => undefined, "test_second"),
    );

    const status = await suite.run();

    expect(status).toBe("aborted");
    expect(suite.cursor).toBe(1);
  });

  it("should prefer explicit overrides", async () => {
    const reports: TestReport[] = [];
    const reporter: Reporter = {
      onTestComplete: (report) => {
        reports.push(report);
      },
    };
    const suite = createSuiteFromConfig(quietConfig(), { reporter, quiet: false });
    suite.add(new TestRunner(() => undefined, "test_only"));

    await suite.run();

    expect(reports.map((r) => r.name)).toEqual(["test_only"]);
  });
});
