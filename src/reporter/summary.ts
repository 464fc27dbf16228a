/**
 * Plain-text summary of suite statistics
 */

import type { SuiteStats } from "../harness/stats.js";

export function formatStats(stats: SuiteStats): string {
  const lines = [
    `Ran ${stats.nRan} of ${stats.nTests} tests.`,
    `Failed ${stats.nFail} of ${stats.nTests} tests. (Fatal failures: ${stats.fatalFailures})`,
    `Errors during testing: ${stats.nError}`,
    `Success rate: ${stats.successRate.toFixed(2)}`,
    "",
    ...stats.outcomes.map((o) => `${o.name}: ${o.ok ? "okay" : "not okay"}`),
  ];
  return lines.join("\n") + "\n";
}
