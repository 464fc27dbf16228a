/**
 * Reporting sink contract
 */

import type { Duration } from "../utils/time.js";

export type Classification = "pass" | "fail" | "error";

/**
 * Everything a sink gets about one finished test
 */
export interface TestReport {
  /** 1-based position in the suite */
  ordinal: number;
  total: number;
  name: string;
  description: string;
  classification: Classification;
  failureMessage?: string;
  errorMessages: readonly string[];
  /** Only set for benchmark tests */
  benchmark?: Duration;
}

/**
 * Write-only boundary: nothing a reporter does affects the suite
 */
export interface Reporter {
  onTestComplete(report: TestReport): void;
  /** Called after the failing test's report when abort-on-failure stops the run */
  onAbort?(remaining: number, report: TestReport): void;
}
