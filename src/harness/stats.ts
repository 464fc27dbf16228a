/**
 * Aggregate statistics over a suite's results
 */

import type { TestContext } from "./context.js";
import type { TestRunner } from "./runner.js";

export interface TestOutcome {
  name: string;
  ok: boolean;
}

/**
 * Read-only snapshot; later suite changes are not reflected
 */
export interface SuiteStats {
  outcomes: readonly TestOutcome[];
  nTests: number;
  nRan: number;
  /** Tests that recorded at least one error, failed or not */
  nError: number;
  nFail: number;
  nCrash: number;
  /** Share of run tests with neither a failure nor an error; 0 when nothing ran */
  successRate: number;
  fatalFailures: boolean;
}

/**
 * The parts of a suite stats are derived from
 */
export interface StatsSource {
  readonly runners: readonly TestRunner[];
  readonly results: readonly TestContext[];
  readonly cursor: number;
  readonly fatalFailures: boolean;
  readonly crashCount: number;
}

export function deriveStats(source: StatsSource): SuiteStats {
  const outcomes: TestOutcome[] = [];
  let nError = 0;
  let nFail = 0;
  let nClean = 0;

  for (let i = 0; i < source.cursor; i++) {
    const runner = source.runners[i];
    const result = source.results[i];
    if (!runner || !result) break;

    outcomes.push(Object.freeze({ name: runner.name, ok: !result.failed }));
    if (result.errorCount > 0) nError++;
    if (result.failed) nFail++;
    if (!result.failed && result.errorCount === 0) nClean++;
  }

  const nRan = outcomes.length;
  return Object.freeze({
    outcomes: Object.freeze(outcomes),
    nTests: source.runners.length,
    nRan,
    nError,
    nFail,
    nCrash: source.crashCount,
    successRate: nRan === 0 ? 0 : nClean / nRan,
    fatalFailures: source.fatalFailures,
  });
}
