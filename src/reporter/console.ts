/**
 * Line-oriented test reporter for terminals and plain streams
 */

import chalk, { Chalk, type ChalkInstance } from "chalk";
import { formatDuration } from "../utils/time.js";
import type { Reporter, TestReport } from "./types.js";

const INDENT = " ".repeat(6);

export type ColorMode = "auto" | "always" | "never";

export interface ConsoleReporterOptions {
  stream?: NodeJS.WritableStream & { isTTY?: boolean };
  color?: ColorMode;
}

/**
 * Build the chalk instance for a stream. "auto" colors only TTY streams.
 */
export function createPainter(mode: ColorMode, isTTY: boolean): ChalkInstance {
  if (mode === "never" || (mode === "auto" && !isTTY)) {
    return new Chalk({ level: 0 });
  }
  return new Chalk({ level: chalk.level || 1 });
}

/**
 * Format one test's lines, including the benchmark line when timed
 */
export function formatTestReport(report: TestReport, paint: ChalkInstance): string {
  const position = `test ${report.ordinal}/${report.total} (${report.name}): `;
  const description = paint.dim(report.description);
  let out = "";

  switch (report.classification) {
    case "fail":
      out = `${paint.bold.red(`fail: ${position}`)}${description}\n`;
      out += `${INDENT}${paint.dim(report.failureMessage ?? "")}\n`;
      break;
    case "error":
      out = `${paint.yellow(`err:  ${position}`)}${description}\n`;
      out += `${INDENT}${paint.yellow(`encountered ${report.errorMessages.length} errors.`)}\n`;
      report.errorMessages.forEach((message, i) => {
        out += `${INDENT}${paint.dim(`${i + 1}. ${message}`)}\n`;
      });
      break;
    case "pass":
      out = `${paint.green(`okay: ${position}`)}${description}\n`;
      break;
  }

  if (report.benchmark) {
    out += `${INDENT}${paint.dim(`bench: test (${report.name}) took `)}`;
    out += `${paint.cyan(formatDuration(report.benchmark))}\n`;
  }
  return out;
}

export class ConsoleReporter implements Reporter {
  private readonly stream: NodeJS.WritableStream;
  private readonly paint: ChalkInstance;

  constructor(options: ConsoleReporterOptions = {}) {
    const stream = options.stream ?? process.stdout;
    this.stream = stream;
    this.paint = createPainter(options.color ?? "auto", stream.isTTY === true);
  }

  onTestComplete(report: TestReport): void {
    this.stream.write(formatTestReport(report, this.paint));
  }

  onAbort(remaining: number): void {
    this.stream.write(`aborted with ${remaining} tests remaining.\n`);
  }
}

export function createConsoleReporter(options?: ConsoleReporterOptions): ConsoleReporter {
  return new ConsoleReporter(options);
}
