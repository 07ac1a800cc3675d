/**
 * Console reporting of test outcomes
 * @module driver/reporter
 */

import { formatSummary } from './format.js';
import type { Reporter, TestReport } from './types.js';

/**
 * Prints one line per finished test and a totals line at the end
 */
export class ConsoleReporter implements Reporter {
  constructor(private readonly write: (line: string) => void = (line) => console.log(line)) {}

  onTestEnd(report: TestReport): void {
    this.write(report.message);
  }

  onRunEnd(reports: readonly TestReport[]): void {
    this.write(formatSummary(reports));
  }
}

/**
 * Keeps every report in memory
 */
export class CollectingReporter implements Reporter {
  readonly started: string[] = [];
  readonly reports: TestReport[] = [];
  finished = false;

  onTestStart(label: string): void {
    this.started.push(label);
  }

  onTestEnd(report: TestReport): void {
    this.reports.push(report);
  }

  onRunEnd(): void {
    this.finished = true;
  }
}
