/**
 * Test driver types
 * @module driver/types
 */

import type { ConformanceError } from '../errors/index.js';

/**
 * Lifecycle of one test. Each variant repeats build-request, execute and
 * verify. A passing test ends in `pass`; a failing one keeps the phase that
 * failed.
 */
export type TestPhase =
  | 'init'
  | 'build-expected'
  | 'build-request'
  | 'execute'
  | 'verify'
  | 'pass';

/**
 * Outcome of one operation's test
 */
export interface TestReport {
  readonly operation: string;
  /** 1-based position in the run */
  readonly index: number;
  readonly total: number;
  /** Variant that was running when the test stopped */
  readonly variant?: string;
  /** `pass`, or the phase that failed */
  readonly phase: TestPhase;
  readonly passed: boolean;
  readonly error?: ConformanceError;
  /** Printable one-line summary */
  readonly message: string;
}

/**
 * Receives test outcomes as they happen
 */
export interface Reporter {
  onTestStart?(label: string): void;
  onTestEnd(report: TestReport): void;
  onRunEnd?(reports: readonly TestReport[]): void;
}
