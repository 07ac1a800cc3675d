/**
 * Test driver
 * @module driver
 */

export type { TestPhase, TestReport, Reporter } from './types.js';
export { formatTestLabel, formatReport, formatSummary } from './format.js';
export { ConformanceRunner, runConformance, type RunnerOptions } from './runner.js';
export { ConsoleReporter, CollectingReporter } from './reporter.js';
