/**
 * Report line formatting
 * @module driver/format
 */

import type { TestReport } from './types.js';

/**
 * Test label in the form `[01/02] ListObjects V1:`
 */
export function formatTestLabel(index: number, total: number, operation: string): string {
  const width = Math.max(2, String(total).length);
  const position = String(index).padStart(width, '0');
  return `[${position}/${String(total).padStart(width, '0')}] ${operation}:`;
}

/**
 * One-line summary of a finished test
 *
 * @example
 * ```typescript
 * // [01/02] ListObjects V1: PASSED
 * // [02/02] ListMultipartUploads: FAILED in verify (all uploads): Unexpected Status Received: wanted 200 OK, got 403 Forbidden
 * ```
 */
export function formatReport(report: Omit<TestReport, 'message'>): string {
  const label = formatTestLabel(report.index, report.total, report.operation);
  if (report.passed) {
    return `${label} PASSED`;
  }

  const where = report.variant ? `${report.phase} (${report.variant})` : report.phase;
  const reason = report.error?.message ?? 'unknown error';
  return `${label} FAILED in ${where}: ${reason}`;
}

/**
 * Totals line for a finished run
 */
export function formatSummary(reports: readonly TestReport[]): string {
  const passed = reports.filter((report) => report.passed).length;
  return `${passed} passed, ${reports.length - passed} failed`;
}
